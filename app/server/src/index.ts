import { getErrorMessage } from './lib/errors';
import { createLogger } from './lib/logger';
import { startServer } from './server';

const log = createLogger('server');

startServer().catch((error: unknown) => {
  log.fatal({ error: getErrorMessage(error) }, 'Server failed to start');
  process.exit(1);
});
