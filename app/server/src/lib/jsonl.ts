import { appendFile, readFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { ParseError, getErrorMessage } from './errors';

export async function appendJsonl<T>(filePath: string, record: T): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await appendFile(filePath, `${JSON.stringify(record)}\n`, 'utf-8');
}

/**
 * Reads a JSON-lines journal. A missing journal is empty; a line that is not
 * JSON or is rejected by `accept` fails with its line number.
 */
export async function readJsonl<T>(
  filePath: string,
  accept: (value: unknown) => value is T
): Promise<T[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const records: T[] = [];
  content.split('\n').forEach((line, index) => {
    if (line.trim().length === 0) return;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new ParseError(`line ${index + 1}: ${getErrorMessage(error)}`, filePath, { cause: error });
    }
    if (!accept(value)) {
      throw new ParseError(`line ${index + 1}: unexpected record`, filePath);
    }
    records.push(value);
  });
  return records;
}
