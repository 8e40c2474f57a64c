import { spawn } from 'child_process';
import { CommandError } from './errors';

export type CommandName = 'git' | 'gh';

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandRunner {
  run(command: CommandName, args: string[], options?: CommandOptions): Promise<string>;
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: CommandName, args: string[], options: CommandOptions = {}): Promise<string> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: 'pipe',
      });
      let stdout = '';
      let stderr = '';
      proc.stdout?.on('data', (d: Buffer) => (stdout += d.toString()));
      proc.stderr?.on('data', (d: Buffer) => (stderr += d.toString()));
      proc.on('close', (code) => {
        if (code === 0) resolve(stdout.trim());
        else reject(new CommandError(command, args, code, stderr));
      });
      proc.on('error', reject);
    });
  }
}
