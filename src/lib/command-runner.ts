/**
 * Subprocess execution used by the packaging steps.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  /** Stream child output to this process while capturing it */
  inherit?: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: 'pipe',
      });

      let stdout = '';
      let stderr = '';

      // UTF-8 decoding spans chunk boundaries.
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (data: string) => {
        stdout += data;
        if (options.inherit) process.stdout.write(data);
      });

      child.stderr.on('data', (data: string) => {
        stderr += data;
        if (options.inherit) process.stderr.write(data);
      });

      child.on('error', reject);

      child.on('close', (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
}
