import { spawn } from 'child_process';
import { CommandResult } from '../types';

export interface RunOptions {
  timeout?: number;
  input?: string;
  cwd?: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export function quoteArg(arg: string): string {
  if (arg === '') return "''";
  return /^[A-Za-z0-9_\-+=:,./@%]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'"'"'`)}'`;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}

/**
 * Runs an executable without a shell. A spawn failure (missing binary,
 * permission denied) is reported as exit code 127 with the error in stderr.
 */
export class ProcessRunner implements CommandRunner {
  constructor(private verbose = false) {}

  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    if (this.verbose) {
      console.log(`▶️ ${formatCommand(command, args)}`);
    }

    return new Promise((resolve) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      if (options.timeout) {
        timer = setTimeout(() => {
          child.kill('SIGKILL');
          finish({ code: 124, stdout, stderr: stderr || `Command timed out after ${options.timeout}ms` });
        }, options.timeout);
      }

      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => { stdout += chunk; });
      child.stderr?.on('data', (chunk: string) => { stderr += chunk; });

      child.on('error', (error) => {
        finish({ code: 127, stdout, stderr: error.message });
      });

      child.on('close', (code) => {
        finish({ code: code ?? 1, stdout, stderr });
      });

      if (options.input !== undefined && child.stdin) {
        child.stdin.end(options.input);
      }
    });
  }
}

/**
 * Stands in for the hypervisor CLI when it is unavailable: every command
 * succeeds and echoes itself.
 */
export class SimulatedRunner implements CommandRunner {
  constructor(private delayMs = 200) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    return { code: 0, stdout: `(fake) ${formatCommand(command, args)}`, stderr: '' };
  }
}
