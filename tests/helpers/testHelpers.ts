import fs from 'fs';
import os from 'os';
import path from 'path';
import { CommandRunner, RunOptions } from '../../src/services/command-runner';
import { CommandResult } from '../../src/types';

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

type Handler = (command: string, args: string[]) => Partial<CommandResult> | undefined;

/**
 * Records every command and answers with the handler's result, or success
 * with empty output when the handler returns nothing.
 */
export class RecordingRunner implements CommandRunner {
  calls: RecordedCall[] = [];

  constructor(private handler: Handler = () => undefined) {}

  async run(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const result = this.handler(command, args) ?? {};
    return { code: 0, stdout: '', stderr: '', ...result };
  }

  commandLines(): string[] {
    return this.calls.map(call => [call.command, ...call.args].join(' '));
  }
}

export function makeTempDir(prefix = 'lxc-vps-bot-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeJson(filePath: string, data: unknown): void {
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}
