import fs from 'fs';
import { CommandRunner, ProcessRunner, SimulatedRunner } from './command-runner';
import {
  BackendStatus,
  CommandResult,
  CONTAINER_ACTIONS,
  ContainerAction,
  ContainerSummary,
  OperationResult,
} from '../types';

export interface LxcClientOptions {
  lxcPath: string;
  fakeModeIfNoLxc: boolean;
  image: string;
  profile: string;
  commandTimeout: number;
  verbose?: boolean;
  /** Overrides backend detection; used by tests. */
  runner?: CommandRunner;
  fake?: boolean;
}

export interface CreateContainerOptions {
  image?: string;
  profile?: string;
  ramMb?: number;
  cpuCores?: number;
}

function readProcVersion(): string {
  try {
    return fs.readFileSync('/proc/version', 'utf-8');
  } catch {
    return '';
  }
}

/**
 * The simulated backend is used when the CLI is missing and fake mode is
 * enabled, and always under WSL where LXD cannot run.
 */
export function shouldUseFakeMode(
  lxcPath: string,
  fakeModeIfNoLxc: boolean,
  exists: (p: string) => boolean = fs.existsSync,
  procVersion: string = readProcVersion()
): boolean {
  if (!exists(lxcPath) && fakeModeIfNoLxc) return true;
  return procVersion.toLowerCase().includes('microsoft');
}

const ACTION_NAMES: readonly string[] = CONTAINER_ACTIONS;

export function isContainerAction(action: string): action is ContainerAction {
  return ACTION_NAMES.includes(action);
}

export class LxcClient {
  readonly fake: boolean;
  private runner: CommandRunner;
  private options: LxcClientOptions;

  constructor(options: LxcClientOptions) {
    this.options = options;
    this.fake = options.fake ?? shouldUseFakeMode(options.lxcPath, options.fakeModeIfNoLxc);
    this.runner = options.runner
      ?? (this.fake ? new SimulatedRunner() : new ProcessRunner(options.verbose));
  }

  get lxcPath(): string {
    return this.options.lxcPath;
  }

  private exec(args: string[]): Promise<CommandResult> {
    return this.runner.run(this.options.lxcPath, args, { timeout: this.options.commandTimeout });
  }

  private static failure(result: CommandResult): OperationResult {
    return { ok: false, message: (result.stderr || result.stdout).trim() };
  }

  async createContainer(name: string, options: CreateContainerOptions = {}): Promise<OperationResult> {
    const image = options.image || this.options.image;
    const profile = options.profile || this.options.profile;

    const launched = await this.exec(['launch', image, name, '-p', profile]);
    if (launched.code !== 0) {
      return LxcClient.failure(launched);
    }

    // Limits are applied after launch; a failed limit does not undo the container.
    if (options.ramMb !== undefined) {
      const memBytes = options.ramMb * 1024 * 1024;
      await this.applyLimit(name, 'limits.memory', String(memBytes));
    }
    if (options.cpuCores !== undefined) {
      await this.applyLimit(name, 'limits.cpu', String(options.cpuCores));
    }

    return { ok: true, message: launched.stdout.trim() || 'created' };
  }

  private async applyLimit(name: string, key: string, value: string): Promise<void> {
    const result = await this.exec(['config', 'set', name, key, value]);
    if (result.code !== 0) {
      console.warn(`⚠️ Failed to set ${key}=${value} on ${name}: ${(result.stderr || result.stdout).trim()}`);
    }
  }

  async deleteContainer(name: string): Promise<OperationResult> {
    // The container may already be stopped; only the delete decides the outcome.
    await this.exec(['stop', name, '--force']);
    const deleted = await this.exec(['delete', name]);
    if (deleted.code !== 0) {
      return LxcClient.failure(deleted);
    }
    return { ok: true, message: 'deleted' };
  }

  async runAction(name: string, action: string): Promise<OperationResult> {
    if (!isContainerAction(action)) {
      return { ok: false, message: 'invalid action' };
    }

    const result = await this.exec([action, name]);
    if (result.code !== 0) {
      return LxcClient.failure(result);
    }
    return { ok: true, message: result.stdout || 'OK' };
  }

  async listContainers(): Promise<ContainerSummary[]> {
    const result = await this.exec(['list', '--format', 'json']);
    if (result.code !== 0) {
      throw new Error(`lxc list failed: ${(result.stderr || result.stdout).trim()}`);
    }

    const parsed: unknown = JSON.parse(result.stdout);
    if (!Array.isArray(parsed)) {
      throw new Error('lxc list returned unexpected output');
    }

    const containers: ContainerSummary[] = [];
    for (const entry of parsed) {
      if (typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string') {
        const status = 'status' in entry && typeof entry.status === 'string' ? entry.status : 'Unknown';
        containers.push({ name: entry.name, status });
      }
    }
    return containers;
  }

  async checkHealth(): Promise<BackendStatus> {
    const startTime = Date.now();
    const mode = this.fake ? 'fake' : 'lxc';

    try {
      const result = await this.exec(['version']);
      const responseTime = Date.now() - startTime;

      if (result.code !== 0) {
        return {
          status: 'offline',
          mode,
          lastCheck: new Date(),
          responseTime,
          error: (result.stderr || result.stdout).trim() || `exit code ${result.code}`,
        };
      }

      const version = result.stdout.match(/Client version:\s*(\S+)/)?.[1];
      return {
        status: 'online',
        mode,
        lastCheck: new Date(),
        responseTime,
        ...(version ? { version } : {}),
      };
    } catch (error) {
      return {
        status: 'error',
        mode,
        lastCheck: new Date(),
        responseTime: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
