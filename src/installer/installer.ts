import fs from 'fs';
import path from 'path';
import { CONFIG_FILE, DEFAULT_CONFIG_FILE, DEFAULT_PLANS, PLANS_FILE } from '../config';
import { InstallerError } from '../errors';
import { CommandRunner, formatCommand } from '../services/command-runner';
import { renderServiceUnit } from './service-unit';

export const DEFAULT_SERVICE_NAME = 'lxc-vps-bot.service';
export const DEFAULT_UNIT_DIR = '/etc/systemd/system';
export const DEFAULT_ENTRY = 'dist/index.js';
export const TOTAL_STEPS = 8;

export interface InstallerOptions {
  workdir: string;
  user: string;
  nodeBin: string;
  runner: CommandRunner;
  serviceName?: string;
  unitDir?: string;
  entry?: string;
  /** Prefix system-level commands with sudo and write the unit through `sudo tee`. */
  sudo?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface InstallReport {
  createdConfig: boolean;
  createdPlans: boolean;
  createdService: boolean;
  installedLxd: boolean;
  warnings: string[];
  servicePath: string;
}

interface StepCommand {
  command: string;
  args: string[];
  privileged?: boolean;
  /** Failures are logged and skipped instead of aborting the install. */
  tolerant?: boolean;
  cwd?: string;
  input?: string;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Prepares a Debian host for the bot. Every file it creates is only written
 * when missing, so re-running it leaves existing configuration untouched.
 * The first non-tolerant command failure aborts the whole run.
 */
export class Installer {
  private options: Required<Omit<InstallerOptions, 'sleep'>> & { sleep: (ms: number) => Promise<void> };
  private warnings: string[] = [];

  constructor(options: InstallerOptions) {
    this.options = {
      serviceName: DEFAULT_SERVICE_NAME,
      unitDir: DEFAULT_UNIT_DIR,
      entry: DEFAULT_ENTRY,
      sudo: true,
      sleep: defaultSleep,
      ...options,
    };
  }

  get servicePath(): string {
    return path.join(this.options.unitDir, this.options.serviceName);
  }

  private step(n: number, message: string): void {
    console.log(`[${n}/${TOTAL_STEPS}] ${message}`);
  }

  private async exec(stepName: string, cmd: StepCommand): Promise<boolean> {
    const command = cmd.privileged && this.options.sudo ? 'sudo' : cmd.command;
    const args = cmd.privileged && this.options.sudo ? [cmd.command, ...cmd.args] : cmd.args;

    const result = await this.options.runner.run(command, args, { cwd: cmd.cwd, input: cmd.input });
    if (result.code === 0) {
      return true;
    }

    const detail = (result.stderr || result.stdout).trim() || `exit code ${result.code}`;
    if (cmd.tolerant) {
      const warning = `${formatCommand(command, args)} failed (ignored): ${detail}`;
      console.warn(`⚠️ ${warning}`);
      this.warnings.push(warning);
      return false;
    }
    throw new InstallerError(stepName, `${stepName}: ${formatCommand(command, args)} failed: ${detail}`);
  }

  async run(): Promise<InstallReport> {
    const { workdir, user } = this.options;
    this.warnings = [];
    console.log('=== LXD + Discord VPS Bot installer for Debian ===');

    this.step(1, 'Updating apt...');
    await this.exec('apt update', { command: 'apt', args: ['update', '-y'], privileged: true });
    await this.exec('apt upgrade', { command: 'apt', args: ['upgrade', '-y'], privileged: true });

    this.step(2, 'Installing prerequisites...');
    await this.exec('install prerequisites', {
      command: 'apt',
      args: ['install', '-y', 'snapd', 'git', 'curl', 'jq', 'npm'],
      privileged: true,
    });

    this.step(3, 'Ensuring snapd is running...');
    await this.exec('enable snapd', {
      command: 'systemctl',
      args: ['enable', '--now', 'snapd.socket'],
      privileged: true,
      tolerant: true,
    });
    await this.options.sleep(2000);

    let installedLxd = false;
    const hasLxd = await this.options.runner.run('sh', ['-c', 'command -v lxd']);
    if (hasLxd.code !== 0) {
      this.step(4, 'Installing LXD via snap...');
      await this.exec('install lxd', { command: 'snap', args: ['install', 'lxd'], privileged: true });
      await this.exec('add user to lxd group', {
        command: 'usermod',
        args: ['-aG', 'lxd', user],
        privileged: true,
        tolerant: true,
      });
      installedLxd = true;
      console.log("[4.1] Running 'newgrp lxd' may be needed or logout/login.");
    } else {
      this.step(4, 'LXD already installed.');
    }

    this.step(5, "Running 'lxd init --auto' (non-interactive default)...");
    await this.exec('lxd init', { command: 'lxd', args: ['init', '--auto'], privileged: true, tolerant: true });

    this.step(6, `Creating working directory: ${workdir}`);
    fs.mkdirSync(workdir, { recursive: true });

    this.step(7, 'Installing Node.js dependencies and building...');
    if (fs.existsSync(path.join(workdir, 'package.json'))) {
      await this.exec('npm install', { command: 'npm', args: ['install'], cwd: workdir });
      await this.exec('npm run build', { command: 'npm', args: ['run', 'build'], cwd: workdir });
    } else {
      const warning = `No package.json in ${workdir}; skipping dependency install`;
      console.warn(`⚠️ ${warning}`);
      this.warnings.push(warning);
    }

    this.step(8, 'Creating config & plans defaults if missing...');
    const createdConfig = this.writeIfMissing(path.join(workdir, CONFIG_FILE), DEFAULT_CONFIG_FILE);
    if (createdConfig) {
      console.log(`Created template ${CONFIG_FILE} in ${workdir}. Please edit BOT_TOKEN and ADMIN_ROLE_ID.`);
    }
    const createdPlans = this.writeIfMissing(path.join(workdir, PLANS_FILE), DEFAULT_PLANS);
    if (createdPlans) {
      console.log(`Created default ${PLANS_FILE}`);
    }

    const createdService = await this.installService();

    console.log('=== Setup complete ===');
    console.log(`Edit ${path.join(workdir, CONFIG_FILE)} to set BOT_TOKEN and ADMIN_ROLE_ID if you haven't already.`);
    console.log(`To view logs: sudo journalctl -u ${this.options.serviceName} -f`);

    return {
      createdConfig,
      createdPlans,
      createdService,
      installedLxd,
      warnings: [...this.warnings],
      servicePath: this.servicePath,
    };
  }

  private writeIfMissing(filePath: string, content: unknown): boolean {
    if (fs.existsSync(filePath)) {
      return false;
    }
    fs.writeFileSync(filePath, `${JSON.stringify(content, null, 2)}\n`);
    return true;
  }

  private async installService(): Promise<boolean> {
    const servicePath = this.servicePath;
    if (fs.existsSync(servicePath)) {
      console.log(`Systemd service already exists: ${servicePath}`);
      return false;
    }

    const unit = renderServiceUnit({
      user: this.options.user,
      workdir: this.options.workdir,
      nodeBin: this.options.nodeBin,
      entry: this.options.entry,
    });

    if (this.options.sudo) {
      await this.exec('write service unit', {
        command: 'tee',
        args: [servicePath],
        privileged: true,
        input: unit,
      });
    } else {
      fs.mkdirSync(this.options.unitDir, { recursive: true });
      fs.writeFileSync(servicePath, unit);
    }

    await this.exec('systemd reload', { command: 'systemctl', args: ['daemon-reload'], privileged: true });
    await this.exec('enable service', {
      command: 'systemctl',
      args: ['enable', '--now', this.options.serviceName],
      privileged: true,
    });
    console.log(`Created and started systemd service: ${this.options.serviceName}`);
    return true;
  }
}
