import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_PLANS } from '../../src/config';
import { InstallerError } from '../../src/errors';
import { Installer, InstallerOptions } from '../../src/installer/installer';
import { renderServiceUnit } from '../../src/installer/service-unit';
import { makeTempDir, RecordingRunner, removeDir } from '../helpers/testHelpers';

const BASE_COMMANDS = [
  'apt update -y',
  'apt upgrade -y',
  'apt install -y snapd git curl jq npm',
  'systemctl enable --now snapd.socket',
  'sh -c command -v lxd',
  'lxd init --auto',
  'npm install',
  'npm run build',
];

describe('renderServiceUnit', () => {
  it('runs the built entry point with the configured node binary', () => {
    const unit = renderServiceUnit({
      user: 'botuser',
      workdir: '/opt/vps-bot',
      nodeBin: '/usr/bin/node',
      entry: 'dist/index.js',
    });

    expect(unit.split('\n')).toEqual([
      '[Unit]',
      'Description=LXC VPS Discord Bot',
      'After=network.target',
      '',
      '[Service]',
      'Type=simple',
      'User=botuser',
      'WorkingDirectory=/opt/vps-bot',
      'Environment=NODE_ENV=production',
      'ExecStart=/usr/bin/node /opt/vps-bot/dist/index.js',
      'Restart=always',
      'RestartSec=5',
      '',
      '[Install]',
      'WantedBy=multi-user.target',
      '',
    ]);
  });

  it('keeps an absolute entry as given', () => {
    const unit = renderServiceUnit({ user: 'u', workdir: '/w', nodeBin: 'node', entry: '/srv/app.js' });
    expect(unit).toContain('ExecStart=node /srv/app.js\n');
  });
});

describe('Installer', () => {
  let root: string;
  let workdir: string;
  let unitDir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = makeTempDir();
    workdir = path.join(root, 'bot');
    unitDir = path.join(root, 'systemd');
    fs.mkdirSync(workdir);
    fs.writeFileSync(path.join(workdir, 'package.json'), '{}');
  });

  afterEach(() => {
    removeDir(root);
    vi.restoreAllMocks();
  });

  function installer(runner: RecordingRunner, overrides: Partial<InstallerOptions> = {}): Installer {
    return new Installer({
      workdir,
      user: 'botuser',
      nodeBin: '/usr/bin/node',
      runner,
      unitDir,
      sudo: false,
      sleep: async () => {},
      ...overrides,
    });
  }

  it('sets up a fresh host', async () => {
    const runner = new RecordingRunner();
    const report = await installer(runner).run();

    expect(runner.commandLines()).toEqual([
      ...BASE_COMMANDS,
      'systemctl daemon-reload',
      'systemctl enable --now lxc-vps-bot.service',
    ]);
    expect(report).toEqual({
      createdConfig: true,
      createdPlans: true,
      createdService: true,
      installedLxd: false,
      warnings: [],
      servicePath: path.join(unitDir, 'lxc-vps-bot.service'),
    });

    const npmCall = runner.calls.find(call => call.command === 'npm');
    expect(npmCall?.options?.cwd).toBe(workdir);
  });

  it('writes templates and a unit that point at the working directory', async () => {
    await installer(new RecordingRunner()).run();

    const config: unknown = JSON.parse(fs.readFileSync(path.join(workdir, 'config.json'), 'utf-8'));
    expect(config).toEqual({
      BOT_TOKEN: 'YOUR_BOT_TOKEN_HERE',
      ADMIN_ROLE_ID: 'YOUR_ADMIN_ROLE_ID_HERE',
      LXC_PATH: '/usr/bin/lxc',
      FAKE_MODE_IF_NO_LXC: false,
    });

    const plans: unknown = JSON.parse(fs.readFileSync(path.join(workdir, 'plans.json'), 'utf-8'));
    expect(plans).toEqual(DEFAULT_PLANS);
    for (const plan of Object.values(DEFAULT_PLANS)) {
      expect(plan.price).toBeGreaterThanOrEqual(0);
      expect(plan.ram_mb).toBeGreaterThan(0);
    }

    const unit = fs.readFileSync(path.join(unitDir, 'lxc-vps-bot.service'), 'utf-8');
    expect(unit).toContain(`WorkingDirectory=${workdir}\n`);
    expect(unit).toContain(`ExecStart=/usr/bin/node ${path.join(workdir, 'dist/index.js')}\n`);
    expect(unit).toContain('User=botuser\n');
  });

  it('leaves existing files alone when run again', async () => {
    await installer(new RecordingRunner()).run();
    fs.writeFileSync(path.join(workdir, 'config.json'), '{"BOT_TOKEN":"test-secret"}');

    const runner = new RecordingRunner();
    const report = await installer(runner).run();

    expect(report.createdConfig).toBe(false);
    expect(report.createdPlans).toBe(false);
    expect(report.createdService).toBe(false);
    expect(runner.commandLines()).toEqual(BASE_COMMANDS);
    expect(fs.readFileSync(path.join(workdir, 'config.json'), 'utf-8')).toBe('{"BOT_TOKEN":"test-secret"}');
  });

  it('installs LXD when it is missing', async () => {
    const runner = new RecordingRunner(command => (command === 'sh' ? { code: 1 } : undefined));
    const report = await installer(runner).run();

    expect(report.installedLxd).toBe(true);
    expect(runner.commandLines().slice(4, 7)).toEqual([
      'sh -c command -v lxd',
      'snap install lxd',
      'usermod -aG lxd botuser',
    ]);
  });

  it('records tolerant failures and keeps going', async () => {
    const runner = new RecordingRunner((command, args) =>
      command === 'lxd' && args[0] === 'init' ? { code: 1, stderr: 'already initialized\n' } : undefined
    );
    const report = await installer(runner).run();

    expect(report.warnings).toEqual(['lxd init --auto failed (ignored): already initialized']);
    expect(report.createdService).toBe(true);
  });

  it('aborts on the first required step that fails', async () => {
    const runner = new RecordingRunner((command, args) =>
      command === 'apt' && args[0] === 'install' ? { code: 100, stderr: 'E: Unable to locate package' } : undefined
    );

    const error = await installer(runner).run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InstallerError);
    if (error instanceof InstallerError) {
      expect(error.message).toBe(
        'install prerequisites: apt install -y snapd git curl jq npm failed: E: Unable to locate package'
      );
    }
    expect(runner.commandLines()).toEqual(BASE_COMMANDS.slice(0, 3));
    expect(fs.existsSync(path.join(workdir, 'config.json'))).toBe(false);
  });

  it('warns instead of building when there is no package.json', async () => {
    fs.rmSync(path.join(workdir, 'package.json'));
    const runner = new RecordingRunner();
    const report = await installer(runner).run();

    expect(runner.commandLines()).not.toContain('npm install');
    expect(report.warnings).toEqual([`No package.json in ${workdir}; skipping dependency install`]);
  });

  it('uses sudo for system commands and writes the unit through tee', async () => {
    const runner = new RecordingRunner();
    await installer(runner, { sudo: true }).run();

    const servicePath = path.join(unitDir, 'lxc-vps-bot.service');
    expect(runner.commandLines()).toEqual([
      'sudo apt update -y',
      'sudo apt upgrade -y',
      'sudo apt install -y snapd git curl jq npm',
      'sudo systemctl enable --now snapd.socket',
      'sh -c command -v lxd',
      'sudo lxd init --auto',
      'npm install',
      'npm run build',
      `sudo tee ${servicePath}`,
      'sudo systemctl daemon-reload',
      'sudo systemctl enable --now lxc-vps-bot.service',
    ]);

    const tee = runner.calls.find(call => call.args[0] === 'tee');
    expect(tee?.options?.input).toContain('ExecStart=/usr/bin/node ');
    expect(fs.existsSync(servicePath)).toBe(false);
  });
});
