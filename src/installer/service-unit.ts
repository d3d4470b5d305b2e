import path from 'path';

export interface ServiceUnitOptions {
  description?: string;
  user: string;
  workdir: string;
  nodeBin: string;
  entry: string;
  restartSec?: number;
}

export function renderServiceUnit(options: ServiceUnitOptions): string {
  const entryPath = path.isAbsolute(options.entry) ? options.entry : path.join(options.workdir, options.entry);

  return [
    '[Unit]',
    `Description=${options.description ?? 'LXC VPS Discord Bot'}`,
    'After=network.target',
    '',
    '[Service]',
    'Type=simple',
    `User=${options.user}`,
    `WorkingDirectory=${options.workdir}`,
    'Environment=NODE_ENV=production',
    `ExecStart=${options.nodeBin} ${entryPath}`,
    'Restart=always',
    `RestartSec=${options.restartSec ?? 5}`,
    '',
    '[Install]',
    'WantedBy=multi-user.target',
    '',
  ].join('\n');
}
