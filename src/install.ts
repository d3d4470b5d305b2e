import os from 'os';
import path from 'path';
import { config as loadEnv } from 'dotenv';
import { Installer, DEFAULT_SERVICE_NAME } from './installer/installer';
import { ProcessRunner } from './services/command-runner';

async function main() {
  loadEnv();

  const installer = new Installer({
    workdir: path.resolve(process.env.WORKDIR || process.cwd()),
    user: process.env.SUDO_USER || process.env.USER || os.userInfo().username,
    nodeBin: process.env.NODE_BIN || process.execPath,
    serviceName: process.env.SERVICE_NAME || DEFAULT_SERVICE_NAME,
    runner: new ProcessRunner(process.env.VERBOSE === 'true'),
    sudo: typeof process.getuid === 'function' ? process.getuid() !== 0 : true,
  });

  const report = await installer.run();
  if (report.warnings.length > 0) {
    console.warn(`⚠️ Completed with ${report.warnings.length} ignored failure(s)`);
  }
}

main().catch((error) => {
  console.error('❌ Install failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
