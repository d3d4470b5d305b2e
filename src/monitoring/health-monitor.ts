import { BotDatabase } from '../services/database';
import { LxcClient } from '../services/lxc-client';
import { BackendStatus, DatabaseStatus, HealthStatus } from '../types';

export class HealthMonitor {
  constructor(
    private lxc: LxcClient,
    private db: BotDatabase,
    private verbose = false
  ) {}

  async checkAllServices(): Promise<HealthStatus> {
    if (this.verbose) {
      console.log('🏥 Starting health check...');
    }

    const [backend, database] = await Promise.allSettled([
      this.checkBackend(),
      Promise.resolve().then(() => this.checkDatabase()),
    ]);

    const healthStatus: HealthStatus = {
      backend: backend.status === 'fulfilled'
        ? backend.value
        : {
            status: 'error',
            mode: this.lxc.fake ? 'fake' : 'lxc',
            lastCheck: new Date(),
            error: 'Health check failed',
          },
      database: database.status === 'fulfilled'
        ? database.value
        : { status: 'error', lastCheck: new Date(), users: 0, vpsCount: 0, error: 'Health check failed' },
      lastUpdated: new Date(),
    };

    if (this.verbose) {
      console.log(`- Backend (${healthStatus.backend.mode}): ${healthStatus.backend.status}`);
      console.log(`- Database: ${healthStatus.database.status}`);
    }

    return healthStatus;
  }

  private async checkBackend(): Promise<BackendStatus> {
    const status = await this.lxc.checkHealth();
    if (status.status !== 'online' || this.lxc.fake) {
      return status;
    }

    try {
      const containers = await this.lxc.listContainers();
      return { ...status, containerCount: containers.length };
    } catch (error) {
      console.error('⚠️ Failed to count containers:', error);
      return status;
    }
  }

  private checkDatabase(): DatabaseStatus {
    const startTime = Date.now();
    try {
      const users = this.db.countUsers();
      const vpsCount = this.db.listAllVps().length;
      return {
        status: 'online',
        lastCheck: new Date(),
        responseTime: Date.now() - startTime,
        users,
        vpsCount,
      };
    } catch (error) {
      return {
        status: 'error',
        lastCheck: new Date(),
        responseTime: Date.now() - startTime,
        users: 0,
        vpsCount: 0,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
