import { VpsService, ReconcileSummary } from '../services/vps-service';

export type ReconcileListener = (summary: ReconcileSummary) => Promise<void> | void;

/**
 * Periodically reconciles recorded VPS states with the hypervisor. Each run
 * schedules the next one only after it finishes, so runs never overlap.
 */
export class StatusMonitor {
  private timeout?: NodeJS.Timeout;
  private running = false;

  constructor(
    private vpsService: VpsService,
    private interval: number,
    private onReconciled?: ReconcileListener,
    private verbose = false
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(0);
  }

  private schedule(delay: number): void {
    if (!this.running) return;
    this.timeout = setTimeout(() => {
      void this.tick().finally(() => this.schedule(this.interval));
    }, delay);
  }

  async tick(): Promise<ReconcileSummary | undefined> {
    try {
      const summary = await this.vpsService.reconcile();
      if (this.verbose || summary.changed > 0) {
        console.log(`🔄 Reconciled ${summary.checked} VPS record(s), ${summary.changed} status change(s)`);
      }
      if (this.onReconciled) {
        await this.onReconciled(summary);
      }
      return summary;
    } catch (error) {
      console.error('❌ Error reconciling VPS statuses:', error);
      return undefined;
    }
  }

  stopMonitoring(): void {
    this.running = false;
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = undefined;
    }
  }
}
