import { BotDatabase } from './database';
import { LxcClient, isContainerAction } from './lxc-client';
import { PlanStore } from './plan-store';
import { InsufficientCreditsError, VpsError } from '../errors';
import { ContainerAction, Plan, VpsRecord, VpsStatus } from '../types';
import { containerName } from '../utils/naming';

export const INFO_OUTPUT_LIMIT = 1900;
export const CUSTOM_PLAN = 'custom';
export const DEFAULT_ARCH = 'intel';

export interface ProvisionResult {
  vps: VpsRecord;
  cost: number;
}

export type ManageResult =
  | { action: 'delete'; vps: VpsRecord }
  | { action: ContainerAction; vps: VpsRecord; output: string };

export interface ReconcileSummary {
  checked: number;
  changed: number;
}

const STATUS_AFTER_ACTION: Partial<Record<ContainerAction, VpsStatus>> = {
  start: 'running',
  restart: 'running',
  stop: 'stopped',
};

export interface VpsServiceOptions {
  now?: () => Date;
}

/**
 * Credits, plans and container lifecycle. Every failure surfaces as a VpsError.
 */
export class VpsService {
  private now: () => Date;

  constructor(
    private db: BotDatabase,
    private plans: PlanStore,
    private lxc: LxcClient,
    options: VpsServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  listPlans(): Array<[string, Plan]> {
    return this.plans.list();
  }

  getCredits(userId: string): number {
    return this.db.getCredits(userId);
  }

  listUserVps(userId: string): VpsRecord[] {
    return this.db.listVpsByUser(userId);
  }

  listAllVps(): VpsRecord[] {
    return this.db.listAllVps();
  }

  private requirePlan(planId: string): Plan {
    const plan = this.plans.get(planId);
    if (!plan) {
      throw new VpsError('UNKNOWN_PLAN', 'Unknown plan. Use `/plans` to see available plans.');
    }
    return plan;
  }

  private async provision(
    userId: string,
    planKey: string,
    ramMb: number,
    cpuCores: number,
    arch: string
  ): Promise<VpsRecord> {
    const name = containerName(userId, planKey, this.now());
    const created = await this.lxc.createContainer(name, { ramMb, cpuCores });
    if (!created.ok) {
      throw new VpsError('CONTAINER_FAILED', `Failed to create container: ${created.message}`);
    }

    const id = this.db.createVps(
      { userId, containerName: name, plan: planKey, ramMb, cpuCores, arch },
      this.now()
    );
    const vps = this.db.getVps(id);
    if (!vps) {
      throw new VpsError('NOT_FOUND', `VPS ${id} disappeared after creation.`);
    }
    return vps;
  }

  /**
   * Buys a plan with credits. The price is reserved before the container is
   * launched and refunded if the launch fails.
   */
  async purchase(userId: string, planId: string, arch: string = DEFAULT_ARCH): Promise<ProvisionResult> {
    const key = planId.toLowerCase();
    const plan = this.requirePlan(key);
    if (plan.price > 0 && !this.db.reserveCredits(userId, plan.price)) {
      throw new InsufficientCreditsError(plan.price, this.db.getCredits(userId));
    }

    try {
      const vps = await this.provision(userId, key, plan.ram_mb, plan.cpu, arch.toLowerCase());
      return { vps, cost: plan.price };
    } catch (error) {
      if (plan.price > 0) {
        this.db.addCredits(userId, plan.price);
      }
      throw error;
    }
  }

  async adminCreate(userId: string, ramMb: number, cpuCores: number): Promise<VpsRecord> {
    return this.provision(userId, CUSTOM_PLAN, ramMb, cpuCores, DEFAULT_ARCH);
  }

  async givePlan(userId: string, planId: string): Promise<VpsRecord> {
    const key = planId.toLowerCase();
    const plan = this.requirePlan(key);
    return this.provision(userId, key, plan.ram_mb, plan.cpu, DEFAULT_ARCH);
  }

  private async destroy(vps: VpsRecord): Promise<void> {
    const deleted = await this.lxc.deleteContainer(vps.containerName);
    if (!deleted.ok) {
      throw new VpsError('CONTAINER_FAILED', `Failed to delete: ${deleted.message}`);
    }
    this.db.deleteVps(vps.id);
  }

  async manage(actorId: string, isAdmin: boolean, action: string, vpsId: number): Promise<ManageResult> {
    const vps = this.db.getVps(vpsId);
    if (!vps) {
      throw new VpsError('NOT_FOUND', 'VPS not found.');
    }
    if (vps.userId !== actorId && !isAdmin) {
      throw new VpsError('FORBIDDEN', "You don't own this VPS.");
    }

    const normalized = action.toLowerCase();
    if (normalized === 'delete') {
      await this.destroy(vps);
      return { action: 'delete', vps };
    }
    if (!isContainerAction(normalized)) {
      throw new VpsError('INVALID_ACTION', 'Invalid action. Use start|stop|restart|delete|info');
    }

    const result = await this.lxc.runAction(vps.containerName, normalized);
    if (!result.ok) {
      throw new VpsError('CONTAINER_FAILED', `Action failed: ${result.message}`);
    }

    const nextStatus = STATUS_AFTER_ACTION[normalized];
    if (nextStatus) {
      this.db.updateVpsStatus(vps.id, nextStatus);
    }

    return {
      action: normalized,
      vps: { ...vps, status: nextStatus ?? vps.status },
      output: normalized === 'info' ? result.message.slice(0, INFO_OUTPUT_LIMIT) : result.message,
    };
  }

  async adminDelete(userId: string, vpsId: number): Promise<VpsRecord> {
    const vps = this.db.getVps(vpsId);
    if (!vps || vps.userId !== userId) {
      throw new VpsError('NOT_FOUND', 'VPS not found for that user/id.');
    }
    await this.destroy(vps);
    return vps;
  }

  addCredits(userId: string, amount: number): number {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new VpsError('INVALID_AMOUNT', 'Invalid amount');
    }
    return this.db.addCredits(userId, amount);
  }

  /** `amount` is a whole number or the literal "all". Returns the new balance. */
  removeCredits(userId: string, amount: string): number {
    const trimmed = amount.trim().toLowerCase();
    if (trimmed === 'all') {
      this.db.clearCredits(userId);
      return 0;
    }
    if (!/^\d+$/.test(trimmed)) {
      throw new VpsError('INVALID_AMOUNT', 'Invalid amount');
    }
    this.db.removeCredits(userId, parseInt(trimmed, 10));
    return this.db.getCredits(userId);
  }

  editPlan(planId: string, ramMb: number, cpu: number, diskGb: number): Plan {
    return this.plans.update(planId, { ram_mb: ramMb, cpu, disk_gb: diskGb });
  }

  /**
   * Syncs recorded statuses with the hypervisor. Skipped in simulated mode,
   * where there is nothing to list.
   */
  async reconcile(): Promise<ReconcileSummary> {
    if (this.lxc.fake) {
      return { checked: 0, changed: 0 };
    }

    const containers = await this.lxc.listContainers();
    const states = new Map(containers.map(c => [c.name, c.status.toLowerCase()]));
    const records = this.db.listAllVps();
    let changed = 0;

    for (const vps of records) {
      const state = states.get(vps.containerName);
      const status: VpsStatus = state === 'running' ? 'running' : state === 'stopped' ? 'stopped' : 'unknown';
      if (status !== vps.status) {
        this.db.updateVpsStatus(vps.id, status);
        changed++;
      }
    }

    return { checked: records.length, changed };
  }
}
