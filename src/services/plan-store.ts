import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, VpsError } from '../errors';
import { Plan, PlanCatalog } from '../types';

const planSchema = z.object({
  name: z.string(),
  ram_mb: z.number().int().positive(),
  cpu: z.number().int().positive(),
  disk_gb: z.number().int().positive(),
  price: z.number().int().nonnegative(),
});

export const planCatalogSchema = z.record(planSchema);

export type PlanUpdate = Pick<Plan, 'ram_mb' | 'cpu' | 'disk_gb'>;

export class PlanStore {
  private plansPath: string;
  private plans: PlanCatalog = {};

  constructor(plansPath: string) {
    this.plansPath = plansPath;
  }

  load(): PlanCatalog {
    if (!fs.existsSync(this.plansPath)) {
      throw new ConfigError(`Missing plans.json at ${this.plansPath} - run the installer to create the default catalog`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.plansPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`plans.json at ${this.plansPath} is not valid JSON`, error);
    }

    const parsed = planCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid plans.json: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`, parsed.error);
    }

    // Plan ids are matched case-insensitively, so keys are normalised here.
    this.plans = Object.fromEntries(
      Object.entries(parsed.data).map(([key, plan]) => [key.toLowerCase(), plan])
    );
    return this.plans;
  }

  list(): Array<[string, Plan]> {
    return Object.entries(this.plans);
  }

  get(planId: string): Plan | undefined {
    const key = planId.toLowerCase();
    return Object.prototype.hasOwnProperty.call(this.plans, key) ? this.plans[key] : undefined;
  }

  update(planId: string, update: PlanUpdate): Plan {
    const key = planId.toLowerCase();
    const current = this.get(key);
    if (!current) {
      throw new VpsError('UNKNOWN_PLAN', 'Plan not found.');
    }

    const updated: Plan = { ...current, ...update };
    if (!planSchema.safeParse(updated).success) {
      throw new VpsError('INVALID_AMOUNT', 'Plan resources must be positive whole numbers.');
    }
    this.plans[key] = updated;
    this.save();
    return updated;
  }

  private save(): void {
    const dir = path.dirname(this.plansPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(this.plansPath, JSON.stringify(this.plans, null, 2));
  }
}
