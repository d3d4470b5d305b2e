export interface ServiceStatus {
  status: 'online' | 'offline' | 'error';
  lastCheck: Date;
  responseTime?: number;
  version?: string;
  error?: string;
}

export interface BackendStatus extends ServiceStatus {
  mode: 'lxc' | 'fake';
  containerCount?: number;
}

export interface DatabaseStatus extends ServiceStatus {
  users: number;
  vpsCount: number;
}

export interface HealthStatus {
  backend: BackendStatus;
  database: DatabaseStatus;
  lastUpdated: Date;
}

export interface Plan {
  name: string;
  ram_mb: number;
  cpu: number;
  disk_gb: number;
  price: number;
}

export type PlanCatalog = Record<string, Plan>;

export type VpsStatus = 'running' | 'stopped' | 'unknown';

export interface VpsRecord {
  id: number;
  userId: string;
  containerName: string;
  plan: string;
  ramMb: number;
  cpuCores: number;
  arch: string;
  status: VpsStatus;
  createdAt: string;
}

export type NewVpsRecord = Omit<VpsRecord, 'id' | 'status' | 'createdAt'>;

export const CONTAINER_ACTIONS = ['start', 'stop', 'restart', 'info'] as const;
export type ContainerAction = (typeof CONTAINER_ACTIONS)[number];
export type ManageAction = ContainerAction | 'delete';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface ContainerSummary {
  name: string;
  status: string;
}

export interface OperationResult {
  ok: boolean;
  message: string;
}
