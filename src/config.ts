import fs from 'fs';
import path from 'path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { PlanCatalog } from './types';

export const CONFIG_FILE = 'config.json';
export const PLANS_FILE = 'plans.json';
export const DATABASE_FILE = 'bot_data.db';

export const DEFAULT_LXC_PATH = '/usr/bin/lxc';
export const DEFAULT_IMAGE = 'images:ubuntu/22.04';
export const DEFAULT_PROFILE = 'default';

// Templates written by the installer when the files are missing.
export const DEFAULT_CONFIG_FILE = {
  BOT_TOKEN: 'YOUR_BOT_TOKEN_HERE',
  ADMIN_ROLE_ID: 'YOUR_ADMIN_ROLE_ID_HERE',
  LXC_PATH: DEFAULT_LXC_PATH,
  FAKE_MODE_IF_NO_LXC: false,
};

export const DEFAULT_PLANS: PlanCatalog = {
  basic: { name: 'Basic', ram_mb: 512, cpu: 1, disk_gb: 10, price: 1 },
  small: { name: 'Small', ram_mb: 1024, cpu: 1, disk_gb: 20, price: 2 },
  medium: { name: 'Medium', ram_mb: 2048, cpu: 2, disk_gb: 40, price: 4 },
  large: { name: 'Large', ram_mb: 4096, cpu: 4, disk_gb: 80, price: 8 },
};

export const configFileSchema = z.object({
  BOT_TOKEN: z.string().optional(),
  // Snowflakes exceed 2^53, so a JSON number would already be rounded.
  ADMIN_ROLE_ID: z
    .string({ invalid_type_error: 'ADMIN_ROLE_ID must be a quoted string, e.g. "123456789012345678"' })
    .optional(),
  LXC_PATH: z.string().optional(),
  FAKE_MODE_IF_NO_LXC: z.boolean().optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface Config {
  dataDir: string;
  discord: {
    token: string;
    adminRoleId: string;
    guildId?: string;
    statusChannelId?: string;
  };
  lxc: {
    path: string;
    fakeModeIfNoLxc: boolean;
    image: string;
    profile: string;
    commandTimeout: number;
  };
  monitoring: {
    checkInterval: number;
    verbose: boolean;
  };
  paths: {
    config: string;
    plans: string;
    database: string;
  };
}

export interface LoadConfigOptions {
  dataDir?: string;
  env?: NodeJS.ProcessEnv;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

function parseSeconds(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return (Number.isFinite(parsed) && parsed > 0 ? parsed : fallback) * 1000;
}

function readConfigFile(filePath: string): ConfigFile {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Missing ${CONFIG_FILE} at ${filePath}. Create it and add BOT_TOKEN + ADMIN_ROLE_ID.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`${CONFIG_FILE} at ${filePath} is not valid JSON`, error);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([field, messages]) => (messages && messages.length > 0 ? `${field} (${messages.join('; ')})` : field))
      .join(', ');
    throw new ConfigError(`Invalid ${CONFIG_FILE}: check ${fields}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Builds the runtime configuration from config.json, with environment
 * variables (and .env) taking precedence over the file.
 */
export function getConfig(options: LoadConfigOptions = {}): Config {
  if (!options.env) {
    loadEnv();
  }
  const env = options.env ?? process.env;
  const dataDir = path.resolve(options.dataDir ?? env.DATA_DIR ?? process.cwd());
  const configPath = path.join(dataDir, CONFIG_FILE);
  const file = readConfigFile(configPath);

  const token = env.BOT_TOKEN || file.BOT_TOKEN || '';
  if (!token) {
    throw new ConfigError(`BOT_TOKEN missing in ${CONFIG_FILE}`);
  }

  return {
    dataDir,
    discord: {
      token,
      adminRoleId: env.ADMIN_ROLE_ID || file.ADMIN_ROLE_ID || '',
      ...(env.GUILD_ID ? { guildId: env.GUILD_ID } : {}),
      ...(env.STATUS_CHANNEL_ID ? { statusChannelId: env.STATUS_CHANNEL_ID } : {}),
    },
    lxc: {
      path: env.LXC_PATH || file.LXC_PATH || DEFAULT_LXC_PATH,
      fakeModeIfNoLxc: parseBoolean(env.FAKE_MODE_IF_NO_LXC) ?? file.FAKE_MODE_IF_NO_LXC ?? false,
      image: env.DEFAULT_IMAGE || DEFAULT_IMAGE,
      profile: env.DEFAULT_PROFILE || DEFAULT_PROFILE,
      commandTimeout: parseSeconds(env.LXC_TIMEOUT, 300),
    },
    monitoring: {
      checkInterval: parseSeconds(env.CHECK_INTERVAL, 300),
      verbose: env.VERBOSE === 'true',
    },
    paths: {
      config: configPath,
      plans: path.join(dataDir, PLANS_FILE),
      database: path.join(dataDir, DATABASE_FILE),
    },
  };
}
