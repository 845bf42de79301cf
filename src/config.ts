import * as fs from 'fs';
import * as path from 'path';
import chokidar from 'chokidar';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { gigabytesToBytes } from './utils/format.js';
import type { MonitoredDirectory, SchedulingPolicy } from './types/queue.js';

export interface DownloaderConfig {
  id: string;
  url: string;
  username: string;
  password: string;
  tag: string | null;              // Only manage torrents carrying this tag
  maxActive: number;
  directories: MonitoredDirectory[];
}

export interface Config {
  port: number;
  host: string;
  dataPath: string;
  tickIntervalSeconds: number;
  commandTimeoutMs: number;
  maxActiveBytes: number | null;   // Summed remaining bytes of active items, null = unlimited
  ignoreCase: boolean;             // Path matching
  webhookUrl: string | null;
  policy: SchedulingPolicy;
  downloaders: DownloaderConfig[];
}

export const CONFIG_PATH = process.env.CONFIG_PATH || '/config/config.json';

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

const absolutePath = z
  .string()
  .trim()
  .min(1)
  .refine((value) => path.isAbsolute(value), { message: 'must be an absolute path' });

const directorySchema = z.object({
  path: absolutePath,
  lowWatermarkGb: z.coerce.number().positive().optional(),
});

const downloaderSchema = z.object({
  id: z.string().trim().min(1),
  url: z.string().trim().url(),
  username: z.string().default(''),
  password: z.string().default(''),
  tag: z.string().trim().min(1).nullish(),
  maxActive: z.coerce.number().int().positive().optional(),
  directories: z.array(directorySchema).min(1).optional(),
});

const configSchema = z
  .object({
    port: z.coerce.number().int().min(1).max(65535).default(8090),
    host: z.string().trim().min(1).default('0.0.0.0'),
    dataPath: z.string().trim().min(1).default('/data'),
    tickIntervalSeconds: z.coerce.number().int().positive().default(120),
    commandTimeoutMs: z.coerce.number().int().positive().default(10000),
    lowWatermarkGb: z.coerce.number().positive().default(5),
    maxActive: z.coerce.number().int().positive().default(5),
    maxActiveGb: z.coerce.number().positive().nullish(),
    deadlockCycles: z.coerce.number().int().positive().default(2),
    victimOrder: z.enum(['largest-remaining', 'newest-first']).default('largest-remaining'),
    releaseOrder: z.enum(['oldest-paused', 'smallest-first']).default('oldest-paused'),
    smartSkip: booleanish.default(true),
    ignoreCase: booleanish.default(true),
    webhookUrl: z.string().trim().url().nullish(),
    directories: z.array(directorySchema).default([]),
    downloaders: z.array(downloaderSchema).min(1, 'at least one downloader is required'),
  })
  .superRefine((raw, ctx) => {
    const seen = new Set<string>();
    raw.downloaders.forEach((downloader, index) => {
      if (seen.has(downloader.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['downloaders', index, 'id'],
          message: `duplicate downloader id "${downloader.id}"`,
        });
      }
      seen.add(downloader.id);

      if (!downloader.directories && raw.directories.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['downloaders', index, 'directories'],
          message: 'no monitored directories (set them on the downloader or globally)',
        });
      }
    });
  });

type RawConfig = z.infer<typeof configSchema>;

/**
 * Defaults taken from environment variables. A single downloader can be
 * described entirely through QB_* variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {
    port: env.PORT,
    host: env.HOST,
    dataPath: env.DATA_PATH,
    tickIntervalSeconds: env.TICK_INTERVAL_SECONDS,
    commandTimeoutMs: env.COMMAND_TIMEOUT_MS,
    lowWatermarkGb: env.LOW_WATERMARK_GB,
    maxActive: env.MAX_ACTIVE,
    maxActiveGb: env.MAX_ACTIVE_GB,
    deadlockCycles: env.DEADLOCK_CYCLES,
    victimOrder: env.VICTIM_ORDER,
    releaseOrder: env.RELEASE_ORDER,
    smartSkip: env.SMART_SKIP,
    ignoreCase: env.IGNORE_CASE,
    webhookUrl: env.WEBHOOK_URL,
  };

  if (env.MONITORED_DIRS) {
    values.directories = env.MONITORED_DIRS.split(',')
      .map((dir) => dir.trim())
      .filter((dir) => dir.length > 0)
      .map((dir) => ({ path: dir }));
  }

  if (env.QB_URL) {
    values.downloaders = [{
      id: env.QB_ID || 'qbittorrent',
      url: env.QB_URL,
      username: env.QB_USERNAME || 'admin',
      password: env.QB_PASSWORD || '',
      tag: env.QB_TAG || null,
    }];
  }

  // Unset variables must not shadow schema defaults
  for (const key of Object.keys(values)) {
    if (values[key] === undefined || values[key] === '') {
      delete values[key];
    }
  }
  return values;
}

function resolveDirectories(
  directories: RawConfig['directories'],
  defaultWatermarkGb: number,
): MonitoredDirectory[] {
  return directories.map((dir) => ({
    path: dir.path,
    lowWatermark: gigabytesToBytes(dir.lowWatermarkGb ?? defaultWatermarkGb),
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const details = error.issues.map((issue) => {
    const field = issue.path.join('.') || '(root)';
    return `${field}: ${issue.message}`;
  });
  const field = error.issues[0]?.path.join('.') || '(root)';
  return new ConfigurationError(`Invalid configuration: ${details.join('; ')}`, field);
}

/**
 * Validate a configuration object (file values merged over env defaults)
 * into the typed Config. Throws ConfigurationError.
 */
export function parseConfig(fileValues: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  let fileObject: Record<string, unknown> = {};
  if (fileValues !== undefined) {
    if (!isRecord(fileValues)) {
      throw new ConfigurationError('Configuration file must contain a JSON object', '(root)');
    }
    fileObject = fileValues;
  }

  const result = configSchema.safeParse({ ...configFromEnv(env), ...fileObject });
  if (!result.success) {
    throw toConfigurationError(result.error);
  }

  const raw = result.data;
  return {
    port: raw.port,
    host: raw.host,
    dataPath: raw.dataPath,
    tickIntervalSeconds: raw.tickIntervalSeconds,
    commandTimeoutMs: raw.commandTimeoutMs,
    maxActiveBytes: raw.maxActiveGb ? gigabytesToBytes(raw.maxActiveGb) : null,
    ignoreCase: raw.ignoreCase,
    webhookUrl: raw.webhookUrl ?? null,
    policy: {
      victimOrder: raw.victimOrder,
      releaseOrder: raw.releaseOrder,
      smartSkip: raw.smartSkip,
      deadlockCycles: raw.deadlockCycles,
    },
    downloaders: raw.downloaders.map((downloader) => ({
      id: downloader.id,
      url: downloader.url.replace(/\/+$/, ''),
      username: downloader.username,
      password: downloader.password,
      tag: downloader.tag ?? null,
      maxActive: downloader.maxActive ?? raw.maxActive,
      directories: resolveDirectories(downloader.directories ?? raw.directories, raw.lowWatermarkGb),
    })),
  };
}

let currentConfig: Config | null = null;

export function loadConfig(configPath: string = CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Config {
  let fileValues: unknown;
  if (fs.existsSync(configPath)) {
    try {
      fileValues = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read ${configPath}: ${String(error)}`, '(file)');
    }
    console.log('[Config] Loaded from file:', configPath);
  } else {
    console.log('[Config] Using defaults/environment variables');
  }

  currentConfig = parseConfig(fileValues, env);
  return currentConfig;
}

export function getConfig(): Config {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}

/**
 * Reload the configuration whenever the file changes. An invalid file is
 * reported and the previous configuration stays in effect.
 */
export function watchConfig(
  onChange: (config: Config) => void,
  configPath: string = CONFIG_PATH,
): () => Promise<void> {
  const watcher = chokidar.watch(configPath, {
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 1000,
      pollInterval: 100,
    },
  });

  const reload = (): void => {
    try {
      const config = loadConfig(configPath);
      console.log('[Config] Reloaded after file change');
      onChange(config);
    } catch (error) {
      console.error('[Config] Ignoring invalid configuration change:', error instanceof Error ? error.message : error);
    }
  };

  watcher.on('add', reload);
  watcher.on('change', reload);
  watcher.on('error', (error) => {
    console.error('[Config] Watcher error:', error);
  });

  return () => watcher.close();
}
