// Relay Config - Types, file/env loader and start-up validation

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { FatalConfigError, describeError } from './errors.js';
import type { MonitoredContact } from './types.js';

export interface EndpointConfig {
  url: string;
  accessToken?: string;
}

export interface RelayConfig {
  /** Numeric bot id reported as self_id and X-Self-ID. */
  selfId: string;
  contacts: MonitoredContact[];
  monitor: {
    enabled: boolean;
    pollIntervalMs: number;
    echoWindowMs: number;
    degradedAfterFailures: number;
  };
  surface: {
    command?: string;
    args: string[];
    requestTimeoutMs: number;
  };
  media: {
    cacheDir: string;
    fetchTimeoutMs: number;
  };
  transport: {
    enabled: boolean;
    endpoint: EndpointConfig;
    bufferCapacity: number;
    heartbeatIntervalMs: number;
    heartbeatTimeoutMs: number;
    ackActions: boolean;
    reconnect: {
      initialDelayMs: number;
      maxDelayMs: number;
      stabilityWindowMs: number;
    };
  };
  queues: {
    eventCapacity: number;
    inboundCapacity: number;
  };
  stopGraceMs: number;
  healthServer: {
    port: number | null;
  };
}

const NUMERIC_ID = /^\d+$/;

const contactSchema = z.object({
  nickname: z.string().min(1),
  userId: z.union([z.string(), z.number().int().nonnegative().safe()]).optional(),
});

// Every field is optional in the file; defaults and env fill the rest.
const fileSchema = z.object({
  selfId: z.union([z.string(), z.number().int().nonnegative().safe()]).optional(),
  contacts: z.array(z.union([z.string().min(1), contactSchema])).optional(),
  monitor: z
    .object({
      enabled: z.boolean().optional(),
      pollIntervalMs: z.number().int().positive().optional(),
      echoWindowMs: z.number().int().nonnegative().optional(),
      degradedAfterFailures: z.number().int().positive().optional(),
    })
    .optional(),
  surface: z
    .object({
      command: z.string().optional(),
      args: z.array(z.string()).optional(),
      requestTimeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
  media: z
    .object({
      cacheDir: z.string().optional(),
      fetchTimeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
  transport: z
    .object({
      enabled: z.boolean().optional(),
      url: z.string().optional(),
      accessToken: z.string().optional(),
      bufferCapacity: z.number().int().positive().optional(),
      heartbeatIntervalMs: z.number().int().positive().optional(),
      heartbeatTimeoutMs: z.number().int().positive().optional(),
      ackActions: z.boolean().optional(),
      reconnect: z
        .object({
          initialDelayMs: z.number().int().positive().optional(),
          maxDelayMs: z.number().int().positive().optional(),
          stabilityWindowMs: z.number().int().nonnegative().optional(),
        })
        .optional(),
    })
    .optional(),
  queues: z
    .object({
      eventCapacity: z.number().int().positive().optional(),
      inboundCapacity: z.number().int().positive().optional(),
    })
    .optional(),
  stopGraceMs: z.number().int().nonnegative().optional(),
  healthServer: z
    .object({
      port: z.number().int().nonnegative().nullable().optional(),
    })
    .optional(),
});

type FileConfig = z.infer<typeof fileSchema>;

export const DEFAULT_CONFIG: RelayConfig = {
  selfId: '10001000',
  contacts: [],
  monitor: {
    enabled: true,
    pollIntervalMs: 1_000,
    echoWindowMs: 30_000,
    degradedAfterFailures: 3,
  },
  surface: {
    args: [],
    requestTimeoutMs: 10_000,
  },
  media: {
    cacheDir: 'cache/media',
    fetchTimeoutMs: 30_000,
  },
  transport: {
    enabled: true,
    endpoint: { url: '' },
    bufferCapacity: 100,
    heartbeatIntervalMs: 15_000,
    heartbeatTimeoutMs: 45_000,
    ackActions: false,
    reconnect: {
      initialDelayMs: 1_000,
      maxDelayMs: 30_000,
      stabilityWindowMs: 10_000,
    },
  },
  queues: {
    eventCapacity: 500,
    inboundCapacity: 500,
  },
  stopGraceMs: 2_000,
  healthServer: {
    port: null,
  },
};

function readConfigFile(path: string, required: boolean): FileConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    // Config file is optional if everything needed comes from env
    if (required) {
      throw new FatalConfigError(`Failed to read config file ${path}: ${describeError(err)}`);
    }
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new FatalConfigError(`Config file ${path} is not valid JSON: ${describeError(err)}`);
  }

  const parsed = fileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new FatalConfigError(`Invalid config file ${path}: ${issues}`);
  }
  return parsed.data;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new FatalConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

export function toContact(entry: string | z.infer<typeof contactSchema>): MonitoredContact {
  if (typeof entry === 'string') return { nickname: entry };
  return entry.userId === undefined
    ? { nickname: entry.nickname }
    : { nickname: entry.nickname, userId: String(entry.userId) };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const path = configPath ?? env.RELAY_CONFIG ?? 'relay.config.json';
  const file = readConfigFile(path, configPath !== undefined);
  const d = DEFAULT_CONFIG;

  const surfaceArgs = env.SURFACE_ARGS !== undefined
    ? env.SURFACE_ARGS.split(' ').filter(Boolean)
    : file.surface?.args ?? d.surface.args;

  const config: RelayConfig = {
    selfId: env.ONEBOT_SELF_ID ?? (file.selfId !== undefined ? String(file.selfId) : d.selfId),
    contacts: (file.contacts ?? []).map(toContact),
    monitor: {
      enabled: envBoolean(env, 'MONITOR_ENABLED') ?? file.monitor?.enabled ?? d.monitor.enabled,
      pollIntervalMs: envNumber(env, 'MONITOR_POLL_INTERVAL_MS') ?? file.monitor?.pollIntervalMs ?? d.monitor.pollIntervalMs,
      echoWindowMs: file.monitor?.echoWindowMs ?? d.monitor.echoWindowMs,
      degradedAfterFailures: file.monitor?.degradedAfterFailures ?? d.monitor.degradedAfterFailures,
    },
    surface: {
      command: env.SURFACE_COMMAND ?? file.surface?.command,
      args: surfaceArgs,
      requestTimeoutMs: file.surface?.requestTimeoutMs ?? d.surface.requestTimeoutMs,
    },
    media: {
      cacheDir: env.MEDIA_CACHE_DIR ?? file.media?.cacheDir ?? d.media.cacheDir,
      fetchTimeoutMs: file.media?.fetchTimeoutMs ?? d.media.fetchTimeoutMs,
    },
    transport: {
      enabled: envBoolean(env, 'TRANSPORT_ENABLED') ?? file.transport?.enabled ?? d.transport.enabled,
      endpoint: {
        url: env.ONEBOT_WS_URL ?? file.transport?.url ?? d.transport.endpoint.url,
        accessToken: env.ONEBOT_ACCESS_TOKEN ?? file.transport?.accessToken,
      },
      bufferCapacity: file.transport?.bufferCapacity ?? d.transport.bufferCapacity,
      heartbeatIntervalMs: file.transport?.heartbeatIntervalMs ?? d.transport.heartbeatIntervalMs,
      heartbeatTimeoutMs: file.transport?.heartbeatTimeoutMs ?? d.transport.heartbeatTimeoutMs,
      ackActions: envBoolean(env, 'ONEBOT_ACK_ACTIONS') ?? file.transport?.ackActions ?? d.transport.ackActions,
      reconnect: {
        initialDelayMs: file.transport?.reconnect?.initialDelayMs ?? d.transport.reconnect.initialDelayMs,
        maxDelayMs: file.transport?.reconnect?.maxDelayMs ?? d.transport.reconnect.maxDelayMs,
        stabilityWindowMs: file.transport?.reconnect?.stabilityWindowMs ?? d.transport.reconnect.stabilityWindowMs,
      },
    },
    queues: {
      eventCapacity: file.queues?.eventCapacity ?? d.queues.eventCapacity,
      inboundCapacity: file.queues?.inboundCapacity ?? d.queues.inboundCapacity,
    },
    stopGraceMs: file.stopGraceMs ?? d.stopGraceMs,
    healthServer: {
      port: envNumber(env, 'HEALTH_PORT') ?? file.healthServer?.port ?? d.healthServer.port,
    },
  };

  return config;
}

/** Checks what start() cannot run without. */
export function validateConfig(config: RelayConfig): void {
  if (!NUMERIC_ID.test(config.selfId)) {
    throw new FatalConfigError(`selfId must be numeric, got "${config.selfId}"`);
  }
  if (config.transport.enabled && !config.transport.endpoint.url) {
    throw new FatalConfigError('Remote endpoint is required (ONEBOT_WS_URL env or transport.url in config)');
  }
  if (config.transport.enabled && !/^wss?:\/\//.test(config.transport.endpoint.url)) {
    throw new FatalConfigError(`Remote endpoint must be a ws:// or wss:// URL, got "${config.transport.endpoint.url}"`);
  }
  if (config.transport.reconnect.maxDelayMs < config.transport.reconnect.initialDelayMs) {
    throw new FatalConfigError('transport.reconnect.maxDelayMs must not be below initialDelayMs');
  }
}

export function isNumericId(value: string): boolean {
  return NUMERIC_ID.test(value);
}
