import { z } from 'zod';
import type { AgentKind } from '../types/index.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(8080),
  URL_PREFIX: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, 'must start with "/"')
    .default('/api')
    .transform((prefix) => prefix.replace(/\/+$/, '')),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  AGENT_SERVICE_URL: z.string().url().default('http://localhost:5010'),
  DEFECT_AGENT_ID: z.string().min(1).default('defect-agent'),
  DEFECT_AGENT_ALIAS_ID: z.string().min(1).default('live'),
  QUERY_AGENT_ID: z.string().min(1).default('query-agent'),
  QUERY_AGENT_ALIAS_ID: z.string().min(1).default('live'),
  QUERY_SERVICE_URL: z.string().url().default('http://localhost:5020'),
  CHART_RENDERER_URL: z.string().url().default('http://localhost:5030'),
  CHART_OUTPUT_DIR: z.string().min(1).default('charts'),

  AGENT_DEADLINE_MS: positiveInt(120_000),
  QUERY_TIMEOUT_MS: positiveInt(30_000),
  RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
  RATE_LIMIT_MAX_REQUESTS: positiveInt(30),
  CLIENT_RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().min(0).default(600),
  SESSION_IDLE_TIMEOUT_MS: positiveInt(30 * 60 * 1000),
  SWEEP_INTERVAL_MS: positiveInt(30 * 60 * 1000),
  SUMMARY_THRESHOLD: positiveInt(50),
  SUMMARY_PREVIEW_ROWS: positiveInt(10),
  SUMMARY_TTL_MS: positiveInt(60 * 60 * 1000),
  SHUTDOWN_TIMEOUT_MS: positiveInt(30_000),
  FORCE_EXIT_ON_SHUTDOWN: booleanFlag,
});

export interface AgentTarget {
  agentId: string;
  agentAliasId: string;
}

export interface GatewayConfig {
  port: number;
  urlPrefix: string;
  nodeEnv: 'development' | 'production' | 'test';
  agents: {
    serviceUrl: string;
    deadlineMs: number;
    targets: Record<AgentKind, AgentTarget>;
  };
  queryService: {
    url: string;
    timeoutMs: number;
  };
  charts: {
    rendererUrl: string;
    outputDir: string;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
    clientMaxRequests: number;
  };
  sessions: {
    idleTimeoutMs: number;
    sweepIntervalMs: number;
  };
  summaries: {
    threshold: number;
    previewRows: number;
    ttlMs: number;
  };
  shutdown: {
    timeoutMs: number;
    forceExit: boolean;
  };
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Build the gateway configuration from environment variables.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const input: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      input[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    urlPrefix: e.URL_PREFIX,
    nodeEnv: e.NODE_ENV,
    agents: {
      serviceUrl: e.AGENT_SERVICE_URL,
      deadlineMs: e.AGENT_DEADLINE_MS,
      targets: {
        defect: { agentId: e.DEFECT_AGENT_ID, agentAliasId: e.DEFECT_AGENT_ALIAS_ID },
        query: { agentId: e.QUERY_AGENT_ID, agentAliasId: e.QUERY_AGENT_ALIAS_ID },
      },
    },
    queryService: {
      url: e.QUERY_SERVICE_URL,
      timeoutMs: e.QUERY_TIMEOUT_MS,
    },
    charts: {
      rendererUrl: e.CHART_RENDERER_URL,
      outputDir: e.CHART_OUTPUT_DIR,
    },
    rateLimit: {
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      maxRequests: e.RATE_LIMIT_MAX_REQUESTS,
      clientMaxRequests: e.CLIENT_RATE_LIMIT_MAX_REQUESTS,
    },
    sessions: {
      idleTimeoutMs: e.SESSION_IDLE_TIMEOUT_MS,
      sweepIntervalMs: e.SWEEP_INTERVAL_MS,
    },
    summaries: {
      threshold: e.SUMMARY_THRESHOLD,
      previewRows: e.SUMMARY_PREVIEW_ROWS,
      ttlMs: e.SUMMARY_TTL_MS,
    },
    shutdown: {
      timeoutMs: e.SHUTDOWN_TIMEOUT_MS,
      forceExit: e.FORCE_EXIT_ON_SHUTDOWN,
    },
  };
}
