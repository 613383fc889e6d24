/**
 * Environment configuration
 *
 * Reads process.env once (after dotenv has loaded .env) and validates it.
 * Startup aborts with every offending variable listed rather than failing
 * later on the first request.
 */

import { z } from 'zod';

const optionalString = z.string().trim().min(1).optional();

const envSchema = z.object({
  JIRA_BASE_URL: z.string().url().optional(),
  JIRA_CLOUD_ID: optionalString,
  JIRA_SITE_NAME: optionalString,
  JIRA_EMAIL: optionalString,
  JIRA_API_TOKEN: optionalString,
  JIRA_ACCESS_TOKEN: optionalString,
  CATALOGUE_PATH: optionalString,
  OPENAPI_PATH: optionalString,
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  PORT: z.coerce.number().int().positive().default(3000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  DEFAULT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  DEFAULT_MAX_WAIT_MS: z.coerce.number().int().positive().default(60_000),
}).superRefine((env, ctx) => {
  const hasApiToken = Boolean(env.JIRA_EMAIL && env.JIRA_API_TOKEN);
  if (!hasApiToken && !env.JIRA_ACCESS_TOKEN) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JIRA_API_TOKEN'],
      message: 'set JIRA_EMAIL and JIRA_API_TOKEN, or JIRA_ACCESS_TOKEN',
    });
  }
  if (Boolean(env.JIRA_EMAIL) !== Boolean(env.JIRA_API_TOKEN)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [env.JIRA_EMAIL ? 'JIRA_API_TOKEN' : 'JIRA_EMAIL'],
      message: 'JIRA_EMAIL and JIRA_API_TOKEN must be set together',
    });
  }
  if (!env.JIRA_BASE_URL && !env.JIRA_CLOUD_ID && !env.JIRA_SITE_NAME) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JIRA_BASE_URL'],
      message: 'set JIRA_BASE_URL, JIRA_CLOUD_ID or JIRA_SITE_NAME',
    });
  }
  if (env.CATALOGUE_PATH && env.OPENAPI_PATH) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['OPENAPI_PATH'],
      message: 'CATALOGUE_PATH and OPENAPI_PATH are mutually exclusive',
    });
  }
});

export type ServerConfig = z.output<typeof envSchema>;

export class ConfigurationError extends Error {
  constructor(readonly problems: readonly string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    Error.captureStackTrace(this, ConfigurationError);
  }
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Treat empty strings from .env files as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => `${issue.path.join('.') || '(env)'}: ${issue.message}`));
  }
  return parsed.data;
}
