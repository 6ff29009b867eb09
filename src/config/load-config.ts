import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { validateEnvironment, validateRepositories, ConfigIssue } from './validate-config';

export interface DispatchSettings {
  batchSize: number;
  sendDelayMs: number;
  batchDelayMs: number;
  maxAttempts: number;
  queueCapacity: number;
}

export interface HealthSettings {
  queueThreshold: number;
  wedgeTimeoutMs: number;
}

export interface AppConfig {
  telegramBotToken: string;
  telegramChatId: string;
  webhookSecret: string;
  databaseUrl: string;
  repositories: string[];
  port: number;
  host: string;
  logLevel: string;
  dispatch: DispatchSettings;
  health: HealthSettings;
  shutdownGraceMs: number;
  /** Optional token for refreshing issue details from the GitHub API */
  githubToken?: string;
}

export const DEFAULT_REPOSITORIES_FILE = path.join('config', 'repositories.yaml');

export class ConfigError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(
      `Invalid configuration:\n${issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')}`
    );
    this.name = 'ConfigError';
  }
}

/**
 * Parse a comma or newline separated repository list, dropping blanks and
 * duplicates while keeping first-seen order
 */
export function parseRepositoryList(raw: string): string[] {
  const entries = raw
    .split(/[,\n]/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return [...new Set(entries)];
}

/**
 * Load the monitored repository list from a YAML file.
 *
 * Accepts either a bare list or `{ repositories: [...] }`.
 */
export function loadRepositoriesFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError([{ path: 'REPOSITORIES_FILE', message: `File not found: ${filePath}` }]);
  }

  const parsed: unknown = yaml.parse(fs.readFileSync(filePath, 'utf8'));
  const list = Array.isArray(parsed)
    ? parsed
    : isRecord(parsed) && Array.isArray(parsed.repositories)
      ? parsed.repositories
      : null;

  if (!list) {
    throw new ConfigError([
      { path: 'REPOSITORIES_FILE', message: `Expected a list of repositories in ${filePath}` },
    ]);
  }

  const repositories = list.map((entry) => String(entry).trim()).filter((entry) => entry.length > 0);
  return [...new Set(repositories)];
}

/**
 * Build the application config from environment variables.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const envResult = validateEnvironment(env);
  if (!envResult.valid) {
    throw new ConfigError(envResult.errors);
  }

  let repositories: string[];
  let source: string;
  if (env.MONITORED_REPOSITORIES && env.MONITORED_REPOSITORIES.trim() !== '') {
    repositories = parseRepositoryList(env.MONITORED_REPOSITORIES);
    source = 'MONITORED_REPOSITORIES';
  } else {
    const file = path.resolve(cwd, env.REPOSITORIES_FILE || DEFAULT_REPOSITORIES_FILE);
    repositories = loadRepositoriesFile(file);
    source = 'REPOSITORIES_FILE';
  }

  const repoResult = validateRepositories(repositories, source);
  if (!repoResult.valid) {
    throw new ConfigError(repoResult.errors);
  }

  return {
    telegramBotToken: required(env, 'TELEGRAM_BOT_TOKEN'),
    telegramChatId: required(env, 'TELEGRAM_CHAT_ID'),
    webhookSecret: required(env, 'GITHUB_WEBHOOK_SECRET'),
    databaseUrl: required(env, 'DATABASE_URL'),
    repositories,
    port: intOr(env.PORT, 8080),
    host: env.HOST || '0.0.0.0',
    logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    dispatch: {
      batchSize: intOr(env.BATCH_SIZE, 3),
      sendDelayMs: intOr(env.SEND_DELAY_MS, 1000),
      batchDelayMs: intOr(env.BATCH_DELAY_MS, 2000),
      maxAttempts: intOr(env.DISPATCH_MAX_ATTEMPTS, 5),
      queueCapacity: intOr(env.DISPATCH_QUEUE_CAPACITY, 100),
    },
    health: {
      queueThreshold: intOr(env.HEALTH_QUEUE_THRESHOLD, 80),
      wedgeTimeoutMs: intOr(env.HEALTH_WEDGE_TIMEOUT_MS, 5 * 60 * 1000),
    },
    shutdownGraceMs: intOr(env.SHUTDOWN_GRACE_MS, 10_000),
    githubToken: env.GITHUB_TOKEN || undefined,
  };
}

function required(env: Record<string, string | undefined>, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError([{ path: name, message: `Missing required "${name}"` }]);
  }
  return value.trim();
}

function intOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  return parseInt(raw, 10);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
