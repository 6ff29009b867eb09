/**
 * Validates the environment-sourced notifier configuration
 */

export interface ConfigIssue {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigIssue[];
}

const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const REQUIRED_VARS = [
  'TELEGRAM_BOT_TOKEN',
  'TELEGRAM_CHAT_ID',
  'GITHUB_WEBHOOK_SECRET',
  'DATABASE_URL',
] as const;

/**
 * Variables that must parse as non-negative integers when present.
 * Positive-only ones are listed separately below.
 */
const INTEGER_VARS = [
  'PORT',
  'BATCH_SIZE',
  'SEND_DELAY_MS',
  'BATCH_DELAY_MS',
  'DISPATCH_MAX_ATTEMPTS',
  'DISPATCH_QUEUE_CAPACITY',
  'HEALTH_QUEUE_THRESHOLD',
  'HEALTH_WEDGE_TIMEOUT_MS',
  'SHUTDOWN_GRACE_MS',
] as const;

const POSITIVE_VARS = new Set<string>([
  'BATCH_SIZE',
  'DISPATCH_MAX_ATTEMPTS',
  'DISPATCH_QUEUE_CAPACITY',
  'HEALTH_QUEUE_THRESHOLD',
]);

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Validate raw environment values
 */
export function validateEnvironment(env: Record<string, string | undefined>): ValidationResult {
  const errors: ConfigIssue[] = [];

  for (const name of REQUIRED_VARS) {
    if (!env[name] || env[name]?.trim() === '') {
      errors.push({ path: name, message: `Missing required "${name}"` });
    }
  }

  for (const name of INTEGER_VARS) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;

    if (!/^\d+$/.test(raw.trim())) {
      errors.push({ path: name, message: `Invalid "${name}" (must be a non-negative integer, got "${raw}")` });
      continue;
    }
    if (POSITIVE_VARS.has(name) && parseInt(raw, 10) === 0) {
      errors.push({ path: name, message: `Invalid "${name}" (must be greater than 0)` });
    }
  }

  const logLevel = env.LOG_LEVEL;
  if (logLevel && !LOG_LEVELS.includes(logLevel.toLowerCase())) {
    errors.push({
      path: 'LOG_LEVEL',
      message: `Invalid log level "${logLevel}". Must be one of: ${LOG_LEVELS.join(', ')}`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate a monitored repository list
 */
export function validateRepositories(repositories: string[], source: string): ValidationResult {
  const errors: ConfigIssue[] = [];

  if (repositories.length === 0) {
    errors.push({ path: source, message: 'No repositories configured' });
  }

  repositories.forEach((repo, index) => {
    if (!REPOSITORY_PATTERN.test(repo)) {
      errors.push({
        path: `${source}[${index}]`,
        message: `Invalid repository "${repo}" (expected owner/name)`,
      });
    }
  });

  return {
    valid: errors.length === 0,
    errors,
  };
}
