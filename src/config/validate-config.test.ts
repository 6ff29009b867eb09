import { validateEnvironment, validateRepositories } from './validate-config';

const BASE_ENV = {
  TELEGRAM_BOT_TOKEN: 'test-token',
  TELEGRAM_CHAT_ID: '-1001',
  GITHUB_WEBHOOK_SECRET: 'test-secret',
  DATABASE_URL: 'postgres://localhost/test',
};

describe('validateEnvironment', () => {
  it('should pass with only the required variables', () => {
    const result = validateEnvironment(BASE_ENV);

    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('should report every missing required variable', () => {
    const result = validateEnvironment({ TELEGRAM_CHAT_ID: '-1001', DATABASE_URL: '  ' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: 'TELEGRAM_BOT_TOKEN', message: 'Missing required "TELEGRAM_BOT_TOKEN"' },
      { path: 'GITHUB_WEBHOOK_SECRET', message: 'Missing required "GITHUB_WEBHOOK_SECRET"' },
      { path: 'DATABASE_URL', message: 'Missing required "DATABASE_URL"' },
    ]);
  });

  it('should reject non-integer numeric settings', () => {
    const result = validateEnvironment({ ...BASE_ENV, SEND_DELAY_MS: '1.5', PORT: 'http' });

    expect(result.errors).toEqual([
      { path: 'PORT', message: 'Invalid "PORT" (must be a non-negative integer, got "http")' },
      { path: 'SEND_DELAY_MS', message: 'Invalid "SEND_DELAY_MS" (must be a non-negative integer, got "1.5")' },
    ]);
  });

  it('should allow zero delays but not a zero batch size', () => {
    const result = validateEnvironment({ ...BASE_ENV, SEND_DELAY_MS: '0', BATCH_DELAY_MS: '0', BATCH_SIZE: '0' });

    expect(result.errors).toEqual([{ path: 'BATCH_SIZE', message: 'Invalid "BATCH_SIZE" (must be greater than 0)' }]);
  });

  it('should reject unknown log levels', () => {
    expect(validateEnvironment({ ...BASE_ENV, LOG_LEVEL: 'DEBUG' }).valid).toBe(true);

    const result = validateEnvironment({ ...BASE_ENV, LOG_LEVEL: 'verbose' });
    expect(result.errors[0].path).toBe('LOG_LEVEL');
    expect(result.errors[0].message).toContain('Invalid log level "verbose"');
  });
});

describe('validateRepositories', () => {
  it('should accept owner/name pairs', () => {
    const result = validateRepositories(['prometheus/prometheus', 'open-telemetry/opentelemetry.io'], 'test');

    expect(result.valid).toBe(true);
  });

  it('should fail on an empty list', () => {
    expect(validateRepositories([], 'MONITORED_REPOSITORIES').errors).toEqual([
      { path: 'MONITORED_REPOSITORIES', message: 'No repositories configured' },
    ]);
  });

  it('should point at each malformed entry', () => {
    const result = validateRepositories(['ok/repo', 'no-slash', 'https://github.com/a/b'], 'REPOSITORIES_FILE');

    expect(result.errors).toEqual([
      { path: 'REPOSITORIES_FILE[1]', message: 'Invalid repository "no-slash" (expected owner/name)' },
      {
        path: 'REPOSITORIES_FILE[2]',
        message: 'Invalid repository "https://github.com/a/b" (expected owner/name)',
      },
    ]);
  });
});
