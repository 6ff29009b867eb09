import crypto from 'crypto';
import { createIssueEvent, IssueEvent } from '../../types';

const SIGNATURE_PREFIX = 'sha256=';
const SHA256_HEX = /^[0-9a-f]{64}$/i;

/**
 * Verify GitHub webhook signature using HMAC-SHA256
 *
 * @param payload - Raw request body, exactly as received
 * @param signature - X-Hub-Signature-256 header value
 * @param secret - Webhook secret shared with GitHub
 * @returns true if signature is valid; never throws
 */
export function verifyWebhookSignature(
  payload: Buffer | string,
  signature: string | undefined,
  secret: string
): boolean {
  if (!signature || !secret) {
    return false;
  }

  // GitHub sends signature as "sha256=<hash>"
  if (!signature.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const expectedHash = signature.slice(SIGNATURE_PREFIX.length);
  if (!SHA256_HEX.test(expectedHash)) {
    return false;
  }

  const actualHash = crypto
    .createHmac('sha256', secret)
    .update(typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload)
    .digest();

  // Both sides are 32 bytes here, so timingSafeEqual cannot throw on length
  return crypto.timingSafeEqual(Buffer.from(expectedHash, 'hex'), actualHash);
}

/**
 * Compute the header value GitHub would send for a body. Used by tooling
 * and tests that need to produce signed deliveries.
 */
export function signWebhookPayload(payload: Buffer | string, secret: string): string {
  return SIGNATURE_PREFIX + crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

export type ParseResult =
  | { kind: 'issue_opened'; event: IssueEvent }
  | { kind: 'ping'; zen?: string }
  | { kind: 'ignored'; reason: string };

/**
 * Turn a decoded webhook body into an IssueEvent.
 *
 * Only `issues` deliveries with action `opened` produce an event; `ping` is
 * reported separately, everything else is ignored with a reason.
 */
export function parseIssueWebhook(
  eventType: string | undefined,
  body: unknown,
  receivedAt: Date = new Date()
): ParseResult {
  if (eventType === 'ping') {
    const zen = isRecord(body) && typeof body.zen === 'string' ? body.zen : undefined;
    return { kind: 'ping', zen };
  }

  if (eventType !== 'issues') {
    return { kind: 'ignored', reason: `Unsupported event type: ${eventType ?? 'missing'}` };
  }

  if (!isRecord(body)) {
    return { kind: 'ignored', reason: 'Payload is not a JSON object' };
  }

  if (body.action !== 'opened') {
    return { kind: 'ignored', reason: `Unsupported issues action: ${String(body.action)}` };
  }

  const repository = isRecord(body.repository) ? body.repository.full_name : undefined;
  const issue = isRecord(body.issue) ? body.issue : undefined;
  if (typeof repository !== 'string' || !issue) {
    return { kind: 'ignored', reason: 'Payload is missing repository or issue' };
  }

  const number = issue.number;
  const title = issue.title;
  const url = issue.html_url;
  const author = isRecord(issue.user) ? issue.user.login : undefined;

  if (
    typeof number !== 'number' ||
    !Number.isInteger(number) ||
    number <= 0 ||
    typeof title !== 'string' ||
    typeof url !== 'string' ||
    typeof author !== 'string'
  ) {
    return { kind: 'ignored', reason: 'Issue payload is missing number, title, html_url or user.login' };
  }

  return {
    kind: 'issue_opened',
    event: createIssueEvent({
      repository,
      issueNumber: number,
      title,
      url,
      author,
      labels: extractLabelNames(issue.labels),
      receivedAt,
    }),
  };
}

export function extractLabelNames(labels: unknown): string[] {
  if (!Array.isArray(labels)) return [];
  return labels
    .map((label: unknown) => (isRecord(label) && typeof label.name === 'string' ? label.name : null))
    .filter((name): name is string => name !== null);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
