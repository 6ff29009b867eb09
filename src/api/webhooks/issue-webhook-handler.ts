import type { Logger } from '../../observability';
import type { EventStore } from '../../db/repositories/event-store';
import type { Dispatcher } from '../../notifications/dispatcher';
import { formatIssueNotification } from '../../notifications/formatter';
import { passthroughEnricher, type IssueEnricher } from '../../github/issue-enricher';
import { AuthError, StoreError, ValidationError, errorMessage } from '../../errors';
import type { IssueEvent } from '../../types';
import { parseIssueWebhook, verifyWebhookSignature } from './github-webhook';

export interface WebhookRequest {
  rawBody: Buffer;
  headers: Record<string, string | string[] | undefined>;
}

export type WebhookStatus =
  | 'accepted'
  | 'duplicate'
  | 'pong'
  | 'unauthorized'
  | 'rejected'
  | 'unavailable'
  | 'error';

export interface WebhookOutcome {
  statusCode: 200 | 400 | 401 | 500 | 503;
  body: {
    status: WebhookStatus;
    reason?: string;
    repository?: string;
    issue_number?: number;
    job_id?: string;
  };
}

/** The parts of the Dispatcher the handler may touch: it only ever enqueues */
export type NotificationSink = Pick<Dispatcher, 'admit' | 'reportError'>;

export interface IssueWebhookHandlerDeps {
  secret: string;
  repositories: readonly string[];
  store: EventStore;
  dispatcher: NotificationSink;
  logger: Logger;
  enricher?: IssueEnricher;
  now?: () => number;
}

/**
 * Per-request pipeline for GitHub issue deliveries:
 * verify → parse → dedup check → record → format → enqueue.
 *
 * Every path answers without waiting on the network; enrichment and delivery
 * to the chat happen later on the dispatcher, so a slow GitHub API or
 * transport never delays GitHub's acknowledgement.
 */
export class IssueWebhookHandler {
  private readonly monitored: ReadonlySet<string>;
  private readonly enricher: IssueEnricher;
  private readonly now: () => number;

  constructor(private readonly deps: IssueWebhookHandlerDeps) {
    this.monitored = new Set(deps.repositories);
    this.enricher = deps.enricher ?? passthroughEnricher;
    this.now = deps.now ?? Date.now;
  }

  isMonitored(repository: string): boolean {
    return this.monitored.has(repository);
  }

  async handle(request: WebhookRequest): Promise<WebhookOutcome> {
    const deliveryId = header(request.headers, 'x-github-delivery');
    const log = this.deps.logger.child({ deliveryId });

    try {
      // Received → Verified
      const signature = header(request.headers, 'x-hub-signature-256');
      if (!verifyWebhookSignature(request.rawBody, signature, this.deps.secret)) {
        throw new AuthError(signature ? 'Invalid signature' : 'Missing signature');
      }

      // Verified → Parsed
      const parsed = parseIssueWebhook(
        header(request.headers, 'x-github-event'),
        decodePayload(request.rawBody, header(request.headers, 'content-type')),
        new Date(this.now())
      );

      if (parsed.kind === 'ping') {
        log.info({ zen: parsed.zen }, 'Received webhook ping from GitHub');
        return { statusCode: 200, body: { status: 'pong' } };
      }
      if (parsed.kind === 'ignored') {
        throw new ValidationError(parsed.reason);
      }

      const event = parsed.event;
      if (!this.isMonitored(event.repository)) {
        throw new ValidationError(`Repository not monitored: ${event.repository}`);
      }

      return await this.process(event, log);
    } catch (error) {
      return this.toOutcome(error, log);
    }
  }

  private async process(event: IssueEvent, log: Logger): Promise<WebhookOutcome> {
    const key = { repository: event.repository, issue_number: event.issueNumber };

    // Parsed → Novel
    if (await this.deps.store.hasSeen(event.repository, event.issueNumber)) {
      log.info(key, 'Issue already notified; ignoring redelivery');
      return { statusCode: 200, body: { status: 'duplicate', ...key } };
    }

    // Recording an issue we could not then queue would silence it for good,
    // so the dispatcher slot is taken before the record is written
    const admission = this.deps.dispatcher.admit();
    if (!admission) {
      return { statusCode: 503, body: { status: 'unavailable', reason: 'Shutting down', ...key } };
    }

    try {
      // Novel → Recorded
      const recorded = await this.markSeenWithRetry(event, log);
      if (!recorded) {
        log.info(key, 'Concurrent delivery already recorded this issue');
        return { statusCode: 200, body: { status: 'duplicate', ...key } };
      }

      // Recorded → enqueued. Enrichment runs in the dispatcher lane, never
      // on the request path.
      const job = admission.enqueue('issue', formatIssueNotification(event), {
        render: async () => formatIssueNotification(await this.enricher.enrich(event)),
      });
      if (!job) {
        log.error(key, 'Issue recorded but dispatcher refused the notification');
        return { statusCode: 503, body: { status: 'unavailable', reason: 'Shutting down', ...key } };
      }

      log.info({ ...key, jobId: job.id }, 'Issue notification queued');
      return { statusCode: 200, body: { status: 'accepted', ...key, job_id: job.id } };
    } finally {
      admission.release();
    }
  }

  /**
   * A StoreError gets one more attempt before the request fails with 503,
   * leaving GitHub to redeliver later.
   */
  private async markSeenWithRetry(event: IssueEvent, log: Logger): Promise<boolean> {
    const notifiedAt = new Date(this.now());
    try {
      return await this.deps.store.markSeen(event.repository, event.issueNumber, notifiedAt);
    } catch (error) {
      if (!(error instanceof StoreError)) throw error;
      log.warn(
        { repository: event.repository, issueNumber: event.issueNumber, err: error },
        'Dedup insert failed; retrying once'
      );
      return await this.deps.store.markSeen(event.repository, event.issueNumber, notifiedAt);
    }
  }

  private toOutcome(error: unknown, log: Logger): WebhookOutcome {
    if (error instanceof AuthError) {
      log.warn({ reason: error.message }, 'Rejected webhook with bad signature');
      return { statusCode: 401, body: { status: 'unauthorized', reason: error.message } };
    }

    if (error instanceof ValidationError) {
      log.info({ reason: error.message }, 'Rejected webhook payload');
      return { statusCode: 400, body: { status: 'rejected', reason: error.message } };
    }

    if (error instanceof StoreError) {
      log.error({ err: error }, 'Dedup store unavailable; asking GitHub to redeliver');
      return { statusCode: 503, body: { status: 'unavailable', reason: 'Dedup store unavailable' } };
    }

    log.error({ err: error }, 'Unexpected error handling webhook');
    this.deps.dispatcher.reportError('webhook', errorMessage(error));
    return { statusCode: 500, body: { status: 'error', reason: 'Internal error' } };
  }
}

function header(headers: WebhookRequest['headers'], name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * GitHub sends either raw JSON or, for hooks set to form encoding, the same
 * JSON in a `payload` field
 */
function decodePayload(rawBody: Buffer, contentType: string | undefined): unknown {
  let json = rawBody.toString('utf8');
  if (contentType?.toLowerCase().startsWith('application/x-www-form-urlencoded')) {
    const field = new URLSearchParams(json).get('payload');
    if (field === null) {
      throw new ValidationError('Form payload is missing the payload field');
    }
    json = field;
  }

  try {
    return JSON.parse(json);
  } catch {
    throw new ValidationError('Invalid JSON payload');
  }
}
