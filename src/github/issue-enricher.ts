import type { Logger } from '../observability';
import { createIssueEvent, IssueEvent } from '../types';
import { extractLabelNames, isRecord } from '../api/webhooks/github-webhook';

export interface IssueEnricher {
  enrich(event: IssueEvent): Promise<IssueEvent>;
}

/**
 * Used when no GitHub token is configured
 */
export const passthroughEnricher: IssueEnricher = {
  enrich: async (event) => event,
};

export interface GitHubIssueEnricherOptions {
  apiBase?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Refreshes an issue's labels from the REST API. Triage bots often label an
 * issue seconds after it is opened, after the webhook payload was built.
 * Any failure keeps the payload's labels.
 */
export class GitHubIssueEnricher implements IssueEnricher {
  private readonly apiBase: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly token: string,
    private readonly logger: Logger,
    options: GitHubIssueEnricherOptions = {}
  ) {
    this.apiBase = options.apiBase ?? 'https://api.github.com';
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async enrich(event: IssueEvent): Promise<IssueEvent> {
    const url = `${this.apiBase}/repos/${event.repository}/issues/${event.issueNumber}`;

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.logger.warn(
          { repository: event.repository, issueNumber: event.issueNumber, status: response.status },
          'Issue lookup failed; using webhook labels'
        );
        return event;
      }

      const body: unknown = await response.json();
      if (!isRecord(body) || !Array.isArray(body.labels)) {
        return event;
      }

      return createIssueEvent({ ...event, labels: extractLabelNames(body.labels) });
    } catch (err) {
      this.logger.warn(
        { repository: event.repository, issueNumber: event.issueNumber, err },
        'Issue lookup errored; using webhook labels'
      );
      return event;
    }
  }
}
