/**
 * A newly opened issue, extracted from a verified webhook delivery.
 * Instances are frozen once constructed.
 */
export interface IssueEvent {
  readonly repository: string;
  readonly issueNumber: number;
  readonly title: string;
  readonly url: string;
  readonly author: string;
  readonly labels: readonly string[];
  readonly receivedAt: Date;
}

export function createIssueEvent(fields: {
  repository: string;
  issueNumber: number;
  title: string;
  url: string;
  author: string;
  labels?: readonly string[];
  receivedAt?: Date;
}): IssueEvent {
  return Object.freeze({
    repository: fields.repository,
    issueNumber: fields.issueNumber,
    title: fields.title,
    url: fields.url,
    author: fields.author,
    labels: Object.freeze([...(fields.labels ?? [])]),
    receivedAt: fields.receivedAt ?? new Date(),
  });
}

/**
 * Dedup ledger entry. At most one per (repository, issueNumber).
 */
export interface DedupRecord {
  repository: string;
  issueNumber: number;
  notifiedAt: Date;
}
