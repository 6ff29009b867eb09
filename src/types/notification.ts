/**
 * startup and error jobs are operator notices; they are never dropped
 * to make room for an issue job.
 */
export type NotificationKind = 'issue' | 'startup' | 'error';

export interface NotificationJob {
  id: string;
  kind: NotificationKind;
  text: string;
  chatId: string;
  attempts: number;
  createdAt: Date;
  /**
   * Produces the final text just before the first send. `text` is kept if it
   * rejects.
   */
  render?: () => Promise<string>;
}

export function isCriticalJob(job: Pick<NotificationJob, 'kind'>): boolean {
  return job.kind !== 'issue';
}

/**
 * Outbound side of the chat provider
 */
export interface ChatTransport {
  sendMessage(chatId: string, text: string): Promise<void>;
}
