/**
 * GitHub webhook handling
 */
export {
  verifyWebhookSignature,
  signWebhookPayload,
  parseIssueWebhook,
  extractLabelNames,
  type ParseResult,
} from './github-webhook';

export {
  IssueWebhookHandler,
  type IssueWebhookHandlerDeps,
  type NotificationSink,
  type WebhookOutcome,
  type WebhookRequest,
  type WebhookStatus,
} from './issue-webhook-handler';
