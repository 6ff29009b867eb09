export {
  Dispatcher,
  type DispatcherOptions,
  type DispatcherStats,
  type DispatchFailure,
  type ShutdownResult,
} from './dispatcher';
export {
  escapeHtml,
  formatIssueNotification,
  formatStartupNotification,
  formatErrorNotification,
  TELEGRAM_MAX_MESSAGE_LENGTH,
  type StartupInfo,
} from './formatter';
export { TelegramClient, type TelegramClientOptions } from './telegram-client';
