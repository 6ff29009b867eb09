import type { IssueEvent } from '../types';

/** Telegram rejects messages longer than this */
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

const MAX_TITLE_LENGTH = 80;
const MAX_LABELS = 6;
const MAX_LABEL_LENGTH = 20;
const STARTUP_REPO_PREVIEW = 5;

/**
 * Escape text for Telegram's HTML parse mode
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Shorten to `max` code points, so a surrogate pair is never split
 */
function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max - 3).join('')}...` : text;
}

/**
 * Escape `text`, cutting it so the escaped result plus a `...` marker fits
 * in `budget` UTF-16 units. Cuts fall between characters, never inside an
 * entity.
 */
function escapeWithin(text: string, budget: number): string {
  const escaped = escapeHtml(text);
  if (escaped.length <= budget) return escaped;

  let out = '';
  for (const char of text) {
    const piece = escapeHtml(char);
    if (out.length + piece.length > budget - 3) break;
    out += piece;
  }
  return `${out}...`;
}

/**
 * Cap for messages whose fields are bounded in practice. A trailing lone
 * surrogate or partial entity left by the cut is dropped.
 */
function clampMessage(message: string): string {
  if (message.length <= TELEGRAM_MAX_MESSAGE_LENGTH) return message;
  const suffix = '\n\n... [truncated]';
  const head = message
    .slice(0, TELEGRAM_MAX_MESSAGE_LENGTH - suffix.length)
    .replace(/[\uD800-\uDBFF]$/, '')
    .replace(/&[#A-Za-z0-9]*$/, '');
  return head + suffix;
}

/**
 * Render a new-issue notification. Truncation happens on the raw text,
 * before escaping, so an entity is never cut in half.
 */
export function formatIssueNotification(event: IssueEvent): string {
  const title = escapeHtml(truncate(event.title, MAX_TITLE_LENGTH));

  const lines = [
    '🆕 <b>New Issue</b>',
    '',
    `📋 <b>Title:</b> ${title}`,
    `👤 <b>Author:</b> @${escapeHtml(event.author)}`,
    `📦 <b>Repository:</b> <code>${escapeHtml(event.repository)}</code>`,
    `🔗 <b>Link:</b> <a href="${escapeHtml(event.url)}">#${event.issueNumber}</a>`,
  ];

  if (event.labels.length > 0) {
    const labels = event.labels
      .slice(0, MAX_LABELS)
      .map((name) => `<code>${escapeHtml(truncate(name, MAX_LABEL_LENGTH))}</code>`);
    lines.push(`🏷️ <b>Labels:</b> ${labels.join(', ')}`);
  }

  return clampMessage(lines.join('\n'));
}

export interface StartupInfo {
  repositories: readonly string[];
  store: string;
}

export function formatStartupNotification(info: StartupInfo): string {
  const preview = info.repositories
    .slice(0, STARTUP_REPO_PREVIEW)
    .map((repo) => `• <code>${escapeHtml(repo)}</code>`);
  if (info.repositories.length > STARTUP_REPO_PREVIEW) {
    preview.push(`• ... and ${info.repositories.length - STARTUP_REPO_PREVIEW} more`);
  }

  return clampMessage(
    [
      '🚀 <b>Issue Notifier Started</b>',
      '',
      '⚡ <b>Mode:</b> Real-time Webhooks',
      `📦 <b>Monitoring ${info.repositories.length} repositories:</b>`,
      '',
      ...preview,
      '',
      `💾 <b>Dedup store:</b> ${escapeHtml(info.store)}`,
    ].join('\n')
  );
}

export function formatErrorNotification(source: string, message: string): string {
  const head = [
    '⚠️ <b>Issue Notifier Error</b>',
    '',
    `<b>Component:</b> ${escapeWithin(source, 200)}`,
    '<b>Details:</b> ',
  ].join('\n');
  return head + escapeWithin(message, TELEGRAM_MAX_MESSAGE_LENGTH - head.length);
}
