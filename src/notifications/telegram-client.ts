import { TransportError, errorMessage } from '../errors';
import type { ChatTransport } from '../types';

const DEFAULT_API_BASE = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 10_000;

interface TelegramErrorBody {
  description?: string;
  parameters?: { retry_after?: number };
}

export interface TelegramClientOptions {
  apiBase?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Thin Bot API client for `sendMessage` in HTML parse mode.
 *
 * Every failure surfaces as a TransportError; network errors, 5xx and 429
 * are marked retryable, other 4xx are not.
 */
export class TelegramClient implements ChatTransport {
  private readonly apiBase: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly botToken: string,
    options: TelegramClientOptions = {}
  ) {
    this.apiBase = options.apiBase ?? DEFAULT_API_BASE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async sendMessage(chatId: string, text: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiBase}/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          parse_mode: 'HTML',
          disable_web_page_preview: false,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Telegram request failed: ${errorMessage(error)}`, {
        retryable: true,
        cause: error,
      });
    }

    if (response.ok) {
      return;
    }

    const body = await readErrorBody(response);
    const description = body.description ?? response.statusText;

    if (response.status === 429) {
      const retryAfter = body.parameters?.retry_after;
      throw new TransportError(`Telegram rate limit: ${description}`, {
        retryable: true,
        status: 429,
        retryAfterMs: typeof retryAfter === 'number' ? retryAfter * 1000 : undefined,
      });
    }

    throw new TransportError(`Telegram API error ${response.status}: ${description}`, {
      retryable: response.status >= 500,
      status: response.status,
    });
  }
}

async function readErrorBody(response: Response): Promise<TelegramErrorBody> {
  try {
    const parsed: unknown = await response.json();
    if (typeof parsed !== 'object' || parsed === null) return {};

    const body: TelegramErrorBody = {};
    if ('description' in parsed && typeof parsed.description === 'string') {
      body.description = parsed.description;
    }
    if ('parameters' in parsed && typeof parsed.parameters === 'object' && parsed.parameters !== null) {
      const params = parsed.parameters;
      if ('retry_after' in params && typeof params.retry_after === 'number') {
        body.parameters = { retry_after: params.retry_after };
      }
    }
    return body;
  } catch {
    // Non-JSON error bodies (proxies, gateways) carry nothing we need
    return {};
  }
}
