import pino from 'pino';
import { NotifierServer } from '../server';
import { HealthCheck, HealthReport } from '../health';
import { IssueWebhookHandler } from '../webhooks';
import { signWebhookPayload } from '../webhooks/github-webhook';
import { Dispatcher } from '../../notifications/dispatcher';
import { createSilentLogger } from '../../observability';
import { InMemoryEventStore, RecordingTransport } from '../../__tests__/utils/fakes';

const SECRET = 'test-secret';

const payload = JSON.stringify({
  action: 'opened',
  issue: {
    number: 7,
    title: 'Docs typo',
    html_url: 'https://github.com/kubernetes/website/issues/7',
    user: { login: 'octocat' },
    labels: [{ name: 'kind/bug' }],
  },
  repository: { full_name: 'kubernetes/website' },
});

function setup() {
  const logger = createSilentLogger();
  const store = new InMemoryEventStore();
  const transport = new RecordingTransport();
  const dispatcher = new Dispatcher(
    transport,
    {
      chatId: 'chat-1',
      batchSize: 1,
      sendDelayMs: 0,
      batchDelayMs: 0,
      maxAttempts: 3,
      queueCapacity: 10,
      sleep: async () => undefined,
    },
    logger
  );
  const webhooks = new IssueWebhookHandler({
    secret: SECRET,
    repositories: ['kubernetes/website'],
    store,
    dispatcher,
    logger,
  });
  const health = new HealthCheck(store, dispatcher, { queueThreshold: 80, wedgeTimeoutMs: 300_000 });
  const server = new NotifierServer(webhooks, health, { logger });
  return { server, store, transport, dispatcher };
}

describe('NotifierServer', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  afterEach(async () => {
    await ctx.server.stop();
  });

  describe('POST /webhook', () => {
    it('should verify the signature over the raw body and accept the issue', async () => {
      const response = await ctx.server.getApp().inject({
        method: 'POST',
        url: '/webhook',
        headers: {
          'content-type': 'application/json',
          'x-github-event': 'issues',
          'x-github-delivery': 'delivery-7',
          'x-hub-signature-256': signWebhookPayload(payload, SECRET),
        },
        payload,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'accepted',
        repository: 'kubernetes/website',
        issue_number: 7,
      });

      await ctx.dispatcher.idle();
      expect(ctx.transport.sent).toHaveLength(1);
      expect(ctx.transport.sent[0].text).toContain('🏷️ <b>Labels:</b> <code>kind/bug</code>');
    });

    it('should reject a body re-serialised with different whitespace', async () => {
      const reformatted = JSON.stringify(JSON.parse(payload), null, 2);

      const response = await ctx.server.getApp().inject({
        method: 'POST',
        url: '/webhook',
        headers: {
          'content-type': 'application/json',
          'x-github-event': 'issues',
          'x-hub-signature-256': signWebhookPayload(payload, SECRET),
        },
        payload: reformatted,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ status: 'unauthorized', reason: 'Invalid signature' });
      expect(ctx.store.records.size).toBe(0);
    });

    it('should answer 401 when the signature header is absent', async () => {
      const response = await ctx.server.getApp().inject({
        method: 'POST',
        url: '/webhook',
        headers: { 'content-type': 'application/json', 'x-github-event': 'issues' },
        payload,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ status: 'unauthorized', reason: 'Missing signature' });
    });

    it('should check the signature of an unsigned form-encoded delivery instead of refusing its media type', async () => {
      const response = await ctx.server.getApp().inject({
        method: 'POST',
        url: '/webhook',
        headers: { 'content-type': 'application/x-www-form-urlencoded', 'x-github-event': 'issues' },
        payload: `payload=${encodeURIComponent(payload)}`,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ status: 'unauthorized', reason: 'Missing signature' });
    });

    it('should accept a signed form-encoded delivery', async () => {
      const body = `payload=${encodeURIComponent(payload)}`;

      const response = await ctx.server.getApp().inject({
        method: 'POST',
        url: '/webhook',
        headers: {
          'content-type': 'application/x-www-form-urlencoded',
          'x-github-event': 'issues',
          'x-hub-signature-256': signWebhookPayload(body, SECRET),
        },
        payload: body,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'accepted', issue_number: 7 });
    });

    it('should reach the signature check when the content type is unknown', async () => {
      const response = await ctx.server.getApp().inject({
        method: 'POST',
        url: '/webhook',
        headers: { 'content-type': 'text/plain', 'x-github-event': 'issues' },
        payload,
      });

      expect(response.statusCode).toBe(401);
    });

    it('should answer 400 for a signed body that cannot be parsed', async () => {
      const body = 'not json at all';

      const response = await ctx.server.getApp().inject({
        method: 'POST',
        url: '/webhook',
        headers: {
          'content-type': 'text/plain',
          'x-github-event': 'issues',
          'x-hub-signature-256': signWebhookPayload(body, SECRET),
        },
        payload: body,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ status: 'rejected', reason: 'Invalid JSON payload' });
    });
  });

  describe('GET /health', () => {
    it('should answer 200 with the report when healthy', async () => {
      const response = await ctx.server.getApp().inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ healthy: true, store: 'ok', dispatcher: 'ok', pending: 0 });
    });

    it('should answer 503 when the store is unreachable', async () => {
      ctx.store.reachable = false;

      const response = await ctx.server.getApp().inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ healthy: false, store: 'unreachable' });
    });

    it('should serve the same report at the root path', async () => {
      const response = await ctx.server.getApp().inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
    });
  });

  it('should write request logs through the injected logger', async () => {
    const lines: string[] = [];
    const logger = pino({ base: { service: 'issue-notifier' } }, { write: (line: string) => lines.push(line) });
    const server = new NotifierServer(
      { handle: async () => ({ statusCode: 200, body: { status: 'pong' } }) },
      { check: async () => ({ healthy: true, store: 'ok', dispatcher: 'ok', pending: 0, timestamp: 'now' }) },
      { logger }
    );

    await server.getApp().inject({ method: 'GET', url: '/health' });
    await server.stop();

    const entries = lines.map((line): unknown => JSON.parse(line));
    expect(entries).toContainEqual(expect.objectContaining({ service: 'issue-notifier', msg: 'incoming request' }));
  });

  it('should hand health checks to the injected checker', async () => {
    const report: HealthReport = {
      healthy: false,
      store: 'ok',
      dispatcher: 'wedged',
      pending: 3,
      timestamp: '2024-05-01T12:00:00.000Z',
    };
    const server = new NotifierServer(
      { handle: async () => ({ statusCode: 200, body: { status: 'pong' } }) },
      { check: async () => report },
      { logger: createSilentLogger() }
    );

    const response = await server.getApp().inject({ method: 'GET', url: '/health' });
    await server.stop();

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual(report);
  });
});
