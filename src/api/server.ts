import Fastify, { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { IssueWebhookHandler } from './webhooks';
import type { HealthCheck } from './health';

/**
 * Fastify surface for the notifier: webhook intake and health
 */
// Extend FastifyRequest to include rawBody
declare module 'fastify' {
  interface FastifyRequest {
    rawBody?: Buffer;
  }
}

export interface NotifierServerOptions {
  /** Request logs go through this logger, sharing its level and redaction */
  logger: FastifyBaseLogger;
  /** GitHub caps payloads at 25 MB */
  bodyLimit?: number;
}

export class NotifierServer {
  private app: FastifyInstance;

  constructor(
    private readonly webhooks: Pick<IssueWebhookHandler, 'handle'>,
    private readonly health: Pick<HealthCheck, 'check'>,
    options: NotifierServerOptions
  ) {
    this.app = Fastify({
      logger: options.logger,
      bodyLimit: options.bodyLimit ?? 25 * 1024 * 1024,
    });

    // Signature verification needs the exact bytes GitHub signed, so every
    // body, whatever its content type, is kept as a Buffer and decoded by
    // the webhook handler itself
    this.app.removeAllContentTypeParsers();
    this.app.addContentTypeParser(
      '*',
      { parseAs: 'buffer' },
      (req: FastifyRequest, body: Buffer, done: (err: Error | null, body?: unknown) => void) => {
        req.rawBody = body;
        done(null, body);
      }
    );

    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.post('/webhook', async (request, reply) => {
      const outcome = await this.webhooks.handle({
        rawBody: request.rawBody ?? Buffer.alloc(0),
        headers: request.headers,
      });

      reply.status(outcome.statusCode);
      return outcome.body;
    });

    const healthRoute = async (_request: unknown, reply: FastifyReply) => {
      const report = await this.health.check();
      reply.status(report.healthy ? 200 : 503);
      return report;
    };

    this.app.get('/health', healthRoute);
    this.app.get('/', healthRoute);
  }

  async start(port: number, host: string = '0.0.0.0'): Promise<void> {
    await this.app.listen({ port, host });
    this.app.log.info({ port, host }, 'Webhook server listening');
  }

  /**
   * Stop accepting connections; in-flight requests are allowed to finish
   */
  async stop(): Promise<void> {
    await this.app.close();
  }

  getApp(): FastifyInstance {
    return this.app;
  }
}
