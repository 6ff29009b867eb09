import type { EventStore } from '../db/repositories/event-store';
import type { Dispatcher } from '../notifications/dispatcher';
import type { HealthSettings } from '../config/load-config';

export interface HealthReport {
  healthy: boolean;
  store: 'ok' | 'unreachable';
  dispatcher: 'ok' | 'saturated' | 'wedged';
  pending: number;
  timestamp: string;
}

/**
 * Read-only liveness check: the dedup store answers a round-trip query and
 * the dispatcher is neither backed up past the threshold nor stuck.
 */
export class HealthCheck {
  constructor(
    private readonly store: Pick<EventStore, 'ping'>,
    private readonly dispatcher: Pick<Dispatcher, 'pendingCount' | 'isSaturated' | 'isWedged'>,
    private readonly settings: HealthSettings
  ) {}

  async check(): Promise<HealthReport> {
    const storeOk = await this.store.ping();

    let dispatcher: HealthReport['dispatcher'] = 'ok';
    if (this.dispatcher.isWedged(this.settings.wedgeTimeoutMs)) {
      dispatcher = 'wedged';
    } else if (this.dispatcher.isSaturated(this.settings.queueThreshold)) {
      dispatcher = 'saturated';
    }

    return {
      healthy: storeOk && dispatcher === 'ok',
      store: storeOk ? 'ok' : 'unreachable',
      dispatcher,
      pending: this.dispatcher.pendingCount(),
      timestamp: new Date().toISOString(),
    };
  }
}
