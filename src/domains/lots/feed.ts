import { v4 as uuidv4 } from 'uuid';
import { connectEventBus, publishEvent } from '../../lib/eventBus';
import type { DispenseRecord, TransferSuggestion } from './internal/types';

export type AuditEvent =
  | { type: 'dispense.recorded'; data: DispenseRecord }
  | { type: 'redistribution.suggested'; data: { itemId: string; suggestions: TransferSuggestion[] } };

/** Append-only feed read by the external audit/reporting layer. */
export interface AuditFeed {
  publish(event: AuditEvent, occurredAt: Date): Promise<void>;
}

export class RedisAuditFeed implements AuditFeed {
  constructor(
    private redisUrl: string,
    private channel: string
  ) {
    connectEventBus(redisUrl);
  }

  async publish(event: AuditEvent, occurredAt: Date): Promise<void> {
    await publishEvent(this.redisUrl, this.channel, {
      id: uuidv4(),
      type: event.type,
      occurredAt: occurredAt.toISOString(),
      data: event.data
    });
  }
}

/** Drops every event; the feed used when REDIS_URL is unset. */
export class SilentAuditFeed implements AuditFeed {
  async publish(): Promise<void> {
    return undefined;
  }
}

/** Keeps events in process for tests. */
export class MemoryAuditFeed implements AuditFeed {
  readonly events: Array<AuditEvent & { occurredAt: string }> = [];

  async publish(event: AuditEvent, occurredAt: Date): Promise<void> {
    this.events.push({ ...event, occurredAt: occurredAt.toISOString() });
  }
}

export function createAuditFeed(config: { redisUrl: string | null; eventsChannel: string }): AuditFeed {
  return config.redisUrl ? new RedisAuditFeed(config.redisUrl, config.eventsChannel) : new SilentAuditFeed();
}
