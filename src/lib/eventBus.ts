import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';

export type BusEvent = {
  id: string;
  type: string;
  occurredAt: string;
  data: unknown;
};

type EventEnvelope = {
  sourceId: string;
  event: BusEvent;
};

const EVENT_SOURCE_ID = process.env.EVENT_SOURCE_ID ?? uuidv4();

let publisher: Redis | null = null;

/**
 * Opens the shared publisher. Commands issued before the connection is ready, or while
 * it reconnects, wait in the offline queue instead of failing.
 */
export function connectEventBus(redisUrl: string): Redis {
  if (publisher) return publisher;
  publisher = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    enableOfflineQueue: true
  });
  publisher.on('error', (error: unknown) => {
    console.warn('Event bus connection error', error);
  });
  return publisher;
}

/**
 * Publishes to a Redis channel. Failures are logged and never surface to the caller,
 * whose work has already been committed.
 */
export async function publishEvent(redisUrl: string, channel: string, event: BusEvent): Promise<void> {
  const payload: EventEnvelope = { sourceId: EVENT_SOURCE_ID, event };
  try {
    await connectEventBus(redisUrl).publish(channel, JSON.stringify(payload));
  } catch (error) {
    console.warn(`Failed to publish ${event.type} to ${channel}`, error);
  }
}

export async function closeEventBus(): Promise<void> {
  if (!publisher) return;
  const client = publisher;
  publisher = null;
  await client.quit();
}
