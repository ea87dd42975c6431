import { v4 as uuidv4 } from 'uuid';
import { Kafka, logLevel, Producer, Consumer } from 'kafkajs';
import { Pool } from 'pg';
import { readConfig, recordOutbox, dispatchOutbox } from '@huddle/shared';
import { logger } from '@huddle/observability';

export const TOPICS = {
  identity: 'events.identity.v1',
  social: 'events.social.v1',
  messaging: 'events.messaging.v1',
} as const;

export type Topic = (typeof TOPICS)[keyof typeof TOPICS];

// Bump when a payload's shape or meaning changes; the envelope itself stays stable.
export const EVENT_VERSION = 'v1';

export type EventEnvelope<TPayload = unknown> = {
  event_id: string;
  event_type: string;
  version: string;
  occurred_at: string;
  actor_id: string;
  correlation_id?: string;
  context?: Record<string, unknown>;
  payload: TPayload;
};

export type EmitOptions = {
  actorId: string;
  version?: string;
  correlationId?: string;
  idempotencyKey?: string;
  context?: Record<string, unknown>;
};

export const buildEvent = <T>(eventType: string, payload: T, options: EmitOptions): EventEnvelope<T> => ({
  event_id: uuidv4(),
  event_type: eventType,
  version: options.version ?? EVENT_VERSION,
  occurred_at: new Date().toISOString(),
  actor_id: options.actorId,
  correlation_id: options.correlationId,
  context: options.context,
  payload,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseEnvelope = (raw: string): EventEnvelope | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const { event_id, event_type, version, occurred_at, actor_id, correlation_id, context, payload } = parsed;
  if (
    typeof event_id !== 'string' ||
    typeof event_type !== 'string' ||
    typeof occurred_at !== 'string' ||
    typeof actor_id !== 'string'
  ) {
    return null;
  }
  return {
    event_id,
    event_type,
    version: typeof version === 'string' ? version : EVENT_VERSION,
    occurred_at,
    actor_id,
    correlation_id: typeof correlation_id === 'string' ? correlation_id : undefined,
    context: isRecord(context) ? context : undefined,
    payload,
  };
};

// Reads a string field from an event payload without trusting its shape.
export const payloadString = (event: EventEnvelope, key: string): string | undefined => {
  if (!isRecord(event.payload)) return undefined;
  const value = event.payload[key];
  return typeof value === 'string' ? value : undefined;
};

const kafkaFor = (clientId: string) =>
  new Kafka({ clientId, brokers: readConfig().brokers, logLevel: logLevel.NOTHING });

let producerPromise: Promise<Producer> | null = null;
const getProducer = async (): Promise<Producer> => {
  if (!producerPromise) {
    const producer = kafkaFor('huddle-events-producer').producer({ allowAutoTopicCreation: true });
    producerPromise = producer.connect().then(
      () => producer,
      (err: unknown) => {
        producerPromise = null;
        throw err;
      },
    );
  }
  return producerPromise;
};

export const publishEvent = async <T>(topic: string, event: EventEnvelope<T>): Promise<void> => {
  const producer = await getProducer();
  await producer.send({
    topic,
    messages: [
      {
        key: event.event_id,
        value: JSON.stringify(event),
        headers: { 'x-correlation-id': event.correlation_id || '' },
      },
    ],
  });
};

export const disconnectProducer = async (): Promise<void> => {
  if (!producerPromise) return;
  const producer = await producerPromise;
  producerPromise = null;
  await producer.disconnect();
};

export const persistEvent = async <T>(
  pool: Pool,
  event: EventEnvelope<T>,
  options?: { idempotencyKey?: string; context?: Record<string, unknown> },
): Promise<void> => {
  await pool.query(
    `insert into events (
      event_id, event_type, occurred_at, actor_id, correlation_id, idempotency_key, context, payload
    ) values ($1,$2,$3,$4,$5,$6,$7,$8)`,
    [
      event.event_id,
      event.event_type,
      event.occurred_at,
      event.actor_id,
      event.correlation_id ?? null,
      options?.idempotencyKey ?? null,
      JSON.stringify(options?.context ?? {}),
      JSON.stringify(event.payload),
    ],
  );
};

export interface EventSink {
  emit<T>(eventType: string, payload: T, options: EmitOptions): Promise<EventEnvelope<T>>;
}

// Persist, publish, and fall back to the outbox when the broker is down.
export const createEventSink = (pool: Pool, topic: Topic): EventSink => ({
  async emit(eventType, payload, options) {
    const evt = buildEvent(eventType, payload, options);
    await persistEvent(pool, evt, { idempotencyKey: options.idempotencyKey, context: options.context });
    try {
      await publishEvent(topic, evt);
    } catch (err) {
      logger.warn('publish failed, queued to outbox', {
        topic,
        event_id: evt.event_id,
        err: err instanceof Error ? err.message : String(err),
      });
      await recordOutbox(pool, topic, evt.event_id, evt);
    }
    return evt;
  },
});

export const createLogEventSink = (topic: Topic): EventSink => ({
  async emit(eventType, payload, options) {
    const evt = buildEvent(eventType, payload, options);
    logger.info('event', { topic, event_type: evt.event_type, event_id: evt.event_id, actor_id: evt.actor_id });
    return evt;
  },
});

export const startOutboxDispatcher = (pool: Pool, intervalMs = 10_000): (() => void) => {
  let running = false;
  const id = setInterval(() => {
    if (running) return;
    running = true;
    dispatchOutbox(pool, async (topic, payload) => {
      const evt = parseEnvelope(JSON.stringify(payload));
      if (!evt) throw new Error('malformed outbox payload');
      await publishEvent(topic, evt);
    })
      .catch((err: unknown) =>
        logger.error('outbox dispatch failed', { err: err instanceof Error ? err.message : String(err) }),
      )
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  return () => clearInterval(id);
};

export type ConsumerMeta = { topic: string; partition: number; offset: string; timestamp?: string };
export type ConsumerHandler = (event: EventEnvelope, meta?: ConsumerMeta) => Promise<void>;

export const runConsumer = async ({
  groupId,
  topics,
  handler,
  dlq = true,
  maxAttempts = 3,
}: {
  groupId: string;
  topics: string[];
  handler: ConsumerHandler;
  dlq?: boolean;
  maxAttempts?: number;
}): Promise<Consumer> => {
  const kafka = kafkaFor('huddle-events-consumer');
  const consumer: Consumer = kafka.consumer({ groupId });
  await consumer.connect();
  for (const t of topics) {
    await consumer.subscribe({ topic: t, fromBeginning: true });
  }
  await consumer.run({
    eachMessage: async ({ topic, partition, message }) => {
      const value = message.value?.toString();
      if (!value) return;
      const envelope = parseEnvelope(value);
      if (!envelope) {
        logger.warn('dropping malformed event', { topic, offset: message.offset });
        return;
      }
      const meta: ConsumerMeta = {
        topic,
        partition,
        offset: message.offset,
        timestamp: message.timestamp,
      };
      for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
        try {
          await handler(envelope, meta);
          return;
        } catch (err) {
          logger.warn('event handler failed', {
            topic,
            event_id: envelope.event_id,
            attempt,
            err: err instanceof Error ? err.message : String(err),
          });
        }
      }
      if (dlq) {
        const producer = kafka.producer();
        await producer.connect();
        try {
          await producer.send({ topic: `dlq.${topic}`, messages: [{ key: envelope.event_id, value }] });
        } finally {
          await producer.disconnect();
        }
      }
    },
  });
  return consumer;
};
