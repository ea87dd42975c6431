import { v4 as uuidv4 } from 'uuid';
import { ApiError } from './api';
import type { ServerMessage } from './types';

export type LocalStatus = 'pending' | 'failed' | 'sent';

export type LocalMessage = {
  client_id: string;
  conversation_id: string;
  sender_id: string;
  body: string;
  created_at: string;
  status: LocalStatus;
  attempts: number;
  retryable: boolean;
  error: string | null;
  server_id: string | null;
};

export type OutboxOptions = {
  senderId: string;
  maxAttempts?: number;
  now?: () => Date;
  newId?: () => string;
};

export type FlushResult = { sent: number; failed: number };

/** Network failures, timeouts, throttling and server errors are worth another attempt. */
export const isTransient = (error: unknown): boolean => {
  if (!(error instanceof ApiError)) return true;
  return error.status === 0 || error.status === 408 || error.status === 429 || error.status >= 500;
};

const errorCode = (error: unknown) =>
  error instanceof ApiError ? error.code : error instanceof Error ? error.message : String(error);

export class Outbox {
  private readonly messages = new Map<string, LocalMessage>();
  private readonly maxAttempts: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly options: OutboxOptions) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? uuidv4;
  }

  enqueue(conversationId: string, body: string): LocalMessage {
    const message: LocalMessage = {
      client_id: this.newId(),
      conversation_id: conversationId,
      sender_id: this.options.senderId,
      body,
      created_at: this.now().toISOString(),
      status: 'pending',
      attempts: 0,
      retryable: false,
      error: null,
      server_id: null,
    };
    this.messages.set(message.client_id, message);
    return { ...message };
  }

  get(clientId: string): LocalMessage | undefined {
    const found = this.messages.get(clientId);
    return found ? { ...found } : undefined;
  }

  markSent(clientId: string, message: ServerMessage): void {
    const local = this.messages.get(clientId);
    if (!local) return;
    local.status = 'sent';
    local.retryable = false;
    local.error = null;
    local.server_id = message.id;
  }

  markFailed(clientId: string, error: unknown): void {
    const local = this.messages.get(clientId);
    if (!local) return;
    local.attempts += 1;
    local.status = 'failed';
    local.error = errorCode(error);
    local.retryable = isTransient(error) && local.attempts < this.maxAttempts;
  }

  remove(clientId: string): void {
    this.messages.delete(clientId);
  }

  /** Messages in creation order, optionally for one conversation. */
  list(conversationId?: string): LocalMessage[] {
    return [...this.messages.values()]
      .filter((m) => conversationId === undefined || m.conversation_id === conversationId)
      .map((m) => ({ ...m }));
  }

  /** Sends pending and retryable messages one at a time. */
  async flush(send: (message: LocalMessage) => Promise<ServerMessage>, conversationId?: string): Promise<FlushResult> {
    const result: FlushResult = { sent: 0, failed: 0 };
    const due = this.list(conversationId).filter((m) => m.status === 'pending' || (m.status === 'failed' && m.retryable));
    for (const message of due) {
      try {
        this.markSent(message.client_id, await send(message));
        result.sent += 1;
      } catch (err) {
        this.markFailed(message.client_id, err);
        result.failed += 1;
      }
    }
    return result;
  }
}
