import type { ApiClient } from './api';
import { LocalMessage, Outbox } from './outbox';
import { reconcile, TimelineItem } from './reconcile';
import type { ServerMessage } from './types';

export type SyncApi = Pick<ApiClient, 'listMessages' | 'sendMessage'>;

export type ConversationSyncOptions = {
  api: SyncApi;
  conversationId: string;
  outbox: Outbox;
  onChange: (timeline: TimelineItem[]) => void;
  onError?: (error: unknown) => void;
  intervalMs?: number;
  maxIntervalMs?: number;
  windowMs?: number;
};

/** Polls one conversation by seq cursor and keeps the optimistic timeline current. */
export class ConversationSync {
  private readonly messages = new Map<string, ServerMessage>();
  private readonly intervalMs: number;
  private readonly maxIntervalMs: number;
  private cursor: number | undefined;
  private delay: number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(private readonly options: ConversationSyncOptions) {
    this.intervalMs = options.intervalMs ?? 3000;
    this.maxIntervalMs = options.maxIntervalMs ?? 30_000;
    this.delay = this.intervalMs;
  }

  get delayMs(): number {
    return this.delay;
  }

  get lastSeq(): number | undefined {
    return this.cursor;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  /** Fetches everything after the cursor. Throws on failure. */
  async poll(): Promise<void> {
    const page = await this.options.api.listMessages(this.options.conversationId, { after: this.cursor });
    this.merge(page.messages);
    if (page.next_cursor !== null) this.cursor = Math.max(this.cursor ?? 0, page.next_cursor);
    this.notify();
  }

  /** One poll with backoff bookkeeping: failures double the delay, success resets it. */
  async refresh(): Promise<boolean> {
    try {
      await this.poll();
      this.delay = this.intervalMs;
      return true;
    } catch (err) {
      this.delay = Math.min(this.delay * 2, this.maxIntervalMs);
      this.options.onError?.(err);
      return false;
    }
  }

  async send(body: string): Promise<LocalMessage | undefined> {
    const local = this.options.outbox.enqueue(this.options.conversationId, body);
    this.notify();
    try {
      this.options.outbox.markSent(local.client_id, await this.deliver(local));
    } catch (err) {
      this.options.outbox.markFailed(local.client_id, err);
    }
    const current = this.options.outbox.get(local.client_id);
    this.notify();
    return current;
  }

  async retry(): Promise<void> {
    await this.options.outbox.flush((m) => this.deliver(m), this.options.conversationId);
    this.notify();
  }

  timeline(): TimelineItem[] {
    return reconcile(this.options.outbox.list(this.options.conversationId), [...this.messages.values()], {
      windowMs: this.options.windowMs,
    }).timeline;
  }

  private async deliver(local: LocalMessage): Promise<ServerMessage> {
    const { message } = await this.options.api.sendMessage(this.options.conversationId, local.body, local.client_id);
    this.merge([message]);
    return message;
  }

  private merge(messages: ServerMessage[]): void {
    for (const m of messages) this.messages.set(m.id, m);
  }

  private notify(): void {
    const { outbox, conversationId, windowMs } = this.options;
    const local = outbox.list(conversationId);
    const result = reconcile(local, [...this.messages.values()], { windowMs });
    // a server row stands in for the local copy, whatever its last delivery outcome
    for (const { client_id, message } of result.confirmed) {
      outbox.markSent(client_id, message);
      outbox.remove(client_id);
    }
    this.options.onChange(result.timeline);
  }

  private schedule(ms: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.refresh().then(
        () => this.schedule(this.delay),
        (err: unknown) => this.options.onError?.(err),
      );
    }, ms);
  }
}
