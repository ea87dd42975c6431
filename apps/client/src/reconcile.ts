import type { LocalMessage } from './outbox';
import type { ServerMessage } from './types';

export const MATCH_WINDOW_MS = 15_000;

export type TimelineItem =
  | { kind: 'server'; message: ServerMessage }
  | { kind: 'local'; message: LocalMessage };

export type Reconciled = {
  timeline: TimelineItem[];
  // local messages a server row now stands in for
  confirmed: Array<{ client_id: string; message: ServerMessage }>;
};

const timeOf = (iso: string) => new Date(iso).getTime();

/**
 * Merges optimistic local messages with server rows. A local message is matched by
 * client id first, then by sender and body within `windowMs`, nearest first. Each server
 * row stands in for at most one local message.
 */
export const reconcile = (
  local: LocalMessage[],
  server: ServerMessage[],
  options: { windowMs?: number } = {},
): Reconciled => {
  const windowMs = options.windowMs ?? MATCH_WINDOW_MS;
  const rows = [...server].sort((a, b) => a.seq - b.seq);
  const claimed = new Set<string>();
  const matched = new Map<string, ServerMessage>();

  for (const l of local) {
    const row = rows.find(
      (s) =>
        !claimed.has(s.id) &&
        s.client_id === l.client_id &&
        s.sender_id === l.sender_id &&
        s.conversation_id === l.conversation_id,
    );
    if (!row) continue;
    claimed.add(row.id);
    matched.set(l.client_id, row);
  }

  for (const l of local) {
    if (matched.has(l.client_id)) continue;
    const at = timeOf(l.created_at);
    let best: { row: ServerMessage; distance: number } | null = null;
    for (const s of rows) {
      if (claimed.has(s.id) || s.sender_id !== l.sender_id || s.conversation_id !== l.conversation_id) continue;
      if (s.body !== l.body) continue;
      const distance = Math.abs(timeOf(s.created_at) - at);
      if (distance > windowMs) continue;
      if (!best || distance < best.distance) best = { row: s, distance };
    }
    if (!best) continue;
    claimed.add(best.row.id);
    matched.set(l.client_id, best.row);
  }

  const unmatched = local
    .map((message, index) => ({ message, index }))
    .filter(({ message }) => !matched.has(message.client_id))
    .sort((a, b) => timeOf(a.message.created_at) - timeOf(b.message.created_at) || a.index - b.index)
    .map(({ message }): TimelineItem => ({ kind: 'local', message }));

  return {
    timeline: [...rows.map((message): TimelineItem => ({ kind: 'server', message })), ...unmatched],
    confirmed: [...matched].map(([client_id, message]) => ({ client_id, message })),
  };
};
