import type {
  ClientMessage,
  ComponentUpdate,
  NotificationCategory,
  ServerMessage,
  StatsData,
} from '../types/messages.js';
import { MessageParseError } from '../errors.js';
import { isPlainRecord, sanitizeJson } from './sanitize.js';

export type DecodeResult =
  | { ok: true; message: ServerMessage }
  | { ok: false; error: MessageParseError };

const CATEGORIES: readonly NotificationCategory[] = ['info', 'success', 'warning', 'error'];

function toCategory(value: unknown): NotificationCategory {
  return CATEGORIES.find((c) => c === value) ?? 'info';
}

function fail(reason: string, raw: string, cause?: unknown): DecodeResult {
  return { ok: false, error: new MessageParseError(reason, raw, cause) };
}

function decodeStats(data: unknown): StatsData | null {
  if (!isPlainRecord(data)) return null;
  const stats: StatsData = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
      stats[key] = value;
    }
  }
  return stats;
}

function decodeUpdate(frame: Record<string, unknown>): ComponentUpdate | string {
  const { component, data } = frame;
  if (typeof component !== 'string' || component === '') {
    return { component: 'unknown', name: '', data };
  }

  switch (component) {
    case 'stats': {
      const stats = decodeStats(data);
      return stats ? { component: 'stats', data: stats } : 'stats update data is not an object';
    }
    case 'users':
      if (typeof data === 'number' || typeof data === 'string') {
        return { component: 'users', data };
      }
      return 'users update data is not a number or string';
    default:
      return { component: 'unknown', name: component, data };
  }
}

/**
 * Decode one inbound text frame into a `ServerMessage`.
 * Never throws: malformed frames come back as `{ ok: false }`.
 */
export function decodeServerMessage(raw: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = sanitizeJson(JSON.parse(raw));
  } catch (err) {
    return fail('frame is not valid JSON', raw, err);
  }

  if (!isPlainRecord(parsed)) return fail('frame is not a JSON object', raw);
  const { type } = parsed;
  if (typeof type !== 'string') return fail('frame has no string "type"', raw);

  switch (type) {
    case 'pong': {
      const { timestamp } = parsed;
      return {
        ok: true,
        message: typeof timestamp === 'string' || typeof timestamp === 'number'
          ? { type: 'pong', timestamp }
          : { type: 'pong' },
      };
    }
    case 'notification': {
      const { message, category } = parsed;
      if (typeof message !== 'string') return fail('notification without a string "message"', raw);
      return { ok: true, message: { type: 'notification', message, category: toCategory(category) } };
    }
    case 'update': {
      const update = decodeUpdate(parsed);
      if (typeof update === 'string') return fail(update, raw);
      return { ok: true, message: { type: 'update', update } };
    }
    default:
      return { ok: true, message: { type: 'unknown', rawType: type } };
  }
}

export function encodeClientMessage(message: ClientMessage): string {
  return JSON.stringify(message);
}
