import { FilterValue, Instance, InstanceKey, InstancePredicate } from '../../types';

/**
 * Loosely typed lookup filter, as it arrives on a query string.
 */
export interface LookupQuery {
  service?: string;
  mode?: string;
  metadata?: Record<string, string>;
}

export interface PredicateOptions {
  aliveOnly: boolean;
  ttlMs: number;
  now: number;
}

const CANONICAL_NUMBER = /^-?(0|[1-9]\d*)(\.\d+)?$/;

/**
 * Coerce one filter value from text: boolean literals first, then a
 * decimal number whose text reads back unchanged, otherwise the text
 * itself. `1.0`, `2.50` and `-0` stay strings so stored strings with
 * that exact text still match.
 */
export function coerceFilterValue(text: string): FilterValue {
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (CANONICAL_NUMBER.test(text)) {
    const parsed = Number(text);
    if (Number.isFinite(parsed) && String(parsed) === text) return parsed;
  }
  return text;
}

/**
 * Type-aware equality. A number and a string are equal only when the
 * string is exactly the number's decimal form.
 */
export function valuesEqual(stored: unknown, wanted: FilterValue): boolean {
  if (stored === wanted) return true;
  if (typeof stored === 'number' && typeof wanted === 'string') {
    return String(stored) === wanted;
  }
  if (typeof stored === 'string' && typeof wanted === 'number') {
    return stored === String(wanted);
  }
  return false;
}

export function readField(instance: Instance, path: string): unknown {
  if (path.startsWith('metadata.')) {
    const key = path.slice('metadata.'.length);
    const fields: Record<string, unknown> = { ...instance.metadata };
    return Object.prototype.hasOwnProperty.call(fields, key) ? fields[key] : undefined;
  }

  switch (path) {
    case 'serviceName': return instance.serviceName;
    case 'id': return instance.id;
    case 'host': return instance.host;
    case 'port': return instance.port;
    case 'mode': return instance.mode;
    case 'health': return instance.health;
    case 'lastHeartbeat': return instance.lastHeartbeat;
    default: return undefined;
  }
}

export function heartbeatMillis(instance: Instance): number {
  return Date.parse(instance.lastHeartbeat);
}

export function matchesPredicate(instance: Instance, predicate: InstancePredicate): boolean {
  if (predicate.equals) {
    for (const [path, wanted] of Object.entries(predicate.equals)) {
      if (!valuesEqual(readField(instance, path), wanted)) {
        return false;
      }
    }
  }

  if (predicate.heartbeatAtOrAfter !== undefined || predicate.heartbeatBefore !== undefined) {
    const heartbeat = heartbeatMillis(instance);
    if (predicate.heartbeatAtOrAfter !== undefined && !(heartbeat >= predicate.heartbeatAtOrAfter)) {
      return false;
    }
    if (predicate.heartbeatBefore !== undefined && !(heartbeat < predicate.heartbeatBefore)) {
      return false;
    }
  }

  return true;
}

/**
 * Build a store predicate from a lookup filter. With `aliveOnly` the
 * predicate also requires `lastHeartbeat >= now - ttl`.
 */
export function buildPredicate(query: LookupQuery, options: PredicateOptions): InstancePredicate {
  const equals: Record<string, FilterValue> = Object.create(null);

  if (query.service) {
    equals.serviceName = query.service;
  }
  if (query.mode) {
    equals.mode = query.mode;
  }
  for (const [key, text] of Object.entries(query.metadata ?? {})) {
    if (key !== '' && text !== '') {
      equals[`metadata.${key}`] = coerceFilterValue(text);
    }
  }

  const predicate: InstancePredicate = { equals };
  if (options.aliveOnly) {
    predicate.heartbeatAtOrAfter = options.now - options.ttlMs;
  }
  return predicate;
}

/**
 * Predicate matching exactly one instance key.
 */
export function keyPredicate(key: InstanceKey): InstancePredicate {
  return { equals: { serviceName: key.serviceName, id: key.id } };
}

/**
 * Split query-string parameters into a lookup filter: `service` and `mode`
 * are reserved, every other parameter filters on metadata. The first value
 * of a repeated parameter wins.
 */
export function parseLookupParams(params: URLSearchParams): LookupQuery {
  const query: LookupQuery = {};
  const metadata: Record<string, string> = Object.create(null);

  for (const [key, value] of params) {
    if (key === 'service') {
      if (query.service === undefined) query.service = value;
    } else if (key === 'mode') {
      if (query.mode === undefined) query.mode = value;
    } else if (!(key in metadata)) {
      metadata[key] = value;
    }
  }

  query.metadata = metadata;
  return query;
}
