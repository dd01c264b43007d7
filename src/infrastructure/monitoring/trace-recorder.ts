/**
 * HTTP exchange history kept in a bounded ring buffer
 */

import { RingBuffer, DEFAULT_RING_BUFFER_CAPACITY } from '../../shared/utils/ring-buffer';
import { HeaderMap, HttpTrace, TraceRecord } from '../../types';

export type RawHeaderValue = string | number | string[] | undefined;

export interface TraceExchange {
  method: string;
  uri: string;
  requestHeaders: Record<string, RawHeaderValue>;
  status: number;
  responseHeaders: Record<string, RawHeaderValue>;
  requestTime: Date;
  responseTime: Date;
}

/**
 * Header names are lower-cased; every value becomes a list of strings.
 */
export function normalizeHeaders(headers: Record<string, RawHeaderValue>): HeaderMap {
  const normalized: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    const key = name.toLowerCase();
    const values = Array.isArray(value) ? value : [String(value)];
    normalized[key] = [...(normalized[key] ?? []), ...values];
  }
  return normalized;
}

function freezeHeaders(headers: HeaderMap): HeaderMap {
  const copy: HeaderMap = {};
  for (const [name, values] of Object.entries(headers)) {
    const frozen = [...values];
    Object.freeze(frozen);
    copy[name] = frozen;
  }
  return Object.freeze(copy);
}

export function createTraceRecord(exchange: TraceExchange): TraceRecord {
  return {
    timestamp: exchange.requestTime,
    principal: null,
    session: null,
    request: {
      method: exchange.method,
      uri: exchange.uri,
      headers: normalizeHeaders(exchange.requestHeaders)
    },
    response: {
      status: exchange.status,
      headers: normalizeHeaders(exchange.responseHeaders)
    },
    timeTaken: Math.max(0, Math.trunc(exchange.responseTime.getTime() - exchange.requestTime.getTime()))
  };
}

export class TraceRecorder {
  private readonly records: RingBuffer<Readonly<TraceRecord>>;

  constructor(capacity: number = DEFAULT_RING_BUFFER_CAPACITY) {
    this.records = new RingBuffer(capacity);
  }

  /**
   * Stores a frozen deep copy; later changes to `record` do not reach the history.
   */
  addRecord(record: TraceRecord): void {
    this.records.push(Object.freeze({
      ...record,
      timestamp: new Date(record.timestamp.getTime()),
      request: Object.freeze({ ...record.request, headers: freezeHeaders(record.request.headers) }),
      response: Object.freeze({ ...record.response, headers: freezeHeaders(record.response.headers) })
    }));
  }

  getHttpTrace(): HttpTrace {
    return { traces: this.records.snapshot() };
  }

  get size(): number {
    return this.records.length;
  }
}
