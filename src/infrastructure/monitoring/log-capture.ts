/**
 * In-memory capture of emitted log lines, addressable by byte ranges so a
 * monitoring UI can tail it with `Range` requests.
 */

import { LogSink } from '../../shared/utils/logger';
import { InvalidArgumentError, LogChunk, LogfileSlice, RangeNotSatisfiableError } from '../../types';

const INITIAL_CAPACITY = 4096;
const RANGE_PATTERN = /^bytes=(\d*)-(\d*)$/;

interface ResolvedRange {
  start: number;
  end: number;
}

/**
 * Resolves a single `bytes=` specifier against the given total length.
 * The returned `end` is inclusive and clamped to the last byte.
 */
export function resolveByteRange(rangeHeader: string, totalLength: number): ResolvedRange {
  const match = RANGE_PATTERN.exec(rangeHeader.trim());
  if (!match) {
    throw new InvalidArgumentError(`Malformed range header: ${rangeHeader}`, { range: rangeHeader });
  }

  const [, rawStart, rawEnd] = match;
  let start: number;
  let end: number;

  if (rawStart === '' && rawEnd === '') {
    throw new InvalidArgumentError(`Malformed range header: ${rangeHeader}`, { range: rangeHeader });
  } else if (rawStart === '') {
    // suffix form: last N bytes
    start = Math.max(0, totalLength - Number(rawEnd));
    end = totalLength - 1;
  } else {
    start = Number(rawStart);
    end = rawEnd === '' ? totalLength - 1 : Math.min(Number(rawEnd), totalLength - 1);
  }

  if (start > totalLength || start > end) {
    throw new RangeNotSatisfiableError(rangeHeader, totalLength);
  }

  return { start, end };
}

export class LogCapture implements LogSink {
  private buffer: Buffer = Buffer.alloc(INITIAL_CAPACITY);
  private length: number = 0;

  append(line: string): void {
    const bytes = Buffer.from(`${line}\n`, 'utf8');
    this.ensureCapacity(this.length + bytes.length);
    bytes.copy(this.buffer, this.length);
    this.length += bytes.length;
  }

  get totalLength(): number {
    return this.length;
  }

  getRange(): LogChunk {
    return {
      content: this.buffer.toString('utf8', 0, this.length),
      length: this.length
    };
  }

  getLogfile(rangeHeader: string): LogfileSlice {
    const totalLength = this.length;
    const { start, end } = resolveByteRange(rangeHeader, totalLength);
    return {
      content: Buffer.from(this.buffer.subarray(start, end + 1)),
      start,
      end
    };
  }

  reset(): void {
    this.buffer = Buffer.alloc(INITIAL_CAPACITY);
    this.length = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = Buffer.alloc(capacity);
    this.buffer.copy(grown, 0, 0, this.length);
    this.buffer = grown;
  }
}
