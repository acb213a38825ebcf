import { FrameError } from './errors';
import { type Message, messageSchema } from './models';

/** Line feed. JSON.stringify escapes it inside strings, so it never occurs in a payload. */
export const FRAME_DELIMITER = 0x0a;
export const MAX_FRAME_BYTES = 64 * 1024;

const CARRIAGE_RETURN = 0x0d;

export type DecodeResult =
  | { kind: 'incomplete'; remainder: Buffer }
  | { kind: 'message'; message: Message; remainder: Buffer }
  | { kind: 'error'; error: FrameError; remainder: Buffer };

export type DecodedUnit =
  | { kind: 'message'; message: Message }
  | { kind: 'error'; error: FrameError };

export function encodeMessage<T extends { cmd: string }>(message: T): Buffer {
  return Buffer.from(`${JSON.stringify(message)}\n`, 'utf8');
}

function parseLine(line: Buffer): Message | FrameError {
  const text = line.toString('utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return new FrameError('unparsable payload', text, { cause: err });
  }
  const result = messageSchema.safeParse(parsed);
  if (!result.success) {
    return new FrameError('payload is not an object with a non-empty cmd', text, { value: parsed });
  }
  return result.data;
}

/**
 * Decode at most one message from the front of `buffer`.
 *
 * Blank lines are consumed silently. Without a delimiter the buffer comes back
 * untouched as the remainder, and the caller accumulates more bytes.
 */
export function decodeMessage(buffer: Buffer): DecodeResult {
  let rest = buffer;
  for (;;) {
    const end = rest.indexOf(FRAME_DELIMITER);
    if (end < 0) {
      return { kind: 'incomplete', remainder: rest };
    }
    let line = rest.subarray(0, end);
    rest = rest.subarray(end + 1);
    if (line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN) {
      line = line.subarray(0, line.length - 1);
    }
    if (line.toString('utf8').trim().length === 0) {
      continue;
    }
    const parsed = parseLine(line);
    if (parsed instanceof FrameError) {
      return { kind: 'error', error: parsed, remainder: rest };
    }
    return { kind: 'message', message: parsed, remainder: rest };
  }
}

/**
 * Stateful reassembly over a byte stream: one message may span several chunks
 * and one chunk may carry several messages.
 *
 * A line longer than `maxFrameBytes` is reported once and dropped up to its
 * delimiter, however the bytes were split.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private skipping = false;

  constructor(private readonly maxFrameBytes = MAX_FRAME_BYTES) {}

  push(chunk: Buffer): DecodedUnit[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const units: DecodedUnit[] = [];
    for (;;) {
      const end = this.buffer.indexOf(FRAME_DELIMITER);
      if (this.skipping) {
        if (end < 0) {
          this.buffer = Buffer.alloc(0);
          break;
        }
        this.buffer = this.buffer.subarray(end + 1);
        this.skipping = false;
        continue;
      }
      if (end < 0) {
        if (this.buffer.length > this.maxFrameBytes) {
          units.push(this.oversized(this.buffer));
          this.buffer = Buffer.alloc(0);
          this.skipping = true;
        }
        break;
      }
      const line = this.buffer.subarray(0, end + 1);
      this.buffer = this.buffer.subarray(end + 1);
      if (end > this.maxFrameBytes) {
        units.push(this.oversized(line));
        continue;
      }
      const result = decodeMessage(line);
      if (result.kind === 'message') {
        units.push({ kind: 'message', message: result.message });
      } else if (result.kind === 'error') {
        units.push({ kind: 'error', error: result.error });
      }
    }
    return units;
  }

  /** Bytes received that do not yet form a complete frame. */
  pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.skipping = false;
  }

  private oversized(bytes: Buffer): DecodedUnit {
    const preview = bytes.subarray(0, 120).toString('utf8');
    return {
      kind: 'error',
      error: new FrameError(`line exceeds ${this.maxFrameBytes} bytes, discarding`, preview),
    };
  }
}
