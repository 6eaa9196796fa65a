/**
 * Frame codec
 *
 * A frame is a 4-byte unsigned payload length in host byte order followed
 * by the UTF-8 JSON payload.
 */

import { endianness } from 'node:os';
import { FRAME_HEADER_BYTES, MAX_FRAME_BYTES } from './constants.js';
import { ProtocolError } from './errors.js';
import { GreetdResponseSchema } from './schemas.js';
import type { GreetdRequest, GreetdResponse } from './types.js';

const LITTLE_ENDIAN = endianness() === 'LE';

function writeLength(target: Buffer, length: number): void {
  if (LITTLE_ENDIAN) {
    target.writeUInt32LE(length, 0);
  } else {
    target.writeUInt32BE(length, 0);
  }
}

function readLength(source: Buffer): number {
  return LITTLE_ENDIAN ? source.readUInt32LE(0) : source.readUInt32BE(0);
}

export function encodeFrame(message: GreetdRequest | GreetdResponse): Buffer {
  const payload = Buffer.from(JSON.stringify(message), 'utf8');
  const frame = Buffer.alloc(FRAME_HEADER_BYTES + payload.length);
  writeLength(frame, payload.length);
  payload.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Parse and validate one response payload.
 */
export function decodeResponse(payload: Buffer): GreetdResponse {
  let json: unknown;
  try {
    json = JSON.parse(payload.toString('utf8'));
  } catch (err) {
    throw new ProtocolError(err instanceof Error ? err.message : 'invalid JSON');
  }

  const result = GreetdResponseSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ProtocolError(issue ? `${issue.path.join('.') || 'frame'}: ${issue.message}` : 'unexpected shape');
  }
  return result.data;
}

/**
 * Reassembles frames from a byte stream.
 */
export class FrameDecoder {
  private pending: Buffer = Buffer.alloc(0);

  /** Append bytes and return every payload completed by them */
  push(chunk: Buffer): Buffer[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const frames: Buffer[] = [];

    while (this.pending.length >= FRAME_HEADER_BYTES) {
      const length = readLength(this.pending);
      if (length > MAX_FRAME_BYTES) {
        throw new ProtocolError(`frame of ${length} bytes exceeds limit`);
      }
      if (this.pending.length < FRAME_HEADER_BYTES + length) break;
      frames.push(this.pending.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length));
      this.pending = this.pending.subarray(FRAME_HEADER_BYTES + length);
    }

    return frames;
  }

  /** Bytes received but not yet part of a complete frame */
  get buffered(): number {
    return this.pending.length;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}
