// src/tcp/frameSplitter.ts
// CRLF line framing for the watch TCP stream

export const FRAME_DELIMITER = "\r\n";
const DELIMITER_BYTES = Buffer.from(FRAME_DELIMITER, "latin1");

export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024;

/**
 * Accumulates socket chunks and hands back complete frames (delimiter stripped).
 * One instance per connection.
 */
export class FrameSplitter {
  private buffer: Buffer = Buffer.alloc(0);
  private maxFrameBytes: number;

  constructor(maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {
    this.maxFrameBytes = maxFrameBytes;
  }

  push(chunk: Buffer): string[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: string[] = [];

    let end: number;
    while ((end = this.buffer.indexOf(DELIMITER_BYTES)) >= 0) {
      const frame = this.buffer.subarray(0, end);
      this.buffer = this.buffer.subarray(end + DELIMITER_BYTES.length);

      if (frame.length === 0) continue;
      if (frame.length > this.maxFrameBytes) {
        console.warn(`⚠️ Dropping oversized frame (${frame.length} > ${this.maxFrameBytes} bytes)`);
        continue;
      }
      frames.push(frame.toString("utf8"));
    }

    // Partial frame that can no longer fit: drop it and resync on the next delimiter
    if (this.buffer.length > this.maxFrameBytes) {
      console.warn(`⚠️ Dropping ${this.buffer.length} buffered bytes without a delimiter`);
      this.buffer = Buffer.alloc(0);
    }

    return frames;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }
}

export const encodeFrame = (frame: string): string => frame + FRAME_DELIMITER;
