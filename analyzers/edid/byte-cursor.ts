"use strict";

import type { EdidByteSource } from "./byte-source.js";
import { EDID_CHUNK_SIZE } from "./constants.js";
import { EdidDecodeError } from "./errors.js";

export class EdidByteCursor {
  readonly source: EdidByteSource;
  readonly chunkSize: number;

  chunkBytes: Uint8Array;
  chunkLength = 0;
  chunkIndex = 0;
  consumed = 0;

  constructor(source: EdidByteSource, chunkSize = EDID_CHUNK_SIZE) {
    this.source = source;
    this.chunkSize = chunkSize;
    this.chunkBytes = new Uint8Array(chunkSize);
  }

  private refill(): void {
    let count: number | null;
    try {
      count = this.source.fill(this.chunkBytes);
    } catch (error) {
      throw new EdidDecodeError(
        "source-failure",
        `Byte source failed after ${this.consumed} bytes.`,
        { cause: error }
      );
    }
    if (count == null || !Number.isInteger(count) || count < 0 || count > this.chunkSize) {
      throw new EdidDecodeError("source-failure", `Byte source failed after ${this.consumed} bytes.`);
    }
    if (count === 0) {
      throw new EdidDecodeError(
        "unexpected-end-of-data",
        `Unexpected end of data after ${this.consumed} bytes.`
      );
    }
    this.chunkLength = count;
    this.chunkIndex = 0;
  }

  nextByte(): number {
    if (this.chunkIndex >= this.chunkLength) this.refill();
    const value = this.chunkBytes[this.chunkIndex] ?? 0;
    this.chunkIndex += 1;
    this.consumed += 1;
    return value;
  }

  nextU16le(): number {
    const low = this.nextByte();
    const high = this.nextByte();
    return low | (high << 8);
  }

  nextU32le(): number {
    const low = this.nextU16le();
    const high = this.nextU16le();
    return (low | (high << 16)) >>> 0;
  }

  nextBytes(count: number): number[] {
    const out: number[] = [];
    for (let index = 0; index < count; index += 1) out.push(this.nextByte());
    return out;
  }
}
