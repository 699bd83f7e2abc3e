"use strict";

import { readSync } from "node:fs";

// A source fills the caller's buffer and reports how many bytes it wrote,
// or null when the read itself failed. Zero means the data ran out.
export interface EdidByteSource {
  fill(buffer: Uint8Array): number | null;
}

export const bytesSource = (bytes: Uint8Array): EdidByteSource => {
  let position = 0;
  return {
    fill(buffer: Uint8Array): number {
      const count = Math.min(buffer.length, bytes.length - position);
      buffer.set(bytes.subarray(position, position + count));
      position += count;
      return count;
    }
  };
};

// Errors thrown by readSync surface from the cursor as source failures.
export const fileDescriptorSource = (fd: number): EdidByteSource => ({
  fill(buffer: Uint8Array): number {
    return readSync(fd, buffer, 0, buffer.length, null);
  }
});
