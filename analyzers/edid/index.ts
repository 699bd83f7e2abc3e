"use strict";

import { EdidByteCursor } from "./byte-cursor.js";
import { bytesSource } from "./byte-source.js";
import type { EdidByteSource } from "./byte-source.js";
import { assembleColorCharacteristics, parseBaseChromaticity } from "./color.js";
import {
  EDID_BLOCK_SIZE,
  EDID_DESCRIPTOR_SLOT_COUNT,
  EDID_HEADER_BYTES,
  EDID_HEADER_WORD_HIGH,
  EDID_HEADER_WORD_LOW
} from "./constants.js";
import { parseDetailedSlot } from "./detailed-timing.js";
import type { EdidTimingSink } from "./detailed-timing.js";
import { parseDisplayParameters } from "./display.js";
import { EdidDecodeError } from "./errors.js";
import { parseProductInfo, parseVersion } from "./product.js";
import { parseTimingTables } from "./timings.js";
import type { EdidDecodeOptions, EdidRecord } from "./types.js";

export type EdidDecodeResult =
  | { ok: true; edid: EdidRecord }
  | { ok: false; error: EdidDecodeError; offset: number };

export type EdidFileLike = {
  readonly size: number;
  slice(start?: number, end?: number): { arrayBuffer(): Promise<ArrayBuffer> };
};

const parseHeader = (cursor: EdidByteCursor): void => {
  if (cursor.nextU32le() !== EDID_HEADER_WORD_LOW || cursor.nextU32le() !== EDID_HEADER_WORD_HIGH) {
    throw new EdidDecodeError("header-invalid", "Block does not start with the EDID header 00 FF FF FF FF FF FF 00.");
  }
};

const parseRecord = (cursor: EdidByteCursor, options: EdidDecodeOptions): EdidRecord => {
  parseHeader(cursor);
  const product = parseProductInfo(cursor);
  const version = parseVersion(cursor);
  const display = parseDisplayParameters(cursor);
  const chromaticity = parseBaseChromaticity(cursor);
  const tables = parseTimingTables(cursor);

  const sink: EdidTimingSink = {
    detailedTimings: [],
    standardTimings: [],
    whitePoints: [],
    descriptors: []
  };
  for (let slot = 0; slot < EDID_DESCRIPTOR_SLOT_COUNT; slot += 1) {
    parseDetailedSlot(cursor, slot, sink, options);
  }
  const extensions = cursor.nextByte();

  return {
    product,
    version,
    display,
    color: assembleColorCharacteristics(chromaticity, sink.whitePoints),
    timings: {
      established: tables.established,
      standard: [...tables.standard, ...sink.standardTimings],
      detailed: sink.detailedTimings
    },
    descriptors: sink.descriptors,
    extensions
  };
};

export const decodeEdid = (source: EdidByteSource, options: EdidDecodeOptions = {}): EdidDecodeResult => {
  const cursor = new EdidByteCursor(source);
  try {
    return { ok: true, edid: parseRecord(cursor, options) };
  } catch (error) {
    if (error instanceof EdidDecodeError) return { ok: false, error, offset: cursor.consumed };
    throw error;
  }
};

export const decodeEdidBytes = (bytes: Uint8Array, options: EdidDecodeOptions = {}): EdidDecodeResult =>
  decodeEdid(bytesSource(bytes), options);

export const hasEdidHeader = (bytes: Uint8Array): boolean =>
  bytes.length >= EDID_HEADER_BYTES.length &&
  EDID_HEADER_BYTES.every((expected, index) => bytes[index] === expected);

export const parseEdid = async (
  file: EdidFileLike,
  options: EdidDecodeOptions = {}
): Promise<EdidDecodeResult | null> => {
  const bytes = new Uint8Array(await file.slice(0, Math.min(file.size, EDID_BLOCK_SIZE)).arrayBuffer());
  if (!hasEdidHeader(bytes)) return null;
  return decodeEdidBytes(bytes, options);
};

export type { EdidByteSource } from "./byte-source.js";
export { bytesSource, fileDescriptorSource } from "./byte-source.js";
export type { EdidDecodeOptions, EdidRecord } from "./types.js";
export { EdidDecodeError } from "./errors.js";
export type { EdidErrorKind } from "./errors.js";
