"use strict";

import { isBitSet, readTwoBits } from "./bits.js";
import type { EdidByteCursor } from "./byte-cursor.js";
import {
  ASPECT_RATIOS,
  EDID_BASE_STANDARD_TIMING_COUNT,
  EDID_STANDARD_TIMING_UNUSED,
  ESTABLISHED_TIMINGS
} from "./constants.js";
import type { EdidEstablishedTiming, EdidStandardTiming } from "./types.js";

export const decodeEstablishedTimings = (bitmask: number): EdidEstablishedTiming[] =>
  ESTABLISHED_TIMINGS.filter(([, bit]) => isBitSet(bitmask, bit)).map(([name]) => name);

export const parseEstablishedTimings = (cursor: EdidByteCursor): EdidEstablishedTiming[] => {
  const word = cursor.nextU16le();
  const manufacturerByte = cursor.nextByte();
  const bitmask = word | (isBitSet(manufacturerByte, 7) ? 1 << 16 : 0);
  return decodeEstablishedTimings(bitmask);
};

export const decodeStandardTiming = (first: number, second: number): EdidStandardTiming | null => {
  if (first === EDID_STANDARD_TIMING_UNUSED && second === EDID_STANDARD_TIMING_UNUSED) return null;
  const [aspectRatio, aspectRatioValue] = ASPECT_RATIOS[readTwoBits(second, 6)];
  return {
    horizontalResolution: (first + 31) * 8,
    aspectRatio,
    aspectRatioValue,
    refreshRate: (second & 0x3f) + 60
  };
};

export const parseStandardTimings = (cursor: EdidByteCursor, count: number): EdidStandardTiming[] => {
  const timings: EdidStandardTiming[] = [];
  for (let index = 0; index < count; index += 1) {
    const first = cursor.nextByte();
    const second = cursor.nextByte();
    const timing = decodeStandardTiming(first, second);
    if (timing) timings.push(timing);
  }
  return timings;
};

export type EdidTimingTables = {
  established: EdidEstablishedTiming[];
  standard: EdidStandardTiming[];
};

export const parseTimingTables = (cursor: EdidByteCursor): EdidTimingTables => {
  const established = parseEstablishedTimings(cursor);
  const standard = parseStandardTimings(cursor, EDID_BASE_STANDARD_TIMING_COUNT);
  return { established, standard };
};
