"use strict";

import type { EdidByteCursor } from "./byte-cursor.js";
import { parseWhitePointEntry } from "./color.js";
import {
  EDID_DESCRIPTOR_PAYLOAD_SIZE,
  EDID_DESCRIPTOR_STANDARD_TIMING_COUNT,
  EDID_GTF_START_FREQUENCY_UNIT_HZ,
  EDID_GUARD_WORD,
  EDID_RANGE_HORIZONTAL_UNIT_HZ,
  EDID_RANGE_PIXEL_CLOCK_UNIT_HZ,
  EDID_SECONDARY_TIMING_GTF,
  EDID_SECONDARY_TIMING_NONE,
  EDID_TAG_MANUFACTURER_LAST,
  EDID_TAG_MONITOR_NAME,
  EDID_TAG_OTHER_STRING,
  EDID_TAG_PADDING,
  EDID_TAG_RANGE_LIMITS,
  EDID_TAG_STANDARD_TIMINGS,
  EDID_TAG_UNDEFINED_LAST,
  EDID_TAG_WHITE_POINTS,
  EDID_TEXT_PADDING,
  EDID_TEXT_TERMINATOR,
  EDID_WHITE_POINT_ENTRY_COUNT,
  EDID_WHITE_POINT_ENTRY_SIZE
} from "./constants.js";
import { EdidDecodeError } from "./errors.js";
import { parseStandardTimings } from "./timings.js";
import type {
  EdidDecodeOptions,
  EdidDescriptor,
  EdidSecondaryTiming,
  EdidStandardTiming,
  EdidTextDescriptorKind,
  EdidWhitePoint
} from "./types.js";

// Collects what descriptor slots contribute to the record.
export type EdidDescriptorSink = {
  descriptors: EdidDescriptor[];
  standardTimings: EdidStandardTiming[];
  whitePoints: EdidWhitePoint[];
};

const formatTag = (tag: number): string => `0x${tag.toString(16).padStart(2, "0")}`;

const expectByte = (cursor: EdidByteCursor, expected: number, tag: number, what: string): void => {
  const actual = cursor.nextByte();
  if (actual !== expected) {
    throw new EdidDecodeError(
      "malformed-descriptor",
      `Descriptor ${formatTag(tag)}: expected ${what} ${formatTag(expected)}, found ${formatTag(actual)}.`
    );
  }
};

const expectGuardWord = (cursor: EdidByteCursor, tag: number): void => {
  const actual = cursor.nextU16le();
  if (actual !== EDID_GUARD_WORD) {
    throw new EdidDecodeError(
      "malformed-descriptor",
      `Descriptor ${formatTag(tag)}: expected padding 0x2020, found 0x${actual.toString(16).padStart(4, "0")}.`
    );
  }
};

// Only 0xFC, 0xFE and 0xFF are left once the other tags are dispatched.
const textDescriptorKind = (tag: number): EdidTextDescriptorKind => {
  switch (tag) {
    case EDID_TAG_MONITOR_NAME:
      return "monitor-name";
    case EDID_TAG_OTHER_STRING:
      return "other-string";
    default:
      return "serial-number";
  }
};

export const parseDescriptorText = (cursor: EdidByteCursor, tag: number): string => {
  let text = "";
  let consumed = 0;
  while (consumed < EDID_DESCRIPTOR_PAYLOAD_SIZE) {
    const byteValue = cursor.nextByte();
    consumed += 1;
    if (byteValue === EDID_TEXT_TERMINATOR) break;
    text += String.fromCharCode(byteValue);
  }
  while (consumed < EDID_DESCRIPTOR_PAYLOAD_SIZE) {
    expectByte(cursor, EDID_TEXT_PADDING, tag, "text padding");
    consumed += 1;
  }
  return text;
};

const parseWhitePoints = (cursor: EdidByteCursor, tag: number): EdidWhitePoint[] => {
  const whitePoints: EdidWhitePoint[] = [];
  for (let entry = 0; entry < EDID_WHITE_POINT_ENTRY_COUNT; entry += 1) {
    const index = cursor.nextByte();
    whitePoints.push(parseWhitePointEntry(cursor, index));
    if (index === 0) {
      // Index 0 ends the list; the entries after it are filler.
      cursor.nextBytes(EDID_WHITE_POINT_ENTRY_SIZE * (EDID_WHITE_POINT_ENTRY_COUNT - entry - 1));
      break;
    }
  }
  expectByte(cursor, EDID_TEXT_TERMINATOR, tag, "terminator");
  expectGuardWord(cursor, tag);
  return whitePoints;
};

const parseSecondaryTiming = (cursor: EdidByteCursor, tag: number): EdidSecondaryTiming => {
  const selector = cursor.nextByte();
  if (selector === EDID_SECONDARY_TIMING_NONE) {
    expectByte(cursor, EDID_TEXT_TERMINATOR, tag, "terminator");
    expectGuardWord(cursor, tag);
    expectGuardWord(cursor, tag);
    expectGuardWord(cursor, tag);
    return { kind: "none" };
  }
  if (selector === EDID_SECONDARY_TIMING_GTF) {
    expectByte(cursor, 0x00, tag, "reserved byte");
    const startHorizontalFrequency = cursor.nextByte() * EDID_GTF_START_FREQUENCY_UNIT_HZ;
    const c = cursor.nextByte() / 2;
    const m = cursor.nextU16le();
    const k = cursor.nextByte();
    const j = cursor.nextByte() / 2;
    return { kind: "gtf", startHorizontalFrequency, c, m, k, j };
  }
  return { kind: "opaque", selector, bytes: cursor.nextBytes(7) };
};

const parseRangeLimits = (cursor: EdidByteCursor, tag: number): EdidDescriptor => {
  const minVerticalRate = cursor.nextByte();
  const maxVerticalRate = cursor.nextByte();
  const minHorizontalRate = cursor.nextByte() * EDID_RANGE_HORIZONTAL_UNIT_HZ;
  const maxHorizontalRate = cursor.nextByte() * EDID_RANGE_HORIZONTAL_UNIT_HZ;
  const maxPixelClock = cursor.nextByte() * EDID_RANGE_PIXEL_CLOCK_UNIT_HZ;
  const secondaryTiming = parseSecondaryTiming(cursor, tag);
  return {
    kind: "range-limits",
    verticalRate: { min: minVerticalRate, max: maxVerticalRate },
    horizontalRate: { min: minHorizontalRate, max: maxHorizontalRate },
    maxPixelClock,
    secondaryTiming
  };
};

// Decodes the 13 payload bytes that follow a descriptor tag.
export const parseTaggedDescriptor = (
  cursor: EdidByteCursor,
  tag: number,
  sink: EdidDescriptorSink,
  options: EdidDecodeOptions = {}
): void => {
  if (tag <= EDID_TAG_MANUFACTURER_LAST) {
    sink.descriptors.push({
      kind: "manufacturer-defined",
      tag,
      bytes: cursor.nextBytes(EDID_DESCRIPTOR_PAYLOAD_SIZE)
    });
    return;
  }
  if (tag === EDID_TAG_PADDING) {
    if (!options.legacyPaddingFraming) cursor.nextBytes(EDID_DESCRIPTOR_PAYLOAD_SIZE);
    return;
  }
  if (tag <= EDID_TAG_UNDEFINED_LAST) {
    sink.descriptors.push({ kind: "undefined", tag, bytes: cursor.nextBytes(EDID_DESCRIPTOR_PAYLOAD_SIZE) });
    return;
  }
  if (tag === EDID_TAG_STANDARD_TIMINGS) {
    sink.standardTimings.push(...parseStandardTimings(cursor, EDID_DESCRIPTOR_STANDARD_TIMING_COUNT));
    expectByte(cursor, EDID_TEXT_TERMINATOR, tag, "terminator");
    return;
  }
  if (tag === EDID_TAG_WHITE_POINTS) {
    sink.whitePoints.push(...parseWhitePoints(cursor, tag));
    return;
  }
  if (tag === EDID_TAG_RANGE_LIMITS) {
    sink.descriptors.push(parseRangeLimits(cursor, tag));
    return;
  }
  sink.descriptors.push({ kind: textDescriptorKind(tag), text: parseDescriptorText(cursor, tag) });
};
