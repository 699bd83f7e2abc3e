"use strict";

import type {
  EdidAspectRatio,
  EdidDisplayType,
  EdidEstablishedTiming,
  EdidSignalLevel
} from "./types.js";

export const EDID_BLOCK_SIZE = 128;
export const EDID_CHUNK_SIZE = 128;
export const EDID_HEADER_BYTES = [0x00, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x00] as const;
export const EDID_HEADER_WORD_LOW = 0xffffff00;
export const EDID_HEADER_WORD_HIGH = 0x00ffffff;

export const EDID_YEAR_BASE = 1990;
export const EDID_GAMMA_ABSENT = 0xff;
export const EDID_DESCRIPTOR_SLOT_COUNT = 4;
export const EDID_DESCRIPTOR_PAYLOAD_SIZE = 13;
export const EDID_BASE_STANDARD_TIMING_COUNT = 8;
export const EDID_DESCRIPTOR_STANDARD_TIMING_COUNT = 6;
export const EDID_WHITE_POINT_ENTRY_COUNT = 2;
export const EDID_WHITE_POINT_ENTRY_SIZE = 5;

export const EDID_PIXEL_CLOCK_UNIT_HZ = 10_000;
export const EDID_RANGE_PIXEL_CLOCK_UNIT_HZ = 10_000_000;
export const EDID_RANGE_HORIZONTAL_UNIT_HZ = 1_000;
export const EDID_GTF_START_FREQUENCY_UNIT_HZ = 2_000;

export const EDID_TEXT_TERMINATOR = 0x0a;
export const EDID_TEXT_PADDING = 0x20;
export const EDID_GUARD_WORD = 0x2020;
export const EDID_STANDARD_TIMING_UNUSED = 0x01;

export const EDID_TAG_MANUFACTURER_LAST = 0x0f;
export const EDID_TAG_PADDING = 0x10;
export const EDID_TAG_UNDEFINED_LAST = 0xf9;
export const EDID_TAG_STANDARD_TIMINGS = 0xfa;
export const EDID_TAG_WHITE_POINTS = 0xfb;
export const EDID_TAG_MONITOR_NAME = 0xfc;
export const EDID_TAG_RANGE_LIMITS = 0xfd;
export const EDID_TAG_OTHER_STRING = 0xfe;

export const EDID_SECONDARY_TIMING_NONE = 0x00;
export const EDID_SECONDARY_TIMING_GTF = 0x02;

export const SIGNAL_LEVELS: readonly [EdidSignalLevel, EdidSignalLevel, EdidSignalLevel, EdidSignalLevel] = [
  { high: 0.7, low: 0.3 },
  { high: 0.714, low: 0.286 },
  { high: 1.0, low: 0.4 },
  { high: 0.7, low: 0.0 }
];

export const DISPLAY_TYPES: readonly [EdidDisplayType, EdidDisplayType, EdidDisplayType, EdidDisplayType] = [
  "monochrome",
  "rgb-color",
  "other-color",
  "undefined"
];

export const ASPECT_RATIOS: readonly [
  [EdidAspectRatio, number],
  [EdidAspectRatio, number],
  [EdidAspectRatio, number],
  [EdidAspectRatio, number]
] = [
  ["16:10", 16 / 10],
  ["4:3", 4 / 3],
  ["5:4", 5 / 4],
  ["16:9", 16 / 9]
];

// Catalogue order of the established timings. The bit column is the position
// in the 17-bit little-endian field (word at 0x23 plus bit 7 of 0x25 as bit 16).
export const ESTABLISHED_TIMINGS: ReadonlyArray<readonly [EdidEstablishedTiming, number]> = [
  ["720x400@70", 7],
  ["720x400@88", 6],
  ["640x480@60", 5],
  ["640x480@67", 4],
  ["640x480@72", 3],
  ["640x480@75", 2],
  ["800x600@56", 1],
  ["800x600@60", 0],
  ["800x600@72", 15],
  ["800x600@75", 14],
  ["832x624@75", 13],
  ["1024x768@87", 12],
  ["1024x768@60", 11],
  ["1024x768@70", 10],
  ["1024x768@75", 9],
  ["1280x1024@75", 8],
  ["1152x870@75", 16]
];
