"use strict";

import { highNibble, isBitSet, lowNibble, readTwoBits } from "./bits.js";
import type { EdidByteCursor } from "./byte-cursor.js";
import { EDID_PIXEL_CLOCK_UNIT_HZ } from "./constants.js";
import { parseTaggedDescriptor } from "./descriptors.js";
import type { EdidDescriptorSink } from "./descriptors.js";
import { EdidDecodeError } from "./errors.js";
import type {
  EdidDecodeOptions,
  EdidDetailedTiming,
  EdidStereoMode,
  EdidSyncPolarity,
  EdidSyncType
} from "./types.js";

export type EdidTimingFlags = {
  interlaced: boolean;
  stereo: EdidStereoMode;
  sync: EdidSyncType;
};

const polarity = (value: number, bit: number): EdidSyncPolarity =>
  isBitSet(value, bit) ? "positive" : "negative";

export const decodeStereoMode = (value: number): EdidStereoMode => {
  const bit6 = isBitSet(value, 6);
  const bit5 = isBitSet(value, 5);
  const bit0 = isBitSet(value, 0);
  if (!bit6 && !bit5) return "none";
  if (bit6 && bit5) return bit0 ? "side-by-side" : "interleaved-4-way";
  if (bit5) return bit0 ? "interleaved-lines-right-even" : "sequential-right-sync";
  return bit0 ? "interleaved-lines-left-even" : "sequential-left-sync";
};

export const decodeSyncType = (value: number): EdidSyncType => {
  const serrated = isBitSet(value, 2);
  switch (readTwoBits(value, 3)) {
    case 0:
    case 1:
      return {
        kind: "composite",
        serrated,
        line: isBitSet(value, 1) ? { kind: "rgb" } : { kind: "green" }
      };
    case 2:
      return { kind: "composite", serrated, line: { kind: "digital", polarity: polarity(value, 1) } };
    case 3:
      return { kind: "separate", horizontal: polarity(value, 1), vertical: polarity(value, 2) };
  }
};

export const decodeTimingFlags = (value: number): EdidTimingFlags => ({
  interlaced: isBitSet(value, 7),
  stereo: decodeStereoMode(value),
  sync: decodeSyncType(value)
});

const derivePorch = (axis: string, blanking: number, syncWidth: number, frontPorch: number): number => {
  const backPorch = blanking - syncWidth - frontPorch;
  if (backPorch < 0) {
    throw new EdidDecodeError(
      "malformed-timing-geometry",
      `${axis} blanking ${blanking} is shorter than sync width ${syncWidth} plus front porch ${frontPorch}.`
    );
  }
  return backPorch;
};

// Everything after the two pixel clock bytes of a timing slot.
export const parseDetailedTimingBody = (
  cursor: EdidByteCursor,
  pixelClock: number
): EdidDetailedTiming => {
  const hActiveLow = cursor.nextByte();
  const hBlankingLow = cursor.nextByte();
  const hHigh = cursor.nextByte();
  const vActiveLow = cursor.nextByte();
  const vBlankingLow = cursor.nextByte();
  const vHigh = cursor.nextByte();

  const hOffsetLow = cursor.nextByte();
  const hWidthLow = cursor.nextByte();
  const vSyncLow = cursor.nextByte();
  const syncHigh = cursor.nextByte();

  const hSizeLow = cursor.nextByte();
  const vSizeLow = cursor.nextByte();
  const sizeHigh = cursor.nextByte();
  const hBorder = cursor.nextByte();
  const vBorder = cursor.nextByte();
  const flags = decodeTimingFlags(cursor.nextByte());

  const active = {
    horizontal: hActiveLow | (highNibble(hHigh) << 8),
    vertical: vActiveLow | (highNibble(vHigh) << 8)
  };
  const blanking = {
    horizontal: hBlankingLow | (lowNibble(hHigh) << 8),
    vertical: vBlankingLow | (lowNibble(vHigh) << 8)
  };
  const frontPorch = {
    horizontal: hOffsetLow | (readTwoBits(syncHigh, 6) << 8),
    vertical: highNibble(vSyncLow) | (readTwoBits(syncHigh, 2) << 4)
  };
  const syncWidth = {
    horizontal: hWidthLow | (readTwoBits(syncHigh, 4) << 8),
    vertical: lowNibble(vSyncLow) | (readTwoBits(syncHigh, 0) << 4)
  };
  const backPorch = {
    horizontal: derivePorch("Horizontal", blanking.horizontal, syncWidth.horizontal, frontPorch.horizontal),
    vertical: derivePorch("Vertical", blanking.vertical, syncWidth.vertical, frontPorch.vertical)
  };
  const imageSize = {
    width: (hSizeLow | (highNibble(sizeHigh) << 8)) / 10,
    height: (vSizeLow | (lowNibble(sizeHigh) << 8)) / 10
  };

  return {
    pixelClock,
    active,
    blanking,
    frontPorch,
    syncWidth,
    backPorch,
    imageSize,
    border: { horizontal: hBorder, vertical: vBorder },
    interlaced: flags.interlaced,
    stereo: flags.stereo,
    sync: flags.sync
  };
};

export type EdidTimingSink = EdidDescriptorSink & {
  detailedTimings: EdidDetailedTiming[];
};

// Decodes one 18-byte slot. A zero pixel clock marks a display descriptor,
// which the first slot may not hold.
export const parseDetailedSlot = (
  cursor: EdidByteCursor,
  slotIndex: number,
  sink: EdidTimingSink,
  options: EdidDecodeOptions = {}
): void => {
  const pixelClock = cursor.nextU16le() * EDID_PIXEL_CLOCK_UNIT_HZ;
  if (pixelClock !== 0) {
    sink.detailedTimings.push(parseDetailedTimingBody(cursor, pixelClock));
    return;
  }
  if (slotIndex === 0) {
    throw new EdidDecodeError(
      "missing-preferred-timing",
      "The first detailed timing slot holds no timing (pixel clock is zero)."
    );
  }
  cursor.nextByte();
  const tag = cursor.nextByte();
  cursor.nextByte();
  parseTaggedDescriptor(cursor, tag, sink, options);
};
