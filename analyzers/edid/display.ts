"use strict";

import { isBitSet, readTwoBits } from "./bits.js";
import type { EdidByteCursor } from "./byte-cursor.js";
import { DISPLAY_TYPES, EDID_GAMMA_ABSENT, SIGNAL_LEVELS } from "./constants.js";
import type {
  EdidDisplayParameters,
  EdidDpmsFeatures,
  EdidImageSize,
  EdidVideoInput
} from "./types.js";

export const decodeVideoInput = (value: number): EdidVideoInput => {
  if (isBitSet(value, 7)) {
    return { kind: "digital", dfpCompatible: isBitSet(value, 0) };
  }
  return {
    kind: "analog",
    signalLevel: SIGNAL_LEVELS[readTwoBits(value, 5)],
    setupExpected: isBitSet(value, 4),
    supportedSync: {
      serratedVsync: isBitSet(value, 3),
      syncOnGreen: isBitSet(value, 2),
      compositeSync: isBitSet(value, 1),
      separateSync: isBitSet(value, 0)
    }
  };
};

export const decodeMaxImageSize = (width: number, height: number): EdidImageSize | null => {
  if (width === 0 || height === 0) return null;
  return { width, height };
};

export const decodeGamma = (value: number): number | null =>
  value === EDID_GAMMA_ABSENT ? null : (value + 100) / 100;

export const decodeDpmsFeatures = (value: number): EdidDpmsFeatures => ({
  standbySupported: isBitSet(value, 7),
  suspendSupported: isBitSet(value, 6),
  lowPowerSupported: isBitSet(value, 5),
  displayType: DISPLAY_TYPES[readTwoBits(value, 3)],
  defaultSrgb: isBitSet(value, 2),
  preferredTimingMode: isBitSet(value, 1),
  defaultGtfSupported: isBitSet(value, 0)
});

export const parseDisplayParameters = (cursor: EdidByteCursor): EdidDisplayParameters => {
  const input = decodeVideoInput(cursor.nextByte());
  const maxWidth = cursor.nextByte();
  const maxHeight = cursor.nextByte();
  const gamma = decodeGamma(cursor.nextByte());
  const dpms = decodeDpmsFeatures(cursor.nextByte());
  return { input, maxSize: decodeMaxImageSize(maxWidth, maxHeight), gamma, dpms };
};
