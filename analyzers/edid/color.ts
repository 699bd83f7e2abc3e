"use strict";

import { decodeChromaticityValue, readTwoBits } from "./bits.js";
import type { EdidByteCursor } from "./byte-cursor.js";
import type { EdidChromaticity, EdidColorCharacteristics, EdidWhitePoint } from "./types.js";

export type EdidBaseChromaticity = Omit<EdidColorCharacteristics, "whitePoints">;

const decodePair = (
  highX: number,
  highY: number,
  lowBits: number,
  xShift: number,
  yShift: number
): EdidChromaticity => ({
  x: decodeChromaticityValue(highX, readTwoBits(lowBits, xShift)),
  y: decodeChromaticityValue(highY, readTwoBits(lowBits, yShift))
});

export const parseBaseChromaticity = (cursor: EdidByteCursor): EdidBaseChromaticity => {
  const redGreenLow = cursor.nextByte();
  const blueWhiteLow = cursor.nextByte();
  const redX = cursor.nextByte();
  const redY = cursor.nextByte();
  const greenX = cursor.nextByte();
  const greenY = cursor.nextByte();
  const blueX = cursor.nextByte();
  const blueY = cursor.nextByte();
  const whiteX = cursor.nextByte();
  const whiteY = cursor.nextByte();
  return {
    red: decodePair(redX, redY, redGreenLow, 6, 4),
    green: decodePair(greenX, greenY, redGreenLow, 2, 0),
    blue: decodePair(blueX, blueY, blueWhiteLow, 6, 4),
    white: decodePair(whiteX, whiteY, blueWhiteLow, 2, 0)
  };
};

export const assembleColorCharacteristics = (
  base: EdidBaseChromaticity,
  whitePoints: readonly EdidWhitePoint[]
): EdidColorCharacteristics => ({ ...base, whitePoints: [...whitePoints] });

// One 5-byte white point entry of a 0xFB descriptor, the index byte already read.
export const parseWhitePointEntry = (cursor: EdidByteCursor, index: number): EdidWhitePoint => {
  const lowBits = cursor.nextByte();
  const highX = cursor.nextByte();
  const highY = cursor.nextByte();
  const gammaByte = cursor.nextByte();
  const { x, y } = decodePair(highX, highY, lowBits, 2, 0);
  return { index, x, y, gamma: (gammaByte + 100) / 100 };
};
