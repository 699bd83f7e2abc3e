"use strict";

export type TwoBitValue = 0 | 1 | 2 | 3;

export const isBitSet = (value: number, bit: number): boolean => (value & (1 << bit)) !== 0;

export const readTwoBits = (value: number, shift: number): TwoBitValue => {
  const bits = (value >> shift) & 0x03;
  return bits === 0 ? 0 : bits === 1 ? 1 : bits === 2 ? 2 : 3;
};

export const highNibble = (value: number): number => (value >> 4) & 0x0f;

export const lowNibble = (value: number): number => value & 0x0f;

// Ten-bit chromaticity fraction: eight high bits plus a two-bit fragment.
export const decodeChromaticityValue = (high: number, lowBits: TwoBitValue): number =>
  ((high << 2) | lowBits) / 1024;
