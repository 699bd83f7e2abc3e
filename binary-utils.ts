"use strict";

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const bufferToHex = (bytes: Uint8Array): string =>
  [...bytes].map(byteValue => byteValue.toString(16).padStart(2, "0")).join("");
