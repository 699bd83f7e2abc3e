"use strict";

import type { EdidByteCursor } from "./byte-cursor.js";
import { EDID_YEAR_BASE } from "./constants.js";
import type {
  EdidManufactureDate,
  EdidManufacturerCodes,
  EdidManufacturerId,
  EdidProductInfo,
  EdidVersion
} from "./types.js";

export const unpackManufacturerCodes = (word: number): EdidManufacturerCodes => [
  (word >> 10) & 0x1f,
  (word >> 5) & 0x1f,
  word & 0x1f
];

export const manufacturerCodesToCharacters = (codes: EdidManufacturerCodes): string =>
  codes.map(code => String.fromCharCode(code)).join("");

export const parseManufacturerId = (cursor: EdidByteCursor): EdidManufacturerId => {
  const codes = unpackManufacturerCodes(cursor.nextU16le());
  return { codes, characters: manufacturerCodesToCharacters(codes) };
};

export const parseManufactureDate = (cursor: EdidByteCursor): EdidManufactureDate => {
  const week = cursor.nextByte();
  const year = cursor.nextByte() + EDID_YEAR_BASE;
  return { week, year };
};

export const parseProductInfo = (cursor: EdidByteCursor): EdidProductInfo => {
  const manufacturerId = parseManufacturerId(cursor);
  const productCode = cursor.nextU16le();
  const serialNumber = cursor.nextU32le();
  const manufactureDate = parseManufactureDate(cursor);
  return { manufacturerId, productCode, serialNumber, manufactureDate };
};

export const parseVersion = (cursor: EdidByteCursor): EdidVersion => {
  const version = cursor.nextByte();
  const revision = cursor.nextByte();
  return { version, revision };
};
