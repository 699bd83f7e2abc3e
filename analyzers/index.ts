"use strict";

export type { EdidDecodeResult, EdidFileLike } from "./edid/index.js";
export { decodeEdid, decodeEdidBytes, hasEdidHeader, parseEdid } from "./edid/index.js";
