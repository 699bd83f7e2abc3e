"use strict";

export type EdidErrorKind =
  | "header-invalid"
  | "unexpected-end-of-data"
  | "missing-preferred-timing"
  | "malformed-timing-geometry"
  | "malformed-descriptor"
  | "source-failure";

export class EdidDecodeError extends Error {
  readonly kind: EdidErrorKind;

  constructor(kind: EdidErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EdidDecodeError";
    this.kind = kind;
  }
}
