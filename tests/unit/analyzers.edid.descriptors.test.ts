"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { EdidByteCursor } from "../../analyzers/edid/byte-cursor.js";
import { bytesSource } from "../../analyzers/edid/byte-source.js";
import { parseDescriptorText, parseTaggedDescriptor } from "../../analyzers/edid/descriptors.js";
import type { EdidDescriptorSink } from "../../analyzers/edid/descriptors.js";
import { EdidDecodeError } from "../../analyzers/edid/errors.js";
import { asciiBytes, createTextPayload, u16le } from "../fixtures/edid-fixtures.js";

const cursorOver = (bytes: number[]): EdidByteCursor => new EdidByteCursor(bytesSource(new Uint8Array(bytes)));

const createSink = (): EdidDescriptorSink => ({ descriptors: [], standardTimings: [], whitePoints: [] });

const decodePayload = (
  tag: number,
  payload: number[],
  legacyPaddingFraming = false
): { sink: EdidDescriptorSink; consumed: number } => {
  assert.equal(payload.length, 13);
  const cursor = cursorOver(payload);
  const sink = createSink();
  parseTaggedDescriptor(cursor, tag, sink, { legacyPaddingFraming });
  return { sink, consumed: cursor.consumed };
};

const isMalformed = (message: string) => (error: unknown): boolean =>
  error instanceof EdidDecodeError && error.kind === "malformed-descriptor" && error.message === message;

const RAW_PAYLOAD = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13];
const SPACES = (count: number): number[] => new Array<number>(count).fill(0x20);

void test("tags 0x00-0x0F are kept as manufacturer-defined payloads", () => {
  for (const tag of [0x00, 0x0f]) {
    const { sink, consumed } = decodePayload(tag, RAW_PAYLOAD);
    assert.deepEqual(sink.descriptors, [{ kind: "manufacturer-defined", tag, bytes: RAW_PAYLOAD }]);
    assert.equal(consumed, 13);
  }
});

void test("padding descriptors produce no entry and consume their payload", () => {
  const { sink, consumed } = decodePayload(0x10, new Array<number>(13).fill(0));
  assert.deepEqual(sink, createSink());
  assert.equal(consumed, 13);
});

void test("legacy padding framing leaves the payload unread", () => {
  const { sink, consumed } = decodePayload(0x10, new Array<number>(13).fill(0), true);
  assert.deepEqual(sink.descriptors, []);
  assert.equal(consumed, 0);
});

void test("tags 0x11-0xF9 are kept as undefined payloads", () => {
  for (const tag of [0x11, 0x80, 0xf9]) {
    const { sink, consumed } = decodePayload(tag, RAW_PAYLOAD);
    assert.deepEqual(sink.descriptors, [{ kind: "undefined", tag, bytes: RAW_PAYLOAD }]);
    assert.equal(consumed, 13);
  }
});

void test("0xFA adds up to six standard timings to the shared list", () => {
  const payload = [0xd1, 0xc0, 0x81, 0x80, 0x01, 0x01, 0x01, 0x01, 0x01, 0x01, 0x01, 0x01, 0x0a];
  const { sink } = decodePayload(0xfa, payload);
  assert.deepEqual(
    sink.standardTimings.map(timing => `${timing.horizontalResolution} ${timing.aspectRatio} ${timing.refreshRate}`),
    ["1920 16:9 60", "1280 5:4 60"]
  );
  assert.deepEqual(sink.descriptors, []);
});

void test("0xFA requires the 0x0A terminator", () => {
  const payload = [...new Array<number>(12).fill(0x01), 0x20];
  assert.throws(
    () => decodePayload(0xfa, payload),
    isMalformed("Descriptor 0xfa: expected terminator 0x0a, found 0x20.")
  );
});

void test("0xFB keeps the index-zero entry that ends the list", () => {
  const payload = [0x01, 0b0000_1001, 0x50, 0x54, 120, 0x00, 0xaa, 0xbb, 0xcc, 0xdd, 0x0a, 0x20, 0x20];
  const { sink, consumed } = decodePayload(0xfb, payload);
  assert.deepEqual(sink.whitePoints, [
    { index: 1, x: 322 / 1024, y: 337 / 1024, gamma: 2.2 },
    { index: 0, x: 750 / 1024, y: 818 / 1024, gamma: 321 / 100 }
  ]);
  assert.equal(consumed, 13);
});

void test("0xFB reads two white point entries", () => {
  const payload = [0x01, 0x00, 0x50, 0x54, 120, 0x02, 0x00, 0x40, 0x40, 0x00, 0x0a, 0x20, 0x20];
  const { sink } = decodePayload(0xfb, payload);
  assert.deepEqual(
    sink.whitePoints.map(point => [point.index, point.x, point.y, point.gamma]),
    [
      [1, 320 / 1024, 336 / 1024, 2.2],
      [2, 256 / 1024, 256 / 1024, 1]
    ]
  );
});

void test("0xFB with index zero first records that entry and skips the second as filler", () => {
  const payload = [0x00, 0x09, 0x50, 0x54, 120, 9, 9, 9, 9, 9, 0x0a, 0x20, 0x20];
  const { sink, consumed } = decodePayload(0xfb, payload);
  assert.deepEqual(sink.whitePoints, [{ index: 0, x: 322 / 1024, y: 337 / 1024, gamma: 2.2 }]);
  assert.equal(consumed, 13);
});

void test("0xFB rejects a broken padding word", () => {
  const payload = [0x00, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0x0a, 0x20, 0x00];
  assert.throws(
    () => decodePayload(0xfb, payload),
    isMalformed("Descriptor 0xfb: expected padding 0x2020, found 0x0020.")
  );
});

void test("0xFD decodes range limits without a secondary timing formula", () => {
  const payload = [50, 75, 30, 83, 17, 0x00, 0x0a, ...SPACES(6)];
  const { sink, consumed } = decodePayload(0xfd, payload);
  assert.deepEqual(sink.descriptors, [
    {
      kind: "range-limits",
      verticalRate: { min: 50, max: 75 },
      horizontalRate: { min: 30_000, max: 83_000 },
      maxPixelClock: 170_000_000,
      secondaryTiming: { kind: "none" }
    }
  ]);
  assert.equal(consumed, 13);
});

void test("0xFD decodes secondary GTF parameters", () => {
  const payload = [56, 76, 30, 81, 16, 0x02, 0x00, 20, 80, ...u16le(600), 128, 40];
  const { sink } = decodePayload(0xfd, payload);
  const descriptor = sink.descriptors[0];
  assert.ok(descriptor && descriptor.kind === "range-limits");
  assert.deepEqual(descriptor.secondaryTiming, {
    kind: "gtf",
    startHorizontalFrequency: 40_000,
    c: 40,
    m: 600,
    k: 128,
    j: 20
  });
});

void test("0xFD keeps unknown secondary timing formulas as raw bytes", () => {
  const payload = [56, 76, 30, 81, 16, 0x04, 1, 2, 3, 4, 5, 6, 7];
  const { sink, consumed } = decodePayload(0xfd, payload);
  const descriptor = sink.descriptors[0];
  assert.ok(descriptor && descriptor.kind === "range-limits");
  assert.deepEqual(descriptor.secondaryTiming, { kind: "opaque", selector: 4, bytes: [1, 2, 3, 4, 5, 6, 7] });
  assert.equal(consumed, 13);
});

void test("0xFD rejects a non-zero reserved byte in the GTF block", () => {
  const payload = [56, 76, 30, 81, 16, 0x02, 0x01, 20, 80, ...u16le(600), 128, 40];
  assert.throws(
    () => decodePayload(0xfd, payload),
    isMalformed("Descriptor 0xfd: expected reserved byte 0x00, found 0x01.")
  );
});

void test("0xFD without a formula requires space padding", () => {
  const payload = [50, 75, 30, 83, 17, 0x00, 0x0a, 0x20, 0x20, 0x20, 0x20, 0x20, 0x00];
  assert.throws(
    () => decodePayload(0xfd, payload),
    isMalformed("Descriptor 0xfd: expected padding 0x2020, found 0x0020.")
  );
});

void test("every tag byte frames its payload as thirteen bytes", () => {
  const payload = createTextPayload("Test");
  const rejected: number[] = [];
  for (let tag = 0x00; tag <= 0xff; tag += 1) {
    try {
      assert.equal(decodePayload(tag, payload).consumed, 13);
    } catch (error) {
      if (!(error instanceof EdidDecodeError)) throw error;
      assert.equal(error.kind, "malformed-descriptor");
      rejected.push(tag);
    }
  }
  assert.deepEqual(rejected, [0xfa, 0xfb]);
});

void test("text descriptors map tags to kinds", () => {
  assert.deepEqual(decodePayload(0xfc, createTextPayload("Color LCD")).sink.descriptors, [
    { kind: "monitor-name", text: "Color LCD" }
  ]);
  assert.deepEqual(decodePayload(0xfe, createTextPayload("A1 rev B")).sink.descriptors, [
    { kind: "other-string", text: "A1 rev B" }
  ]);
  assert.deepEqual(decodePayload(0xff, createTextPayload("SN0001")).sink.descriptors, [
    { kind: "serial-number", text: "SN0001" }
  ]);
});

void test("text of exactly thirteen bytes needs no terminator", () => {
  assert.equal(parseDescriptorText(cursorOver(asciiBytes("ABCDEFGHIJKLM")), 0xfc), "ABCDEFGHIJKLM");
});

void test("an empty text field is all padding after the terminator", () => {
  assert.equal(parseDescriptorText(cursorOver([0x0a, ...SPACES(12)]), 0xff), "");
});

void test("text padding must be spaces", () => {
  const payload = [0x41, 0x0a, 0x20, 0x00, ...SPACES(9)];
  assert.throws(
    () => decodePayload(0xfc, payload),
    isMalformed("Descriptor 0xfc: expected text padding 0x20, found 0x00.")
  );
});
