"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";

import { decodeEdidBytes } from "../../analyzers/edid/index.js";
import { renderEdid } from "../../renderers/edid/index.js";
import {
  createDescriptorSlot,
  createEdidBlock,
  createPaddingDescriptor,
  createTextDescriptor,
  createTimingSlot,
  loadLaptopPanelEdid,
  u16le
} from "../fixtures/edid-fixtures.js";

void test("renderEdid renders nothing without a result", () => {
  assert.equal(renderEdid(null), "");
});

void test("renderEdid renders product identity and display parameters", () => {
  const html = renderEdid(decodeEdidBytes(loadLaptopPanelEdid()));
  assert.ok(html.startsWith("<h3>EDID display identification</h3><dl>"));
  assert.ok(html.includes('<dt title="Code units 4, 0, 6">Manufacturer</dt><dd>D?F</dd>'));
  assert.ok(html.includes("<dt>Product code</dt><dd>0xa022</dd>"));
  assert.ok(html.includes("<dt>Serial number</dt><dd>0</dd>"));
  assert.ok(html.includes("<dt>Manufactured</dt><dd>week 4, 2013</dd>"));
  assert.ok(html.includes("<dt>EDID version</dt><dd>1.4</dd>"));
  assert.ok(html.includes("<dt>Video input</dt><dd>Digital (VESA DFP 1.x compatible)</dd>"));
  assert.ok(html.includes("<dt>Maximum image size</dt><dd>33 x 21 cm</dd>"));
  assert.ok(html.includes("<dt>Gamma</dt><dd>2.20</dd>"));
  assert.ok(html.includes("<dt>Extension blocks</dt><dd>0</dd>"));
});

void test("renderEdid marks the selected display type and set feature flags", () => {
  const html = renderEdid(decodeEdidBytes(loadLaptopPanelEdid()));
  assert.ok(html.includes('<span class="opt sel" title="Monochrome or grayscale (0x00)">Monochrome or grayscale</span>'));
  assert.ok(html.includes('<span class="opt dim" title="RGB color (0x01)">RGB color</span>'));
  assert.ok(
    html.includes(
      '<span class="opt sel" title="Preferred timing - First detailed timing is the preferred mode (0x02)">Preferred timing</span>'
    )
  );
  assert.ok(html.includes('<span class="opt dim" title="Standby (0x80)">Standby</span>'));
});

void test("renderEdid renders chromaticity, timings and descriptors", () => {
  const html = renderEdid(decodeEdidBytes(loadLaptopPanelEdid()));
  assert.ok(html.includes("<tr><td>Red</td><td>(0.6533, 0.3340)</td></tr>"));
  assert.ok(html.includes("<tr><td>White</td><td>(0.3125, 0.3291)</td></tr>"));
  assert.ok(html.includes("<dt>Established</dt><dd>None</dd>"));
  assert.ok(html.includes("<dt>Standard</dt><dd>None</dd>"));
  assert.ok(
    html.includes(
      "<tr><td>Preferred</td><td>2880 x 1800</td><td>337.75 MHz</td><td>48/32/80</td><td>3/6/43</td>" +
        "<td>Separate sync (H positive, V negative)</td><td>No stereo</td></tr>"
    )
  );
  assert.ok(html.includes("<tr><td>Monitor name</td><td>Color LCD</td></tr>"));
});

void test("renderEdid lists raw descriptor bytes in hex", () => {
  const html = renderEdid(decodeEdidBytes(loadLaptopPanelEdid(), { legacyPaddingFraming: true }));
  assert.ok(html.includes(`<tr><td>Manufacturer defined</td><td>0x00: ${"00".repeat(11)}1000</td></tr>`));
});

void test("renderEdid renders timing lists, range limits and escaped text", () => {
  const block = createEdidBlock({
    prefix: { established: [0x20, 0x00, 0x00], standard: [0xd1, 0xc0, ...new Array<number>(14).fill(0x01)] },
    slots: [
      createTimingSlot(),
      createTimingSlot({ pixelClock10kHz: 7425, hActive: 1280, vActive: 720, flags: 0x80 }),
      createDescriptorSlot(0xfd, [56, 76, 30, 81, 16, 0x02, 0x00, 20, 80, ...u16le(600), 128, 40]),
      createTextDescriptor(0xfe, "A<B&C>'")
    ]
  });
  const html = renderEdid(decodeEdidBytes(block));
  assert.ok(html.includes("<dt>Established</dt><dd>640x480@60</dd>"));
  assert.ok(html.includes("<dt>Standard</dt><dd>1920 px 16:9 @ 60 Hz</dd>"));
  assert.ok(html.includes("<tr><td>#2</td><td>1280 x 720i</td><td>74.25 MHz</td>"));
  assert.ok(
    html.includes(
      "<tr><td>Range limits</td><td>V 56-76 Hz, H 30-81 kHz, max 160 MHz; " +
        "Secondary GTF from 40 kHz (C=40, M=600, K=128, J=20)</td></tr>"
    )
  );
  assert.ok(html.includes("<tr><td>Text</td><td>A&lt;B&amp;C&gt;&#39;</td></tr>"));
});

void test("renderEdid renders decode errors with their offset", () => {
  const block = createEdidBlock({
    slots: [
      createTextDescriptor(0xfc, "No timing"),
      createPaddingDescriptor(),
      createPaddingDescriptor(),
      createPaddingDescriptor()
    ]
  });
  assert.equal(
    renderEdid(decodeEdidBytes(block)),
    "<h3>EDID display identification</h3><h4>Error</h4><ul class=\"issueList\">" +
      "<li>missing-preferred-timing at byte 56: The first detailed timing slot holds no timing (pixel clock is zero).</li></ul>"
  );
});
