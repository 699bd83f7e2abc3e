"use strict";

import { escapeHtml, renderDefinitionRow, renderFlagChips, renderOptionChips } from "../../html-utils.js";
import { bufferToHex, toHex32 } from "../../binary-utils.js";
import type { EdidDecodeResult } from "../../analyzers/edid/index.js";
import {
  describeDescriptorKind,
  describeDisplayType,
  describeSecondaryTiming,
  describeStereoMode,
  describeSyncType,
  describeVideoInput,
  manufacturerCodesToLetters
} from "../../analyzers/edid/labels.js";
import type {
  EdidChromaticity,
  EdidColorCharacteristics,
  EdidDescriptor,
  EdidDisplayParameters,
  EdidDpmsFeatures,
  EdidRecord,
  EdidTimings
} from "../../analyzers/edid/types.js";

const DPMS_FLAGS: Array<[number, string, string?]> = [
  [0x80, "Standby"],
  [0x40, "Suspend"],
  [0x20, "Active-off"],
  [0x04, "sRGB", "sRGB is the default color space"],
  [0x02, "Preferred timing", "First detailed timing is the preferred mode"],
  [0x01, "GTF", "Default GTF timings supported"]
];

const DISPLAY_TYPE_OPTIONS: Array<[number, string]> = [
  [0, describeDisplayType("monochrome")],
  [1, describeDisplayType("rgb-color")],
  [2, describeDisplayType("other-color")],
  [3, describeDisplayType("undefined")]
];

const DISPLAY_TYPE_CODES = {
  monochrome: 0,
  "rgb-color": 1,
  "other-color": 2,
  undefined: 3
} as const;

const formatCoordinate = (point: EdidChromaticity): string => `(${point.x.toFixed(4)}, ${point.y.toFixed(4)})`;

const dpmsMask = (dpms: EdidDpmsFeatures): number =>
  (dpms.standbySupported ? 0x80 : 0) |
  (dpms.suspendSupported ? 0x40 : 0) |
  (dpms.lowPowerSupported ? 0x20 : 0) |
  (dpms.defaultSrgb ? 0x04 : 0) |
  (dpms.preferredTimingMode ? 0x02 : 0) |
  (dpms.defaultGtfSupported ? 0x01 : 0);

const renderDisplay = (display: EdidDisplayParameters): string => {
  const out: string[] = [];
  out.push(renderDefinitionRow("Video input", escapeHtml(describeVideoInput(display.input))));
  out.push(
    renderDefinitionRow(
      "Maximum image size",
      display.maxSize ? `${display.maxSize.width} x ${display.maxSize.height} cm` : "Unknown"
    )
  );
  out.push(renderDefinitionRow("Gamma", display.gamma != null ? display.gamma.toFixed(2) : "Not given"));
  out.push(
    renderDefinitionRow(
      "Display type",
      renderOptionChips(DISPLAY_TYPE_CODES[display.dpms.displayType], DISPLAY_TYPE_OPTIONS)
    )
  );
  out.push(renderDefinitionRow("Features", renderFlagChips(dpmsMask(display.dpms), DPMS_FLAGS)));
  return out.join("");
};

const renderColor = (color: EdidColorCharacteristics): string => {
  const rows = [
    ["Red", color.red],
    ["Green", color.green],
    ["Blue", color.blue],
    ["White", color.white]
  ] as const;
  const body = rows
    .map(([name, point]) => `<tr><td>${name}</td><td>${formatCoordinate(point)}</td></tr>`)
    .join("");
  const extra = color.whitePoints
    .map(
      point =>
        `<tr><td>White point ${point.index}</td><td>${formatCoordinate(point)}, gamma ${point.gamma.toFixed(2)}</td></tr>`
    )
    .join("");
  return (
    "<h4>Chromaticity</h4>" +
    '<table class="byteView"><thead><tr><th>Primary</th><th>x, y</th></tr></thead>' +
    `<tbody>${body}${extra}</tbody></table>`
  );
};

const renderTimings = (timings: EdidTimings): string => {
  const out: string[] = [];
  out.push("<h4>Timings</h4><dl>");
  out.push(
    renderDefinitionRow(
      "Established",
      timings.established.length ? escapeHtml(timings.established.join(", ")) : "None"
    )
  );
  out.push(
    renderDefinitionRow(
      "Standard",
      timings.standard.length
        ? escapeHtml(
            timings.standard
              .map(timing => `${timing.horizontalResolution} px ${timing.aspectRatio} @ ${timing.refreshRate} Hz`)
              .join(", ")
          )
        : "None"
    )
  );
  out.push("</dl>");
  if (!timings.detailed.length) return out.join("");
  const rows = timings.detailed
    .map((timing, index) => {
      const label = index === 0 ? "Preferred" : `#${index + 1}`;
      return (
        `<tr><td>${label}</td>` +
        `<td>${timing.active.horizontal} x ${timing.active.vertical}${timing.interlaced ? "i" : ""}</td>` +
        `<td>${(timing.pixelClock / 1_000_000).toFixed(2)} MHz</td>` +
        `<td>${timing.frontPorch.horizontal}/${timing.syncWidth.horizontal}/${timing.backPorch.horizontal}</td>` +
        `<td>${timing.frontPorch.vertical}/${timing.syncWidth.vertical}/${timing.backPorch.vertical}</td>` +
        `<td>${escapeHtml(describeSyncType(timing.sync))}</td>` +
        `<td>${escapeHtml(describeStereoMode(timing.stereo))}</td></tr>`
      );
    })
    .join("");
  out.push(
    '<table class="byteView"><thead><tr><th>Timing</th><th>Active</th><th>Pixel clock</th>' +
      "<th>H porch/sync/porch</th><th>V porch/sync/porch</th><th>Sync</th><th>Stereo</th></tr></thead>" +
      `<tbody>${rows}</tbody></table>`
  );
  return out.join("");
};

const describeDescriptorValue = (descriptor: EdidDescriptor): string => {
  switch (descriptor.kind) {
    case "monitor-name":
    case "serial-number":
    case "other-string":
      return escapeHtml(descriptor.text);
    case "range-limits":
      return escapeHtml(
        `V ${descriptor.verticalRate.min}-${descriptor.verticalRate.max} Hz, ` +
          `H ${descriptor.horizontalRate.min / 1000}-${descriptor.horizontalRate.max / 1000} kHz, ` +
          `max ${descriptor.maxPixelClock / 1_000_000} MHz; ` +
          describeSecondaryTiming(descriptor.secondaryTiming)
      );
    case "manufacturer-defined":
    case "undefined":
      return `${toHex32(descriptor.tag, 2)}: ${bufferToHex(new Uint8Array(descriptor.bytes))}`;
  }
};

const renderDescriptors = (descriptors: readonly EdidDescriptor[]): string => {
  if (!descriptors.length) return "";
  const rows = descriptors
    .map(
      descriptor =>
        `<tr><td>${describeDescriptorKind(descriptor)}</td><td>${describeDescriptorValue(descriptor)}</td></tr>`
    )
    .join("");
  return (
    "<h4>Display descriptors</h4>" +
    '<table class="byteView"><thead><tr><th>Kind</th><th>Value</th></tr></thead>' +
    `<tbody>${rows}</tbody></table>`
  );
};

const renderRecord = (edid: EdidRecord): string => {
  const { product, version } = edid;
  const out: string[] = [];
  out.push("<h3>EDID display identification</h3>");
  out.push("<dl>");
  out.push(
    renderDefinitionRow(
      "Manufacturer",
      escapeHtml(manufacturerCodesToLetters(product.manufacturerId.codes)),
      `Code units ${product.manufacturerId.codes.join(", ")}`
    )
  );
  out.push(renderDefinitionRow("Product code", toHex32(product.productCode, 4)));
  out.push(renderDefinitionRow("Serial number", String(product.serialNumber)));
  out.push(
    renderDefinitionRow(
      "Manufactured",
      `week ${product.manufactureDate.week}, ${product.manufactureDate.year}`
    )
  );
  out.push(renderDefinitionRow("EDID version", `${version.version}.${version.revision}`));
  out.push(renderDisplay(edid.display));
  out.push(renderDefinitionRow("Extension blocks", String(edid.extensions)));
  out.push("</dl>");
  out.push(renderColor(edid.color));
  out.push(renderTimings(edid.timings));
  out.push(renderDescriptors(edid.descriptors));
  return out.join("");
};

export const renderEdid = (result: EdidDecodeResult | null): string => {
  if (!result) return "";
  if (result.ok) return renderRecord(result.edid);
  return (
    "<h3>EDID display identification</h3>" +
    `<h4>Error</h4><ul class="issueList"><li>${escapeHtml(
      `${result.error.kind} at byte ${result.offset}: ${result.error.message}`
    )}</li></ul>`
  );
};
