"use strict";

import type {
  EdidDescriptor,
  EdidDisplayType,
  EdidManufacturerCodes,
  EdidSecondaryTiming,
  EdidStereoMode,
  EdidSyncType,
  EdidVideoInput
} from "./types.js";

// PNP vendor letters: code 1 is "A". Codes outside 1..26 are shown as "?".
export const manufacturerCodesToLetters = (codes: EdidManufacturerCodes): string =>
  codes.map(code => (code >= 1 && code <= 26 ? String.fromCharCode(code + 64) : "?")).join("");

const DISPLAY_TYPE_LABELS: Record<EdidDisplayType, string> = {
  monochrome: "Monochrome or grayscale",
  "rgb-color": "RGB color",
  "other-color": "Non-RGB color",
  undefined: "Undefined"
};

const STEREO_LABELS: Record<EdidStereoMode, string> = {
  none: "No stereo",
  "sequential-right-sync": "Field sequential, right image on sync",
  "sequential-left-sync": "Field sequential, left image on sync",
  "interleaved-lines-right-even": "2-way interleaved, right image on even lines",
  "interleaved-lines-left-even": "2-way interleaved, left image on even lines",
  "interleaved-4-way": "4-way interleaved",
  "side-by-side": "Side-by-side interleaved"
};

export const describeDisplayType = (value: EdidDisplayType): string => DISPLAY_TYPE_LABELS[value];

export const describeStereoMode = (value: EdidStereoMode): string => STEREO_LABELS[value];

export const describeVideoInput = (input: EdidVideoInput): string => {
  if (input.kind === "digital") {
    return input.dfpCompatible ? "Digital (VESA DFP 1.x compatible)" : "Digital";
  }
  const { high, low } = input.signalLevel;
  return `Analog (${high.toFixed(3)} V / ${low.toFixed(3)} V)`;
};

export const describeSyncType = (sync: EdidSyncType): string => {
  if (sync.kind === "separate") {
    return `Separate sync (H ${sync.horizontal}, V ${sync.vertical})`;
  }
  const serration = sync.serrated ? ", serrated" : "";
  switch (sync.line.kind) {
    case "rgb":
      return `Analog composite on RGB${serration}`;
    case "green":
      return `Analog composite on green${serration}`;
    case "digital":
      return `Digital composite (${sync.line.polarity})${serration}`;
  }
};

export const describeSecondaryTiming = (timing: EdidSecondaryTiming): string => {
  switch (timing.kind) {
    case "none":
      return "None";
    case "gtf":
      return (
        `Secondary GTF from ${timing.startHorizontalFrequency / 1000} kHz ` +
        `(C=${timing.c}, M=${timing.m}, K=${timing.k}, J=${timing.j})`
      );
    case "opaque":
      return `Unknown formula 0x${timing.selector.toString(16).padStart(2, "0")}`;
  }
};

export const describeDescriptorKind = (descriptor: EdidDescriptor): string => {
  switch (descriptor.kind) {
    case "monitor-name":
      return "Monitor name";
    case "serial-number":
      return "Serial number";
    case "other-string":
      return "Text";
    case "range-limits":
      return "Range limits";
    case "manufacturer-defined":
      return "Manufacturer defined";
    case "undefined":
      return "Undefined";
  }
};
