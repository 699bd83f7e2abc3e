"use strict";

import { toHex32 } from "./binary-utils.js";

export const escapeHtml = (input: unknown): string =>
  String(input)
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

export const renderDefinitionRow = (
  label: string,
  valueHtml: string,
  tooltip?: string | null
): string =>
  `<dt${tooltip ? ` title="${escapeHtml(tooltip)}"` : ""}>${label}</dt><dd>${valueHtml}</dd>`;

export const renderOptionChips = (
  selectedCode: number,
  options: Array<[number, string, string?]>
): string =>
  `<div class="optionsRow">${options
    .map(([code, label]) =>
      `<span class="opt ${code === selectedCode ? "sel" : "dim"}" title="${escapeHtml(
        `${label} (${toHex32(code, 2)})`
      )}">${escapeHtml(label)}</span>`
    )
    .join("")}</div>`;

export const renderFlagChips = (
  mask: number,
  flags: Array<[number, string, string?]>
): string =>
  `<div class="optionsRow">${flags
    .map(([bit, name, explanation]) => {
      const isSet = (mask & bit) !== 0;
      const label = explanation ? `${name} - ${explanation}` : name;
      const tooltip = `${label} (${toHex32(bit, 2)})`;
      return `<span class="opt ${isSet ? "sel" : "dim"}" title="${escapeHtml(tooltip)}">${escapeHtml(name)}</span>`;
    })
    .join("")}</div>`;
