/**
 * HTML for the target form.
 */

import { DEFAULT_TARGET_OPTIONS } from '../types/index.js';
import type { FormValues } from './form.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

interface SelectOption {
  value: string;
  label: string;
}

const UNIT_OPTIONS: SelectOption[] = [
  { value: 'yards', label: 'Yards' },
  { value: 'meters', label: 'Meters' },
];

const PAPER_OPTIONS: SelectOption[] = [
  { value: 'letter', label: 'US Letter (8.5 × 11 in)' },
  { value: 'legal', label: 'US Legal (8.5 × 14 in)' },
  { value: 'a4', label: 'A4 (210 × 297 mm)' },
];

const AIM_OPTIONS: SelectOption[] = [
  { value: 'diagonal', label: 'Diagonal X' },
  { value: 'crosshair', label: 'Crosshair' },
  { value: 'circles', label: 'Concentric circles' },
  { value: 'none', label: 'Grid only' },
];

function renderSelect(name: string, options: SelectOption[], selected: string): string {
  const items = options
    .map((option) => {
      const attr = option.value === selected ? ' selected' : '';
      return `<option value="${escapeHtml(option.value)}"${attr}>${escapeHtml(option.label)}</option>`;
    })
    .join('');
  return `<select id="${name}" name="${name}">${items}</select>`;
}

export interface FormPageModel {
  /** Submitted values; omitted on the first visit so defaults are shown */
  values?: FormValues;
  /** Inline error message */
  error?: string;
}

/**
 * Renders the full form page.
 */
export function renderFormPage(model: FormPageModel = {}): string {
  const submitted = model.values;
  const values: Required<FormValues> = {
    distance: submitted?.distance ?? String(DEFAULT_TARGET_OPTIONS.distance),
    unit: submitted?.unit ?? DEFAULT_TARGET_OPTIONS.unit,
    moa: submitted?.moa ?? String(DEFAULT_TARGET_OPTIONS.moa),
    paperSize: submitted?.paperSize ?? DEFAULT_TARGET_OPTIONS.paperSize,
    aimPoint: submitted?.aimPoint ?? DEFAULT_TARGET_OPTIONS.aimPoint,
    aimLineThickness: submitted?.aimLineThickness ?? String(DEFAULT_TARGET_OPTIONS.aimLineThickness),
    scopeAdjustmentText: submitted ? submitted.scopeAdjustmentText ?? '' : 'on',
  };

  const errorBlock = model.error
    ? `<p class="error" role="alert">${escapeHtml(model.error)}</p>`
    : '';
  const checked = values.scopeAdjustmentText !== '' ? ' checked' : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Target Generator</title>
<style>
body { font-family: Helvetica, Arial, sans-serif; max-width: 28rem; margin: 2rem auto; padding: 0 1rem; }
label { display: block; margin-top: 0.75rem; }
input, select { width: 100%; padding: 0.25rem; box-sizing: border-box; }
input[type="checkbox"] { width: auto; }
button { margin-top: 1.25rem; padding: 0.5rem 1rem; }
.error { color: #b00020; font-weight: bold; }
</style>
</head>
<body>
<h1>Target Generator</h1>
${errorBlock}
<form method="post" action="/create_target">
<label for="distance">Distance</label>
<input id="distance" name="distance" type="text" inputmode="decimal" value="${escapeHtml(values.distance)}">
<label for="unit">Unit</label>
${renderSelect('unit', UNIT_OPTIONS, values.unit)}
<label for="moa">MOA per click</label>
<input id="moa" name="moa" type="text" inputmode="decimal" value="${escapeHtml(values.moa)}">
<label for="paperSize">Paper size</label>
${renderSelect('paperSize', PAPER_OPTIONS, values.paperSize)}
<label for="aimPoint">Aim point</label>
${renderSelect('aimPoint', AIM_OPTIONS, values.aimPoint)}
<label for="aimLineThickness">Aim line thickness (inches)</label>
<input id="aimLineThickness" name="aimLineThickness" type="text" inputmode="decimal" value="${escapeHtml(values.aimLineThickness)}">
<label><input name="scopeAdjustmentText" type="checkbox" value="on"${checked}> Add scope adjustment text</label>
<button type="submit">Generate Target</button>
</form>
</body>
</html>
`;
}
