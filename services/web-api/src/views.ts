/**
 * HTML Views
 *
 * The upload page and the results page. Every interpolated value goes
 * through escapeHtml.
 */

import { DOCUMENT_TYPES, SUPPORTED_EXTENSIONS, type ExtractionResult } from '@docintake/shared';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 48rem; margin: 2rem auto; padding: 0 1rem; }
    table { border-collapse: collapse; width: 100%; }
    th, td { text-align: left; padding: 0.4rem; border-bottom: 1px solid #ddd; vertical-align: top; }
    td { white-space: pre-wrap; }
    .error { color: #b00020; }
    .badge { padding: 0.1rem 0.5rem; border-radius: 0.5rem; }
    .high { background: #d4f5dd; } .medium { background: #fff3c4; } .low { background: #fddede; }
  </style>
</head>
<body>
${body}
</body>
</html>`;
}

export interface UploadPageOptions {
  title: string;
  modelName: string;
  error?: string;
}

export function renderUploadPage(options: UploadPageOptions): string {
  const typeOptions = DOCUMENT_TYPES.filter((t) => t !== 'unknown')
    .map((t) => `<option value="${t}">${t}</option>`)
    .join('');
  const error = options.error ? `<p class="error">${escapeHtml(options.error)}</p>` : '';

  return layout(
    options.title,
    `<h1>${escapeHtml(options.title)}</h1>
<p>Model: ${escapeHtml(options.modelName)}</p>
${error}
<form action="/upload" method="post" enctype="multipart/form-data">
  <p><input type="file" name="file" accept="${SUPPORTED_EXTENSIONS.join(',')}" capture="environment" required></p>
  <p>
    <label for="document_type">Document type</label>
    <select id="document_type" name="document_type">
      <option value="">Detect automatically</option>${typeOptions}
    </select>
  </p>
  <p><button type="submit">Extract</button></p>
</form>`
  );
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

export interface ResultsPageOptions {
  title: string;
  filename: string;
  result: ExtractionResult;
}

export function renderResultsPage(options: ResultsPageOptions): string {
  const { result } = options;
  const rows = Object.entries(result.extracted_data)
    .filter(([key]) => !key.endsWith('_raw'))
    .map(([key, value]) => `<tr><th>${escapeHtml(key)}</th><td>${escapeHtml(formatValue(value))}</td></tr>`)
    .join('\n');
  const review = result.needs_human_review
    ? '<p class="error">Needs human review</p>'
    : '<p>No review needed</p>';

  return layout(
    options.title,
    `<h1>${escapeHtml(options.filename)}</h1>
<p>
  Type: <strong>${escapeHtml(result.document_type)}</strong>
  &middot; Confidence: <span class="badge ${result.confidence_level}">${result.confidence_level} (${result.confidence_score.toFixed(2)})</span>
  &middot; Model: ${escapeHtml(result.model_display_name)}
  &middot; ${result.processing_time_ms} ms
</p>
${review}
<table>
${rows}
</table>
<p><a href="/">Upload another document</a></p>`
  );
}
