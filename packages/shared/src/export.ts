/**
 * Result Export
 *
 * Renders a stored extraction as JSON, CSV (header + one row) or XML.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { StoredDocument } from './types';

export const EXPORT_FORMATS = ['json', 'csv', 'xml'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: unknown): value is ExportFormat {
  return typeof value === 'string' && EXPORT_FORMATS.some((item) => item === value);
}

export interface ExportedFile {
  contentType: string;
  filename: string;
  body: string;
}

type FlatValue = string | number | boolean;

/**
 * One flat record per document: result metadata first, then the extracted
 * fields. Metadata names win over extracted fields with the same name.
 */
export function toExportRecord(document: StoredDocument): Record<string, unknown> {
  const result = document.processing_result;
  return {
    ...result.extracted_data,
    document_id: document.document_id,
    original_filename: document.original_filename,
    document_type: result.document_type,
    confidence_score: result.confidence_score,
    confidence_level: result.confidence_level,
    needs_human_review: result.needs_human_review,
    extraction_method: result.extraction_method,
    uploaded_at: document.uploaded_at,
  };
}

function orderedRecord(document: StoredDocument): Record<string, unknown> {
  const record = toExportRecord(document);
  const metadata = [
    'document_id',
    'original_filename',
    'document_type',
    'confidence_score',
    'confidence_level',
    'needs_human_review',
    'extraction_method',
    'uploaded_at',
  ];
  const ordered: Record<string, unknown> = {};
  for (const key of metadata) {
    ordered[key] = record[key];
  }
  for (const [key, value] of Object.entries(record)) {
    if (!metadata.includes(key)) {
      ordered[key] = value;
    }
  }
  return ordered;
}

function flatten(value: unknown): FlatValue {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

function csvCell(value: unknown): string {
  const text = String(flatten(value));
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * RFC 4180 CSV: a header row and one data row, CRLF line endings.
 */
export function toCsv(record: Record<string, unknown>): string {
  const keys = Object.keys(record);
  const header = keys.map(csvCell).join(',');
  const row = keys.map((key) => csvCell(record[key])).join(',');
  return `${header}\r\n${row}\r\n`;
}

/** Element names must start with a letter or underscore */
function xmlName(key: string): string {
  const cleaned = key.replace(/[^A-Za-z0-9_.-]/g, '_');
  return /^[A-Za-z_]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

function toXmlValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.map(toXmlValue);
  }
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      out[xmlName(key)] = toXmlValue(nested);
    }
    return out;
  }
  return value;
}

export function toXml(record: Record<string, unknown>, rootTag = 'document'): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    format: true,
    indentBy: '  ',
  });

  return builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    [rootTag]: toXmlValue(record),
  });
}

export function exportDocument(document: StoredDocument, format: ExportFormat): ExportedFile {
  const record = orderedRecord(document);
  const base = `extract_${document.document_id}`;

  switch (format) {
    case 'csv':
      return { contentType: 'text/csv', filename: `${base}.csv`, body: toCsv(record) };
    case 'xml':
      return { contentType: 'application/xml', filename: `${base}.xml`, body: toXml(record) };
    case 'json':
      return {
        contentType: 'application/json',
        filename: `${base}.json`,
        body: JSON.stringify(record, null, 2),
      };
  }
}
