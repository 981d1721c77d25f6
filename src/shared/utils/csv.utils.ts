/**
 * CSV building for report downloads.
 * RFC 4180 quoting, CRLF line endings.
 */

import { Response } from 'express';

export type CsvCell = string | number | null | undefined;

/** UTF-8 byte order mark, prefixed to downloads */
export const UTF8_BOM = '\uFEFF';

export function csvEscape(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) return `"${str.replace(/"/g, '""')}"`;
  return str;
}

export function buildCsv(headers: readonly string[], rows: ReadonlyArray<readonly CsvCell[]>): string {
  const lines = [headers, ...rows].map(row => row.map(csvEscape).join(','));
  return `${lines.join('\r\n')}\r\n`;
}

export interface CsvDocument {
  filename: string;
  content: string;
  rowCount: number;
}

/**
 * Send a CSV document as an attachment
 */
export function sendCsv(res: Response, document: CsvDocument): void {
  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.setHeader('Content-Disposition', `attachment; filename="${document.filename}"`);
  res.status(200).send(`${UTF8_BOM}${document.content}`);
}
