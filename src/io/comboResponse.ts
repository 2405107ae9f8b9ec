/**
 * comboHelpAjax response flattening
 * The portal's course list comes back as
 *   { comboTotalRecordCount, comboData: [{ list: [{ columnAlias, columnValue }, ...] }, ...] }
 * which this turns into a plain courses CSV.
 */

import * as fs from 'fs';
import { logger } from '../logger.js';
import { formatCsv, type CsvRow } from './csv.js';

export interface ComboTable {
  totalRecords: number;
  headers: string[];
  rows: CsvRow[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function columns(entry: unknown): { alias: string; value: string }[] {
  if (!isRecord(entry) || !Array.isArray(entry.list)) return [];
  const out: { alias: string; value: string }[] = [];
  for (const item of entry.list) {
    if (!isRecord(item)) continue;
    const alias = typeof item.columnAlias === 'string' ? item.columnAlias : '';
    if (!alias) continue;
    const raw = item.columnValue;
    out.push({ alias, value: raw === null || raw === undefined ? '' : String(raw) });
  }
  return out;
}

/**
 * Headers come from the first entry's aliases; every entry becomes one row
 */
export function parseComboResponse(data: unknown): ComboTable {
  const comboData = isRecord(data) && Array.isArray(data.comboData) ? data.comboData : [];
  const total = isRecord(data) && typeof data.comboTotalRecordCount === 'number' ? data.comboTotalRecordCount : 0;

  if (comboData.length === 0) {
    return { totalRecords: total, headers: [], rows: [] };
  }

  const headers = columns(comboData[0]).map(c => c.alias);
  const rows = comboData.map(entry => {
    const row: CsvRow = {};
    for (const { alias, value } of columns(entry)) {
      row[alias] = value;
    }
    return row;
  });

  return { totalRecords: total, headers, rows };
}

/**
 * Convert a saved comboHelpAjax JSON file to CSV. Returns the row count.
 */
export function convertComboFile(inputPath: string, outputPath: string): number {
  const data: unknown = JSON.parse(fs.readFileSync(inputPath, 'utf-8'));
  const table = parseComboResponse(data);

  logger.info('Combo', `Total records: ${table.totalRecords}, in response: ${table.rows.length}`);

  if (table.rows.length === 0) {
    logger.warn('Combo', 'No combo data found');
    return 0;
  }

  logger.debug('Combo', `Headers: ${table.headers.join(', ')}`);
  fs.writeFileSync(outputPath, formatCsv(table.headers, table.rows), 'utf-8');
  logger.info('Combo', `Wrote ${table.rows.length} rows to ${outputPath}`);

  table.rows.slice(0, 3).forEach((row, i) => {
    const filled = Object.fromEntries(Object.entries(row).filter(([, value]) => value));
    logger.debug('Combo', `Row ${i + 1}`, filled);
  });

  return table.rows.length;
}
