/**
 * Minimal CSV reader/writer for the portal exports
 */

export type CsvRow = Record<string, string>;

/**
 * Split CSV text into records of fields. Handles quoted fields with
 * doubled quotes, embedded commas and newlines, CRLF line endings.
 */
function parseRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let fieldValue = '';
  let inQuotes = false;
  let fieldStarted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          fieldValue += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        fieldValue += ch;
      }
      continue;
    }

    if (ch === '"' && fieldValue === '') {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === ',') {
      record.push(fieldValue);
      fieldValue = '';
      fieldStarted = true;
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      if (fieldStarted || fieldValue !== '' || record.length > 0) {
        record.push(fieldValue);
        records.push(record);
      }
      record = [];
      fieldValue = '';
      fieldStarted = false;
    } else {
      fieldValue += ch;
      fieldStarted = true;
    }
  }

  if (fieldStarted || fieldValue !== '' || record.length > 0) {
    record.push(fieldValue);
    records.push(record);
  }

  return records;
}

/**
 * Parse CSV text with a header line into header-keyed rows.
 * Missing trailing cells read as "".
 */
export function parseCsv(text: string): { headers: string[]; rows: CsvRow[] } {
  const records = parseRecords(text.replace(/^\uFEFF/, ''));
  if (records.length === 0) return { headers: [], rows: [] };

  const [headers, ...body] = records;
  const rows = body.map(cells => {
    const row: CsvRow = {};
    headers.forEach((header, index) => {
      row[header] = cells[index] ?? '';
    });
    return row;
  });

  return { headers, rows };
}

function escapeCell(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Build CSV text (header line, one line per row, trailing newline)
 */
export function formatCsv(headers: readonly string[], rows: ReadonlyArray<Partial<Record<string, string>>>): string {
  const lines = [
    headers.map(escapeCell).join(','),
    ...rows.map(row => headers.map(h => escapeCell(row[h] ?? '')).join(',')),
  ];
  return lines.join('\n') + '\n';
}
