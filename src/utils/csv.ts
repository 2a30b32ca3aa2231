/**
 * CSV helpers
 *
 * Values containing a comma, a quote or a line break are quoted, with inner
 * quotes doubled. Rows end with "\n".
 */

export type CsvValue = string | number | boolean | null | undefined;

export function escapeCsv(value: CsvValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function csvRow(values: CsvValue[]): string {
  return values.map(escapeCsv).join(',');
}

/**
 * Join rows into a document; an empty row becomes a blank line
 */
export function csvDocument(rows: string[]): string {
  return rows.map((row) => `${row}\n`).join('');
}

/**
 * Calendar date in local time, e.g. "2025-04-12"
 */
export function formatCsvDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Local date and time to the second, e.g. "2025-04-12 18:05:09"
 */
export function formatCsvDateTime(date: Date): string {
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
  return `${formatCsvDate(date)} ${time}`;
}
