/**
 * Minimal CSV helpers (RFC 4180 quoting) for indicator exports.
 */

export function csvField(value: string | null): string {
  if (value === null) return '';
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function csvRow(fields: Array<string | null>): string {
  return fields.map(csvField).join(',');
}

export function toCsv(header: string[], rows: Array<Array<string | null>>): string {
  return [csvRow(header), ...rows.map(csvRow)].join('\n') + '\n';
}

/** First column of every data row, header skipped. */
export function readFirstColumn(text: string): string[] {
  return text
    .split(/\r?\n/)
    .slice(1)
    .map((line) => {
      const first = line.startsWith('"')
        ? line.slice(1, line.indexOf('"', 1))
        : line.split(',')[0];
      return first.trim();
    })
    .filter((value) => value !== '');
}
