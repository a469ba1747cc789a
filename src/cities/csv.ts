/**
 * Minimal CSV reading: comma separated, double-quoted fields, "" as an escaped quote.
 * Records never span lines.
 */

export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      values.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current);

  return values;
}

export interface CsvLine {
  /** 1-based line number in the source text */
  lineNumber: number;
  raw: string;
}

/**
 * Split text into non-blank lines, keeping their original line numbers
 */
export function splitCsvLines(text: string): CsvLine[] {
  const withoutBom = text.startsWith('\uFEFF') ? text.slice(1) : text;

  return withoutBom
    .split(/\r?\n/)
    .map((raw, index) => ({ lineNumber: index + 1, raw }))
    .filter((line) => line.raw.trim().length > 0);
}
