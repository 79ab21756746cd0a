/**
 * Split one CSV line into cells, unquoting quoted cells
 * Whitespace around cells is kept; callers decide what to trim
 */
export function parseCsvLine(line: string): string[] {
  const cells: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (!quoted) {
      if (char === ',') {
        cells.push(cell);
        cell = '';
      } else if (char === '"') {
        quoted = true;
      } else {
        cell += char;
      }
    } else if (char !== '"') {
      cell += char;
    } else if (line[i + 1] === '"') {
      // "" inside quotes
      cell += '"';
      i++;
    } else {
      quoted = false;
    }
  }

  cells.push(cell);
  return cells;
}

/**
 * Split CSV content into non-empty lines, normalizing line endings
 */
export function splitCsvLines(content: string): string[] {
  return content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n')
    .filter((line) => line.trim().length > 0);
}

/**
 * Quote a value if it contains a comma or quote
 * Rows are read one line at a time, so line breaks become spaces
 */
export function escapeCsvValue(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) return '';
  const str = String(value).replace(/\r?\n|\r/g, ' ');
  if (/[",]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function formatCsvLine(values: ReadonlyArray<string | number | boolean | null | undefined>): string {
  return values.map(escapeCsvValue).join(',');
}
