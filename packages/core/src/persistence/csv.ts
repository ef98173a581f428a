/**
 * Minimal RFC 4180 style CSV codec for the record file.
 *
 * Fields holding a comma, quote, CR or LF are quoted with inner quotes doubled.
 * The reader accepts quoted newlines and both LF and CRLF row endings.
 */

const NEEDS_QUOTING = /[",\r\n]/;

function escapeField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function serializeCsv(rows: ReadonlyArray<ReadonlyArray<string>>): string {
  return rows.map((row) => row.map(escapeField).join(',')).join('\n') + '\n';
}

/**
 * Parse CSV text into rows (handles quoted fields)
 * Blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRow = () => {
    row.push(field);
    if (!(row.length === 1 && row[0] === '')) {
      rows.push(row);
    }
    row = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"' && text.charAt(i + 1) === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && text.charAt(i + 1) === '\n') i++;
      endRow();
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}
