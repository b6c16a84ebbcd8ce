/**
 * Minimal CSV reader for the listing files
 */

/**
 * Split CSV text into rows of raw fields. Quoted fields may hold commas,
 * doubled quotes and line breaks. Blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let rowHasContent = false;

  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const endRow = () => {
    row.push(current);
    if (rowHasContent || row.length > 1 || current.length > 0) {
      rows.push(row);
    }
    row = [];
    current = '';
    rowHasContent = false;
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && input[i + 1] === '\n') i++;
      endRow();
    } else {
      current += char;
    }
  }

  if (current.length > 0 || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

/**
 * Turn parsed rows into records keyed by the (trimmed, lower-cased) header
 */
export function rowsToRecords(rows: string[][]): Array<Record<string, string>> {
  const [header, ...body] = rows;
  if (!header) return [];

  const keys = header.map((h) => h.trim().toLowerCase());
  return body.map((fields) => {
    const record: Record<string, string> = {};
    keys.forEach((key, i) => {
      if (key && fields[i] !== undefined) {
        record[key] = fields[i];
      }
    });
    return record;
  });
}
