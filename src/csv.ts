/**
 * Minimal CSV codec for snapshot tables
 */

/**
 * Parse CSV text into records. Quoted fields may contain commas, doubled
 * quotes and line breaks. Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;
  let fieldStarted = false;

  const endRecord = () => {
    if (fieldStarted || record.length > 0) {
      record.push(field);
      records.push(record);
    }
    record = [];
    field = "";
    fieldStarted = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quoted) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        quoted = true;
        fieldStarted = true;
        break;
      case ",":
        record.push(field);
        field = "";
        fieldStarted = true;
        break;
      case "\r":
        if (input[i + 1] === "\n") i++;
        endRecord();
        break;
      case "\n":
        endRecord();
        break;
      default:
        field += ch;
        fieldStarted = true;
    }
  }
  endRecord();

  return records;
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(records: string[][]): string {
  return records.map((record) => record.map(escapeCsvField).join(",")).join("\n") + "\n";
}
