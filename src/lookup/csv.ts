/**
 * Split one CSV line into fields.
 *
 * Fields may be wrapped in double quotes. Inside quotes a comma is literal and
 * `""` stands for a single quote character. Surrounding whitespace is kept; the
 * caller decides what to trim.
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < line.length) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
    i++;
  }

  fields.push(current);
  return fields;
}
