/**
 * One parsed CSV record. `quoted[i]` tells whether field `i` was enclosed
 * in quotes, which keeps a quoted null token readable as text.
 */
export interface CsvRecord {
  fields: string[];
  quoted: boolean[];
}

/**
 * Incremental RFC 4180 parser.
 *
 * Text is fed in arbitrary chunks; quote state, partial fields and a
 * trailing CR carry over between chunks. Empty lines produce no record.
 *
 * @example
 * ```typescript
 * const parser = new CsvParser(',', '"');
 * parser.feed('a,"b\n');      // []
 * parser.feed('c"\n1,2\n');   // [a | b\nc] and [1 | 2]
 * parser.finish();            // []
 * ```
 */
export class CsvParser {
  private readonly delimiter: string;
  private readonly quote: string;

  private fields: string[] = [];
  private quoted: boolean[] = [];
  private field = '';
  private fieldQuoted = false;
  private inQuotes = false;
  private afterQuote = false;
  private skipLineFeed = false;

  constructor(delimiter = ',', quote = '"') {
    this.delimiter = delimiter;
    this.quote = quote;
  }

  /**
   * Parse a chunk of text and return the records completed by it.
   */
  feed(text: string): CsvRecord[] {
    const records: CsvRecord[] = [];

    for (let i = 0; i < text.length; i++) {
      const c = text.charAt(i);

      if (this.skipLineFeed) {
        this.skipLineFeed = false;
        if (c === '\n') continue;
      }

      if (this.inQuotes) {
        if (!this.afterQuote) {
          if (c === this.quote) {
            this.afterQuote = true;
          } else {
            this.field += c;
          }
          continue;
        }
        // A quote inside a quoted field is either escaped or closes it
        this.afterQuote = false;
        if (c === this.quote) {
          this.field += c;
          continue;
        }
        this.inQuotes = false;
      }

      if (c === this.delimiter) {
        this.endField();
      } else if (c === '\n' || c === '\r') {
        this.endRecord(records);
        this.skipLineFeed = c === '\r';
      } else if (c === this.quote && this.field === '' && !this.fieldQuoted) {
        this.inQuotes = true;
        this.fieldQuoted = true;
      } else {
        this.field += c;
      }
    }

    return records;
  }

  /**
   * Flush the last record when the input does not end with a line break.
   * An unterminated quoted field ends at the end of input.
   */
  finish(): CsvRecord[] {
    const records: CsvRecord[] = [];
    this.inQuotes = false;
    this.afterQuote = false;
    this.skipLineFeed = false;
    this.endRecord(records);
    return records;
  }

  private endField(): void {
    this.fields.push(this.field);
    this.quoted.push(this.fieldQuoted);
    this.field = '';
    this.fieldQuoted = false;
  }

  private endRecord(records: CsvRecord[]): void {
    if (this.fields.length === 0 && this.field === '' && !this.fieldQuoted) {
      return;
    }
    this.endField();
    records.push({ fields: this.fields, quoted: this.quoted });
    this.fields = [];
    this.quoted = [];
  }
}

/**
 * Quote a field when it contains the delimiter, the quote or a line break.
 * Embedded quotes are doubled.
 */
export function escapeField(value: string, delimiter: string, quote: string, force = false): string {
  if (
    force ||
    value.includes(delimiter) ||
    value.includes(quote) ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return `${quote}${value.split(quote).join(quote + quote)}${quote}`;
  }
  return value;
}
