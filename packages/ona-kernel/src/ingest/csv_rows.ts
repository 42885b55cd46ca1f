import type { Readable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import { CsvError, parse } from "csv-parse/sync";

// Longest physical line accepted, in UTF-16 code units.
export const MAX_ROW_CHARS = 64 * 1024;

export type CsvRowReaderOptions = {
  maxRowChars?: number;
};

// An over-long line is surfaced as null so it is counted, never buffered whole.
type Line = string | null;

/**
 * Pull-based CSV row reader over a byte stream.
 *
 * The stream is split into physical lines and each line is tokenized on its own with
 * csv-parse, so a broken row (an unclosed quote, a line past `maxRowChars`) costs that
 * row only and memory stays bounded by one stream chunk plus one line. Rows that cannot
 * be tokenized are counted in `malformedRows`. Quoted fields cannot span lines.
 */
export class CsvRowReader {
  private readonly maxRowChars: number;
  private readonly lines: AsyncGenerator<Line>;
  private bytes = 0;
  private rows = 0;
  private malformed = 0;

  constructor(
    private readonly input: Readable,
    options: CsvRowReaderOptions = {}
  ) {
    this.maxRowChars = Math.max(1, options.maxRowChars ?? MAX_ROW_CHARS);
    this.lines = this.splitLines();
  }

  /** Bytes pulled from the input so far. */
  get bytesRead(): number {
    return this.bytes;
  }

  /** Records returned so far, header included. */
  get rowCount(): number {
    return this.rows;
  }

  get malformedRows(): number {
    return this.malformed;
  }

  async next(): Promise<string[] | null> {
    for (;;) {
      const r = await this.lines.next();
      if (r.done) return null;
      if (r.value === null) {
        this.malformed++;
        continue;
      }
      if (!r.value.trim()) continue;

      const cells = this.tokenize(r.value);
      if (cells === null) {
        this.malformed++;
        continue;
      }
      this.rows++;
      return cells;
    }
  }

  close(): void {
    this.input.destroy();
  }

  private tokenize(line: string): string[] | null {
    let records: unknown;
    try {
      records = parse(line, { bom: true, trim: true, relax_column_count: true });
    } catch (err) {
      if (err instanceof CsvError) return null;
      throw err;
    }
    if (!Array.isArray(records) || records.length !== 1) return null;
    return toCells(records[0]);
  }

  private async *splitLines(): AsyncGenerator<Line> {
    const decoder = new StringDecoder("utf8");
    let buf = "";
    let overflow = false;

    const finish = (line: string): Line => {
      const wasOverflow = overflow;
      overflow = false;
      if (wasOverflow || line.length > this.maxRowChars) return null;
      return line.endsWith("\r") ? line.slice(0, -1) : line;
    };

    for await (const chunk of this.input) {
      const data: unknown = chunk;
      if (Buffer.isBuffer(data)) {
        this.bytes += data.length;
        buf += decoder.write(data);
      } else {
        const text = String(data);
        this.bytes += Buffer.byteLength(text);
        buf += text;
      }

      let start = 0;
      let nl = buf.indexOf("\n");
      while (nl !== -1) {
        yield finish(buf.slice(start, nl));
        start = nl + 1;
        nl = buf.indexOf("\n", start);
      }
      buf = buf.slice(start);
      if (overflow || buf.length > this.maxRowChars) {
        overflow = true;
        buf = "";
      }
    }

    buf += decoder.end();
    if (overflow || buf.length > 0) yield finish(buf);
  }
}

function toCells(record: unknown): string[] {
  if (!Array.isArray(record)) return [];
  return record.map((cell: unknown) => (typeof cell === "string" ? cell : String(cell ?? "")));
}
