/**
 * CSV codec for simulator traces and reference files.
 *
 * Dialect: comma delimiter, `"` quote, doubled quotes inside quoted
 * fields, minimal quoting on output, `\r\n` record terminator.
 */

import { StringDecoder } from "node:string_decoder";

export type CsvRow = readonly string[];

type ParserState =
  | "record-start"
  | "field-start"
  | "unquoted"
  | "quoted"
  | "quote-in-quoted";

// ---------------------------------------------------------------------------
// Push parser
// ---------------------------------------------------------------------------

/**
 * Incremental parser: feed text in arbitrary chunks, collect the records
 * completed so far. `\r\n`, `\r` and `\n` all end a record, even when a
 * `\r\n` pair is split across two chunks.
 */
export class CsvParser {
  private _state: ParserState = "record-start";
  private _field = "";
  private _fields: string[] = [];
  private _afterCR = false;

  push(text: string): string[][] {
    const records: string[][] = [];
    for (let ch of text) {
      if (this._afterCR) {
        this._afterCR = false;
        if (ch === "\n") continue;
      }
      if (ch === "\r") {
        this._afterCR = true;
        ch = "\n";
      }
      const record = this.feed(ch);
      if (record) records.push(record);
    }
    return records;
  }

  /** Flush a trailing record that has no terminator. */
  end(): string[][] {
    this._afterCR = false;
    if (this._state === "record-start") {
      return [];
    }
    return [this.finishRecord()];
  }

  private feed(ch: string): string[] | undefined {
    switch (this._state) {
      case "record-start":
        if (ch === "\n") {
          // blank line
          return [];
        }
        return this.startField(ch);

      case "field-start":
        if (ch === "\n") return this.finishRecord();
        return this.startField(ch);

      case "unquoted":
        if (ch === "\n") return this.finishRecord();
        if (ch === ",") {
          this.saveField();
        } else {
          this._field += ch;
        }
        return undefined;

      case "quoted":
        if (ch === '"') {
          this._state = "quote-in-quoted";
        } else {
          this._field += ch;
        }
        return undefined;

      case "quote-in-quoted":
        if (ch === '"') {
          this._field += '"';
          this._state = "quoted";
        } else if (ch === ",") {
          this.saveField();
        } else if (ch === "\n") {
          return this.finishRecord();
        } else {
          this._field += ch;
          this._state = "unquoted";
        }
        return undefined;
    }
  }

  private startField(ch: string): undefined {
    if (ch === '"') {
      this._state = "quoted";
    } else if (ch === ",") {
      this.saveField();
    } else {
      this._field += ch;
      this._state = "unquoted";
    }
    return undefined;
  }

  private saveField(): void {
    this._fields.push(this._field);
    this._field = "";
    this._state = "field-start";
  }

  private finishRecord(): string[] {
    this._fields.push(this._field);
    const record = this._fields;
    this._field = "";
    this._fields = [];
    this._state = "record-start";
    return record;
  }
}

// ---------------------------------------------------------------------------
// Pull-based row stream
// ---------------------------------------------------------------------------

/**
 * Reads one record at a time from a byte (or string) stream.
 * Bytes are decoded as UTF-8; malformed sequences become U+FFFD.
 */
export class CsvRowStream {
  private readonly _iterator: AsyncIterator<Buffer | string>;
  private readonly _parser = new CsvParser();
  private readonly _decoder = new StringDecoder("utf8");
  private readonly _pending: string[][] = [];
  private _done = false;

  constructor(source: AsyncIterable<Buffer | string>) {
    this._iterator = source[Symbol.asyncIterator]();
  }

  /** The next record, or `undefined` once the source is exhausted. */
  async next(): Promise<string[] | undefined> {
    while (this._pending.length === 0 && !this._done) {
      const result = await this._iterator.next();
      if (result.done) {
        this._done = true;
        this._pending.push(
          ...this._parser.push(this._decoder.end()),
          ...this._parser.end(),
        );
      } else {
        const chunk = result.value;
        const text = typeof chunk === "string" ? chunk : this._decoder.write(chunk);
        this._pending.push(...this._parser.push(text));
      }
    }
    return this._pending.shift();
  }

  /** Stop reading and release the underlying source. */
  async close(): Promise<void> {
    if (this._done) return;
    this._done = true;
    await this._iterator.return?.();
  }
}

// ---------------------------------------------------------------------------
// Writing / comparison
// ---------------------------------------------------------------------------

const NEEDS_QUOTING = /[",\r\n]/;

/** Format one record, including its `\r\n` terminator. */
export function formatCsvRow(row: CsvRow): string {
  if (row.length === 1 && row[0] === "") {
    return '""\r\n';
  }
  const fields = row.map((field) =>
    NEEDS_QUOTING.test(field) ? `"${field.replace(/"/g, '""')}"` : field,
  );
  return `${fields.join(",")}\r\n`;
}

export function formatCsv(rows: readonly CsvRow[]): string {
  return rows.map(formatCsvRow).join("");
}

/** Field-by-field equality; a missing row only equals another missing row. */
export function rowsEqual(
  a: CsvRow | undefined,
  b: CsvRow | undefined,
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.length === b.length && a.every((field, i) => field === b[i]);
}
