export type EventData = Map<string, string>;

export type ParseFailureReason = "invalid_key" | "invalid_value";

export type ParseError = {
  reason: ParseFailureReason;
  offset: number;
  message: string;
};

type ParseFailure = {
  ok: false;
  error: ParseError;
};

type ParseSuccess = {
  ok: true;
  data: EventData;
};

export type ParseResult = ParseFailure | ParseSuccess;

const WHITESPACE = /^\p{White_Space}$/u;

function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

/**
 * Forward-only reader over the code points of an in-memory string.
 */
export class Cursor {
  private readonly chars: string[];
  private index = 0;

  constructor(input: string) {
    this.chars = Array.from(input);
  }

  get offset(): number {
    return this.index;
  }

  get done(): boolean {
    return this.index >= this.chars.length;
  }

  peek(): string | undefined {
    return this.chars[this.index];
  }

  next(): string | undefined {
    const char = this.chars[this.index];
    if (char !== undefined) {
      this.index += 1;
    }
    return char;
  }

  skipWhitespace(): void {
    let char = this.peek();
    while (char !== undefined && isWhitespace(char)) {
      this.index += 1;
      char = this.peek();
    }
  }
}

class ScanFailure extends Error {
  constructor(
    readonly reason: ParseFailureReason,
    readonly offset: number
  ) {
    super(`${reason === "invalid_key" ? "invalid key" : "invalid value"} at offset ${offset}`);
  }
}

function parseKey(cursor: Cursor): string {
  cursor.skipWhitespace();

  let key = "";
  for (let char = cursor.next(); char !== undefined; char = cursor.next()) {
    if (char === ":") {
      return key;
    }
    key += char;
  }

  throw new ScanFailure("invalid_key", cursor.offset);
}

function parseValue(cursor: Cursor): string {
  cursor.skipWhitespace();

  if (cursor.peek() !== '"') {
    throw new ScanFailure("invalid_value", cursor.offset);
  }
  cursor.next();

  let value = "";
  for (let char = cursor.next(); char !== undefined; char = cursor.next()) {
    if (char === '"') {
      return value;
    }

    if (char === "\\") {
      // The only escape is \".
      if (cursor.peek() !== '"') {
        throw new ScanFailure("invalid_value", cursor.offset);
      }
      cursor.next();
      value += '"';
      continue;
    }

    value += char;
  }

  throw new ScanFailure("invalid_value", cursor.offset);
}

/**
 * Parses `key:"value"` pairs separated by optional whitespace.
 *
 * Keys run up to the first `:` and are kept verbatim apart from leading whitespace.
 * A later duplicate key replaces the earlier value. The first malformed pair fails the
 * whole parse.
 */
export function parseEventData(input: string): ParseResult {
  const cursor = new Cursor(input);
  const data: EventData = new Map();

  try {
    while (!cursor.done) {
      cursor.skipWhitespace();
      if (cursor.done) {
        break;
      }

      const key = parseKey(cursor);
      const value = parseValue(cursor);
      data.set(key, value);
    }
  } catch (error) {
    if (error instanceof ScanFailure) {
      return {
        ok: false,
        error: { reason: error.reason, offset: error.offset, message: error.message },
      };
    }
    throw error;
  }

  return { ok: true, data };
}

export class EventDataParseError extends Error {
  readonly reason: ParseFailureReason;
  readonly offset: number;

  constructor(error: ParseError) {
    super(error.message);
    this.name = "EventDataParseError";
    this.reason = error.reason;
    this.offset = error.offset;
  }
}

export function parseEventDataOrThrow(input: string): EventData {
  const result = parseEventData(input);
  if (result.ok === false) {
    throw new EventDataParseError(result.error);
  }
  return result.data;
}
