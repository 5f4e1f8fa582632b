import type { EventData } from "@evdata/core";

// Hint from the second half of the puzzle: "try XOR with 0x17F".
export const XOR_KEY = 0x17f;

export const INPUT_KEYS = ["one", "two", "three", "four"] as const;
export const OUTPUT_KEY = "five";

const UINT16_MASK = 0xffff;

export type FifthValueTerm = {
  key: string;
  raw: string;
  value: number;
  masked: number;
};

type FifthValueFailure = {
  ok: false;
  reason: "missing_key" | "invalid_hex";
  key: string;
};

type FifthValueSuccess = {
  ok: true;
  value: number;
  terms: FifthValueTerm[];
};

export type FifthValueResult = FifthValueFailure | FifthValueSuccess;

export function parseHex16(raw: string): number | null {
  let digits = raw;
  while (digits.startsWith("0x")) {
    digits = digits.slice(2);
  }

  if (!/^[0-9a-fA-F]+$/.test(digits)) {
    return null;
  }

  const value = Number.parseInt(digits, 16);
  return value <= UINT16_MASK ? value : null;
}

function trailingZeros16(value: number): number {
  const bits = value & UINT16_MASK;
  if (bits === 0) {
    return 16;
  }

  let count = 0;
  while (((bits >> count) & 1) === 0) {
    count += 1;
  }
  return count;
}

/** 1-based index of the lowest bit where `a` and `b` differ; 17 when they are equal. */
export function firstMismatchingBit(a: number, b: number): number {
  return trailingZeros16(a ^ b) + 1;
}

/**
 * Next term of x_n = x_{n-1} + firstMismatchingBit(x_{n-2}, x_{n-1}) * (n - 1).
 *
 * With 43, 47, 53, 59 the increments are 3 * 2, 2 * 3 and 2 * 4, giving 67.
 */
export function nextTerm(sequence: readonly number[]): number {
  const n = sequence.length + 1;
  if (n < 3) {
    throw new Error("At least two terms are required");
  }

  const previous = sequence[n - 2];
  const beforePrevious = sequence[n - 3];
  return (previous + firstMismatchingBit(beforePrevious, previous) * (n - 1)) & UINT16_MASK;
}

export function figureFifthValue(data: EventData): FifthValueResult {
  const terms: FifthValueTerm[] = [];

  for (const key of INPUT_KEYS) {
    const raw = data.get(key);
    if (raw === undefined) {
      return { ok: false, reason: "missing_key", key };
    }

    const value = parseHex16(raw);
    if (value === null) {
      return { ok: false, reason: "invalid_hex", key };
    }

    terms.push({ key, raw, value, masked: value ^ XOR_KEY });
  }

  const masked = nextTerm(terms.map((term) => term.masked));
  return { ok: true, value: masked ^ XOR_KEY, terms };
}

export function formatHex(value: number): string {
  return `0x${value.toString(16)}`;
}

export function describeTerm(term: FifthValueTerm): string {
  return [
    term.key.padEnd(5),
    term.raw,
    `0b${term.value.toString(2)}`,
    `xorred:0b${term.masked.toString(2)}`,
    String(term.masked),
    String.fromCodePoint(term.masked),
  ].join(" ");
}

export function describeTerms(terms: readonly FifthValueTerm[]): string[] {
  return terms.map((term) => describeTerm(term));
}

/** Returns a copy of `data` with the fifth value set, or the failure that prevented it. */
export function enrichEventData(
  data: EventData
): { data: EventData; result: FifthValueResult } {
  const result = figureFifthValue(data);
  if (result.ok === false) {
    return { data, result };
  }

  const enriched = new Map(data);
  enriched.set(OUTPUT_KEY, formatHex(result.value));
  return { data: enriched, result };
}
