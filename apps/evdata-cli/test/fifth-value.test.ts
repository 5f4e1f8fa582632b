import test from "node:test";
import assert from "node:assert/strict";

import {
  describeTerms,
  enrichEventData,
  figureFifthValue,
  firstMismatchingBit,
  formatHex,
  nextTerm,
  parseHex16,
} from "../src/fifth-value.js";

const PUZZLE = new Map([
  ["one", "0x154"],
  ["two", "0x150"],
  ["three", "0x14A"],
  ["four", "0x144"],
]);

test("parseHex16 strips 0x prefixes and limits values to 16 bits", () => {
  assert.equal(parseHex16("0x154"), 0x154);
  assert.equal(parseHex16("0x0x1f"), 0x1f);
  assert.equal(parseHex16("ffff"), 0xffff);
  assert.equal(parseHex16("0x10000"), null);
  assert.equal(parseHex16("0x"), null);
  assert.equal(parseHex16("0xZZ"), null);
});

test("firstMismatchingBit is 1-based and 17 for equal values", () => {
  assert.equal(firstMismatchingBit(43, 47), 3);
  assert.equal(firstMismatchingBit(47, 53), 2);
  assert.equal(firstMismatchingBit(1, 0), 1);
  assert.equal(firstMismatchingBit(5, 5), 17);
});

test("nextTerm follows the recurrence", () => {
  assert.equal(nextTerm([43, 47]), 53);
  assert.equal(nextTerm([43, 47, 53]), 59);
  assert.equal(nextTerm([43, 47, 53, 59]), 67);
  assert.throws(() => nextTerm([43]), /At least two terms are required/);
});

test("figureFifthValue derives 0x13c from the puzzle values", () => {
  const result = figureFifthValue(PUZZLE);
  assert.equal(result.ok, true);
  if (result.ok) {
    assert.equal(result.value, 0x13c);
    assert.deepEqual(
      result.terms.map((term) => term.masked),
      [43, 47, 53, 59]
    );
  }
});

test("figureFifthValue reports the first missing key", () => {
  const data = new Map([["one", "0x154"]]);
  assert.deepEqual(figureFifthValue(data), { ok: false, reason: "missing_key", key: "two" });
});

test("figureFifthValue reports values that are not 16-bit hex", () => {
  const data = new Map(PUZZLE);
  data.set("three", "banana");
  assert.deepEqual(figureFifthValue(data), { ok: false, reason: "invalid_hex", key: "three" });
});

test("describeTerms prints one trace line per input key", () => {
  const result = figureFifthValue(PUZZLE);
  assert.equal(result.ok, true);
  if (result.ok) {
    assert.deepEqual(describeTerms(result.terms), [
      "one   0x154 0b101010100 xorred:0b101011 43 +",
      "two   0x150 0b101010000 xorred:0b101111 47 /",
      "three 0x14A 0b101001010 xorred:0b110101 53 5",
      "four  0x144 0b101000100 xorred:0b111011 59 ;",
    ]);
  }
});

test("enrichEventData adds five without touching the input mapping", () => {
  const { data, result } = enrichEventData(PUZZLE);
  assert.equal(result.ok, true);
  assert.equal(data.get("five"), "0x13c");
  assert.equal(PUZZLE.has("five"), false);
  assert.equal(formatHex(255), "0xff");
});

test("enrichEventData returns the mapping unchanged when a key is missing", () => {
  const input = new Map([["a", "1"]]);
  const { data, result } = enrichEventData(input);
  assert.equal(data, input);
  assert.deepEqual(result, { ok: false, reason: "missing_key", key: "one" });
});
