import { expect, test } from "vitest";
import { DecodeError, encodeVlq, VlqReader } from "../Vlq.js";

test("encode small values", () => {
  const encoded = [0, 1, -1, 4, -4, 15, -15].map(encodeVlq);
  expect(encoded).deep.equals(["A", "C", "D", "I", "J", "e", "f"]);
});

test("encode multi digit values", () => {
  expect(encodeVlq(16)).eq("gB");
  expect(encodeVlq(-16)).eq("hB");
  expect(encodeVlq(1000)).eq("w+B");
});

test("read multi digit values", () => {
  const reader = new VlqReader("gBhBw+BA");
  const values = [reader.read(), reader.read(), reader.read(), reader.read()];
  expect(values).deep.equals([16, -16, 1000, 0]);
  expect(reader.done()).true;
});

test("read large values", () => {
  const big = 2 ** 30 + 7;
  const reader = new VlqReader(encodeVlq(big) + encodeVlq(-big));
  expect(reader.read()).eq(big);
  expect(reader.read()).eq(-big);
});

test("reject characters outside the base64 alphabet", () => {
  const reader = new VlqReader("A*");
  reader.read();
  expect(() => reader.read()).toThrow(DecodeError);
  expect(() => new VlqReader("é").read()).toThrow(
    "invalid base64 character 'é' (at offset 0)"
  );
});

test("reject truncated continuation", () => {
  const reader = new VlqReader("g");
  expect(() => reader.read()).toThrow(
    "truncated vlq continuation (at offset 1)"
  );
  expect(() => new VlqReader("g,A").read()).toThrow(DecodeError);
});

test("reject values beyond 32 bits", () => {
  expect(() => new VlqReader("gggggggB").read()).toThrow(
    "vlq value exceeds 32 bits"
  );
});
