import { describe, expect, it } from "vitest";
import { stringifyOrdered } from "./json";

describe("stringifyOrdered", () => {
  it("should keep the insertion order of map keys, integer-like ones included", () => {
    const row = new Map([
      ["2024", "up"],
      ["2023", "down"],
      ["name", "sales"],
    ]);

    expect(stringifyOrdered(row)).toBe('{"2024":"up","2023":"down","name":"sales"}');
  });

  it("should match JSON.stringify for plain values", () => {
    const value = {
      title: "A \"quoted\" title",
      level: 2,
      flags: [true, false, null],
      nested: { empty: [], none: {} },
    };

    expect(stringifyOrdered(value)).toBe(JSON.stringify(value));
    expect(stringifyOrdered(value, "  ")).toBe(JSON.stringify(value, null, 2));
  });

  it("should omit undefined object properties", () => {
    expect(stringifyOrdered({ type: "text", content: undefined })).toBe('{"type":"text"}');
  });

  it("should indent maps nested in arrays", () => {
    const rows = [new Map([["b", "1"], ["a", "2"]])];

    expect(stringifyOrdered(rows, "  ")).toBe('[\n  {\n    "b": "1",\n    "a": "2"\n  }\n]');
  });
});
