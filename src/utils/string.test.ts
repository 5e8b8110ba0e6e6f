import { describe, expect, it } from "vitest";
import { chunkBreak, formatChunks, fullTrim } from "./string";

describe("fullTrim", () => {
  it("should remove every kind of surrounding whitespace", () => {
    expect(fullTrim("\n\t  text with  inner space \r\n\n")).toBe("text with  inner space");
  });

  it("should return an empty string for whitespace only", () => {
    expect(fullTrim(" \n\n\t")).toBe("");
  });
});

describe("formatChunks", () => {
  it("should follow every trimmed chunk with its break line", () => {
    const output = formatChunks(["# A\n\ntext\n\n", "  b "]);

    expect(output).toBe(
      "# A\n\ntext\n\n--- CHUNK BREAK [id: 0, len: 9] ---\n\nb\n\n--- CHUNK BREAK [id: 1, len: 1] ---\n\n",
    );
  });

  it("should return an empty string when there are no chunks", () => {
    expect(formatChunks([])).toBe("");
  });

  it("should format a single break line", () => {
    expect(chunkBreak(3, 120)).toBe("\n\n--- CHUNK BREAK [id: 3, len: 120] ---\n\n");
  });
});
