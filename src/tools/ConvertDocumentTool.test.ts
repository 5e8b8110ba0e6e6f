import { vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConvertDocumentTool, ConvertFormat } from "./ConvertDocumentTool";
import { DocumentReadError } from "./errors";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

describe("ConvertDocumentTool", () => {
  let tool: ConvertDocumentTool;

  beforeEach(() => {
    vol.reset();
    vol.fromJSON({ "/docs/page.md": "Title\n=====\n\nSome *text*" });
    tool = new ConvertDocumentTool();
  });

  it("should convert a file into its document tree", async () => {
    const json = await tool.execute({ filePath: "/docs/page.md", format: ConvertFormat.Json });

    expect(JSON.parse(json)).toEqual([
      {
        type: "heading",
        title: "Title",
        level: 1,
        content: [
          {
            type: "paragraph",
            content: [
              { type: "text", text: "Some " },
              { type: "text", text: "text" },
            ],
          },
        ],
      },
    ]);
  });

  it("should convert a file into normalized markdown", async () => {
    const markdown = await tool.execute({
      filePath: "/docs/page.md",
      format: ConvertFormat.Markdown,
    });

    expect(markdown).toBe("# Title\n\nSome *text*\n\n");
  });

  it("should fail when the file cannot be read", async () => {
    await expect(
      tool.execute({ filePath: "/docs/other.md", format: ConvertFormat.Json }),
    ).rejects.toThrow(DocumentReadError);
  });
});
