import { describe, expect, it, vi } from "vitest";
import { DocumentTreeBuilder } from "./DocumentTreeBuilder";
import {
  createBlockQuoteNode,
  createCodeBlockNode,
  createCodeNode,
  createHeadingNode,
  createHtmlBlockNode,
  createImageNode,
  createLineSeparatorNode,
  createLinkNode,
  createListItemNode,
  createListNode,
  createParagraphNode,
  createSoftBreakNode,
  createTextNode,
} from "./nodes";
import { parseMarkdown } from "./parser";
import type { DocumentNode, HeadingNode, TableNode } from "./types";

vi.mock("../utils/logger");

const build = (markdown: string): DocumentNode[] =>
  new DocumentTreeBuilder().build(parseMarkdown(markdown));

const paragraph = (...children: DocumentNode[]) => createParagraphNode(children);
const text = createTextNode;

const heading = (level: number, title: string, ...children: DocumentNode[]): HeadingNode => ({
  ...createHeadingNode(level, title),
  children,
});

const onlyTable = (nodes: DocumentNode[]): TableNode => {
  const [node] = nodes;
  if (node?.type !== "table") {
    throw new Error(`Expected a table, got ${node?.type}`);
  }
  return node;
};

describe("DocumentTreeBuilder", () => {
  describe("headings", () => {
    it("should nest content and deeper headings under the open heading", () => {
      const nodes = build("# A\n\ntext1\n\n## B\n\ntext2\n\n# C\n\ntext3");

      expect(nodes).toEqual([
        heading(1, "A", paragraph(text("text1")), heading(2, "B", paragraph(text("text2")))),
        heading(1, "C", paragraph(text("text3"))),
      ]);
    });

    it("should close headings of the same or a deeper level", () => {
      const nodes = build("# A\n## B\n### C\n## D");

      expect(nodes).toEqual([heading(1, "A", heading(2, "B", heading(3, "C")), heading(2, "D"))]);
    });

    it("should put a shallower heading after a deeper one at the root", () => {
      const nodes = build("### Deep\n\nx\n\n# Top");

      expect(nodes).toEqual([heading(3, "Deep", paragraph(text("x"))), heading(1, "Top")]);
    });

    it("should keep content before the first heading at the root", () => {
      const nodes = build("Intro\n\n# Title");

      expect(nodes).toEqual([paragraph(text("Intro")), heading(1, "Title")]);
    });

    it("should use the plain text of the heading as its title", () => {
      const nodes = build("## Using `npm` *well*");

      expect(nodes).toEqual([heading(2, "Using npm well")]);
    });
  });

  describe("inline content", () => {
    it("should split a paragraph into text, link and code nodes", () => {
      const nodes = build("See [docs](https://example.com/docs) and `code` here.");

      expect(nodes).toEqual([
        paragraph(
          text("See "),
          createLinkNode("https://example.com/docs", "docs"),
          text(" and "),
          createCodeNode("code"),
          text(" here."),
        ),
      ]);
    });

    it("should keep the lines of a wrapped paragraph in one text node", () => {
      const nodes = build("line one\nline two");

      expect(nodes).toEqual([paragraph(text("line one\nline two"))]);
    });

    it("should resolve reference links through their definitions", () => {
      const nodes = build("Visit [site][ref].\n\n[ref]: https://example.org");

      expect(nodes).toEqual([
        paragraph(text("Visit "), createLinkNode("https://example.org", "site"), text(".")),
      ]);
    });

    it("should number images by first appearance and reuse numbers for repeated URLs", () => {
      const builder = new DocumentTreeBuilder();
      const nodes = builder.build(
        parseMarkdown("![one](a.png) ![two](b.png) ![again](a.png)"),
      );

      expect(nodes).toEqual([
        paragraph(
          createImageNode("a.png", "one", 1),
          text(" "),
          createImageNode("b.png", "two", 2),
          text(" "),
          createImageNode("a.png", "again", 1),
        ),
      ]);
      expect(builder.imageUrls).toEqual(["a.png", "b.png"]);
    });
  });

  describe("blocks", () => {
    it("should convert code blocks, breaks and html", () => {
      const nodes = build("```ts\nconst a = 1;\n```\n\n***\n\n<div>hi</div>");

      expect(nodes).toEqual([
        createCodeBlockNode("ts", "const a = 1;"),
        createLineSeparatorNode(),
        createHtmlBlockNode("<div>hi</div>"),
      ]);
    });

    it("should flatten blockquotes into their inline content", () => {
      const nodes = build("> quoted *text*\n>\n> > inner");

      expect(nodes).toEqual([
        createBlockQuoteNode([text("quoted "), text("text"), createSoftBreakNode(), text("inner")]),
      ]);
    });

    it("should separate the paragraphs of a blockquote with soft breaks", () => {
      const nodes = build("> first paragraph\n>\n> second paragraph\n\nAfter.");

      expect(nodes).toEqual([
        createBlockQuoteNode([
          text("first paragraph"),
          createSoftBreakNode(),
          text("second paragraph"),
        ]),
        paragraph(text("After.")),
      ]);
    });
  });

  describe("lists", () => {
    it("should give list items a paragraph followed by their nested lists", () => {
      const nodes = build("- one\n- two\n    - nested\n");

      expect(nodes).toEqual([
        createListNode(false, 1, [
          createListItemNode("-", [paragraph(text("one"))]),
          createListItemNode("-", [
            paragraph(text("two")),
            createListNode(false, 1, [createListItemNode("-", [paragraph(text("nested"))])]),
          ]),
        ]),
      ]);
    });

    it("should separate the paragraphs of a list item with soft breaks", () => {
      const nodes = build("- first\n\n  second\n");

      expect(nodes).toEqual([
        createListNode(false, 1, [
          createListItemNode("-", [paragraph(text("first"), createSoftBreakNode(), text("second"))]),
        ]),
      ]);
    });

    it("should number ordered items from the list start", () => {
      const nodes = build("3. c\n4. d");

      expect(nodes).toEqual([
        createListNode(true, 3, [
          createListItemNode("3.", [paragraph(text("c"))]),
          createListItemNode("4.", [paragraph(text("d"))]),
        ]),
      ]);
    });

    it("should add the task state to the marker", () => {
      const nodes = build("- [x] done\n- [ ] todo");

      expect(nodes).toEqual([
        createListNode(false, 1, [
          createListItemNode("- [x]", [paragraph(text("done"))]),
          createListItemNode("- [ ]", [paragraph(text("todo"))]),
        ]),
      ]);
    });
  });

  describe("tables", () => {
    it("should map cells to their column headers in column order", () => {
      const table = onlyTable(
        build("| 2024 | 2023 |\n| --- | --- |\n| 10 | 8 |\n| 12 | 9 | 99 |"),
      );

      expect(table.data.layout).toBe("positional");
      if (table.data.layout !== "positional") return;
      expect(table.data.rows.map((row) => Array.from(row.entries()))).toEqual([
        [
          ["2024", "10"],
          ["2023", "8"],
        ],
        [
          ["2024", "12"],
          ["2023", "9"],
        ],
      ]);
    });

    it("should key rows by their first cell when the first header is empty", () => {
      const table = onlyTable(
        build("|  | Q1 | Q2 |\n| --- | --- | --- |\n| North | 10 | 20 |\n| South | 30 | 40 |"),
      );

      expect(table.data.layout).toBe("keyed");
      if (table.data.layout !== "keyed") return;
      expect(Array.from(table.data.rows.keys())).toEqual(["North", "South"]);
      expect(Array.from(table.data.rows.get("North")?.entries() ?? [])).toEqual([
        ["Q1", "10"],
        ["Q2", "20"],
      ]);
    });

    it("should build an empty table from a header-only table", () => {
      const table = onlyTable(build("| A | B |\n| --- | --- |\n"));

      expect(table.data).toEqual({ layout: "positional", rows: [] });
    });
  });
});
