import type {
  AlignType,
  List,
  ListItem,
  Nodes,
  PhrasingContent,
  Root,
  RootContent,
  Table,
} from "mdast";
import { parseMarkdown } from "../document/parser";
import { logger } from "../utils/logger";

/** One level of list nesting */
const INDENT = "    ";

interface Definition {
  url: string;
  title?: string | null;
}

/**
 * Where a block sits, as far as its rendering is concerned
 */
interface BlockContext {
  /** Number of list items around the block */
  indentLevel: number;
  /** Number of lists around the block, counted from the innermost blockquote */
  listDepth: number;
  container: "root" | "tightItem" | "looseItem";
  /** Whether the block is the first child of its container */
  first: boolean;
}

/**
 * Re-serializes markdown with normalized formatting: ATX headings, `-` bullets,
 * four-space list indentation, fenced code, `*` emphasis, inline links and
 * GFM tables with an alignment row. Reference-style links and images are
 * written inline.
 */
export class MarkdownRenderer {
  private definitions = new Map<string, Definition>();

  render(markdown: string): string {
    return this.renderTree(parseMarkdown(markdown));
  }

  renderTree(root: Root): string {
    this.definitions = new Map();
    this.collectDefinitions(root);
    return this.renderBlocks(root.children, {
      indentLevel: 0,
      listDepth: 0,
      container: "root",
      first: true,
    });
  }

  private renderBlocks(nodes: RootContent[], context: BlockContext): string {
    return nodes
      .map((node, index) => this.renderBlock(node, { ...context, first: index === 0 }))
      .join("");
  }

  private renderBlock(node: RootContent, context: BlockContext): string {
    const indentation = INDENT.repeat(context.indentLevel);
    const inItem = context.container === "tightItem" || context.container === "looseItem";

    switch (node.type) {
      case "heading":
        return `${"#".repeat(node.depth)} ${this.renderInline(node.children)}\n\n`;
      case "paragraph": {
        // The first paragraph of an item follows its marker
        const prefix = inItem && !context.first ? indentation : "";
        const skipBlankLine = context.container === "tightItem";
        return `${prefix}${this.renderInline(node.children)}\n${skipBlankLine ? "" : "\n"}`;
      }
      case "blockquote": {
        const content = this.renderBlocks(node.children, {
          indentLevel: 0,
          listDepth: 0,
          container: "root",
          first: true,
        });
        const lead = inItem && context.first ? "" : indentation;
        const lines = content
          .trimEnd()
          .split("\n")
          .map((line, index) => `${index === 0 ? lead : indentation}${line ? `> ${line}` : ">"}`);
        return `${lines.join("\n")}\n\n`;
      }
      case "list":
        return this.renderList(node, context);
      case "code": {
        const lines = [`\`\`\`${node.lang ?? ""}`, ...node.value.split("\n"), "```"];
        return `${lines.map((line) => (line ? indentation + line : line)).join("\n")}\n\n`;
      }
      case "thematicBreak":
        return "---\n\n";
      case "table":
        return this.renderTable(node);
      case "html":
        return `${node.value}\n\n`;
      case "definition":
        // Written inline where referenced
        return "";
      default:
        logger.debug(`Renderer skipped unsupported ${node.type} node`);
        return "";
    }
  }

  private renderList(list: List, context: BlockContext): string {
    const start = list.start ?? 1;
    const tight = list.spread !== true;
    const items = list.children
      .map((item, index) => {
        const marker = list.ordered ? `${start + index}.` : "-";
        return this.renderListItem(item, marker, tight, {
          ...context,
          listDepth: context.listDepth + 1,
        });
      })
      .join("");

    // Only the outermost list is followed by a blank line
    return context.listDepth === 0 ? `${items}\n` : items;
  }

  private renderListItem(
    item: ListItem,
    marker: string,
    tight: boolean,
    context: BlockContext,
  ): string {
    const checkbox = typeof item.checked === "boolean" ? (item.checked ? "[x] " : "[ ] ") : "";
    const content = this.renderBlocks(item.children, {
      ...context,
      indentLevel: context.indentLevel + 1,
      container: tight ? "tightItem" : "looseItem",
    });
    return `${INDENT.repeat(context.indentLevel)}${marker} ${checkbox}${content}`;
  }

  private renderTable(table: Table): string {
    const [headerRow, ...bodyRows] = table.children;
    if (!headerRow) return "";

    const renderRow = (cells: string[]) => `| ${cells.join(" | ")} |\n`;
    const cellsOf = (row: Table["children"][number]) =>
      row.children.map((cell) => this.renderInline(cell.children).replace(/\|/g, "\\|"));

    const align: AlignType[] = headerRow.children.map((_, index) => table.align?.[index] ?? null);
    const alignmentRow = `| ${align.map((a) => this.alignmentMarker(a)).join(" | ")} |\n`;

    return `${renderRow(cellsOf(headerRow))}${alignmentRow}${bodyRows
      .map((row) => renderRow(cellsOf(row)))
      .join("")}\n`;
  }

  private alignmentMarker(align: AlignType): string {
    switch (align) {
      case "left":
        return ":---";
      case "right":
        return "---:";
      case "center":
        return ":---:";
      default:
        return "---";
    }
  }

  private renderInline(nodes: PhrasingContent[]): string {
    return nodes.map((node) => this.renderPhrase(node)).join("");
  }

  private renderPhrase(node: PhrasingContent): string {
    switch (node.type) {
      case "text":
        return node.value;
      case "emphasis":
        return `*${this.renderInline(node.children)}*`;
      case "strong":
        return `**${this.renderInline(node.children)}**`;
      case "delete":
        return `~~${this.renderInline(node.children)}~~`;
      case "inlineCode":
        return `\`${node.value}\``;
      case "break":
        return "  \n";
      case "html":
        return node.value;
      case "link":
        return `[${this.renderInline(node.children)}](${this.destination(node.url, node.title)})`;
      case "image":
        return `![${node.alt ?? ""}](${this.destination(node.url, node.title)})`;
      case "linkReference": {
        const text = this.renderInline(node.children);
        const definition = this.definitions.get(node.identifier);
        return definition
          ? `[${text}](${this.destination(definition.url, definition.title)})`
          : `[${text}]`;
      }
      case "imageReference": {
        const definition = this.definitions.get(node.identifier);
        return definition
          ? `![${node.alt ?? ""}](${this.destination(definition.url, definition.title)})`
          : `![${node.alt ?? ""}]`;
      }
      case "footnoteReference":
        return `[^${node.identifier}]`;
      default:
        return "";
    }
  }

  private destination(url: string, title: string | null | undefined): string {
    return title ? `${url} "${title}"` : url;
  }

  private collectDefinitions(node: Nodes): void {
    if (node.type === "definition") {
      this.definitions.set(node.identifier, { url: node.url, title: node.title });
      return;
    }
    if ("children" in node) {
      for (const child of node.children) {
        this.collectDefinitions(child);
      }
    }
  }
}
