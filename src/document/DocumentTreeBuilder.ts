import type {
  Heading,
  List,
  ListItem,
  Nodes,
  Root,
  RootContent,
  Table,
  TableRow as MdastTableRow,
} from "mdast";
import { toString } from "mdast-util-to-string";
import { logger } from "../utils/logger";
import { ImageReferenceRegistry } from "./ImageReferenceRegistry";
import {
  createBlockQuoteNode,
  createCodeBlockNode,
  createCodeNode,
  createHeadingNode,
  createHtmlBlockNode,
  createHtmlSpanNode,
  createImageNode,
  createLineBreakNode,
  createLineSeparatorNode,
  createLinkNode,
  createListItemNode,
  createListNode,
  createParagraphNode,
  createSoftBreakNode,
  createTableNode,
  createTextNode,
} from "./nodes";
import type {
  DocumentNode,
  HeadingNode,
  ImageNode,
  ListItemNode,
  ListNode,
  TableNode,
  TableRow,
} from "./types";

/**
 * Builds the document node tree from an mdast syntax tree.
 *
 * mdast lists headings as siblings of the content they introduce. The builder
 * rebuilds the nesting with a stack of open headings: content goes to the
 * deepest open heading, and a new heading first closes every open heading of
 * the same or a deeper level.
 */
export class DocumentTreeBuilder {
  private nodes: DocumentNode[] = [];
  /** Open headings, shallowest first. Levels strictly increase towards the top. */
  private headerStack: HeadingNode[] = [];
  /** Link definition identifier → URL */
  private definitions = new Map<string, string>();

  constructor(private readonly images: ImageReferenceRegistry = new ImageReferenceRegistry()) {}

  /**
   * Distinct image URLs seen so far, in reference order
   */
  get imageUrls(): string[] {
    return this.images.urls;
  }

  build(root: Root): DocumentNode[] {
    this.nodes = [];
    this.headerStack = [];
    this.definitions = new Map();
    this.collectDefinitions(root);

    for (const child of root.children) {
      this.handleBlock(child);
    }
    this.finalizeHeaders(0);

    logger.debug(
      `Built document tree: ${this.nodes.length} top-level nodes, ${this.images.size} images`,
    );
    return this.nodes;
  }

  private handleBlock(node: RootContent): void {
    switch (node.type) {
      case "heading":
        this.handleHeading(node);
        break;
      case "paragraph": {
        const content = this.extractContent(node.children);
        if (content.length > 0) {
          this.append(createParagraphNode(content));
        }
        break;
      }
      case "list":
        this.append(this.handleList(node));
        break;
      case "table":
        this.append(this.handleTable(node));
        break;
      case "blockquote":
        this.append(createBlockQuoteNode(this.joinBlocks(node.children)));
        break;
      case "code":
        this.append(createCodeBlockNode(node.lang ?? "", node.value));
        break;
      case "thematicBreak":
        this.append(createLineSeparatorNode());
        break;
      case "html":
        this.append(createHtmlBlockNode(node.value));
        break;
      case "definition":
        // Resolved into the links and images that reference it
        break;
      default:
        logger.debug(`Skipping unsupported ${node.type} node`);
    }
  }

  private handleHeading(node: Heading): void {
    this.finalizeHeaders(node.depth);
    this.headerStack.push(createHeadingNode(node.depth, toString(node)));
  }

  /**
   * Closes every open heading whose level is at least `level`, attaching each
   * to the heading below it on the stack, or to the root once none is left.
   */
  private finalizeHeaders(level: number): void {
    while (this.headerStack.length > 0) {
      const top = this.headerStack[this.headerStack.length - 1];
      if (top.level < level) break;

      this.headerStack.pop();
      const parent = this.headerStack[this.headerStack.length - 1];
      if (parent) {
        parent.children.push(top);
      } else {
        this.nodes.push(top);
      }
    }
  }

  /**
   * Adds a node under the deepest open heading, or at the root.
   */
  private append(node: DocumentNode): void {
    const current = this.headerStack[this.headerStack.length - 1];
    if (current) {
      current.children.push(node);
    } else {
      this.nodes.push(node);
    }
  }

  /**
   * Flattens the inline content of a subtree into text, link, image and code
   * nodes. Lists are left to the list handling; a nested blockquote is
   * flattened like its parent.
   */
  private extractContent(nodes: Nodes[], into: DocumentNode[] = []): DocumentNode[] {
    for (const node of nodes) {
      switch (node.type) {
        case "text":
          this.pushText(node.value, into);
          break;
        case "link":
          into.push(createLinkNode(node.url, toString(node)));
          break;
        case "linkReference": {
          const url = this.definitions.get(node.identifier);
          if (url !== undefined) {
            into.push(createLinkNode(url, toString(node)));
          } else {
            this.pushText(toString(node), into);
          }
          break;
        }
        case "image":
          into.push(this.createImage(node.url, node.alt ?? ""));
          break;
        case "imageReference": {
          const url = this.definitions.get(node.identifier);
          if (url !== undefined) {
            into.push(this.createImage(url, node.alt ?? ""));
          } else {
            this.pushText(node.alt ?? "", into);
          }
          break;
        }
        case "inlineCode":
          into.push(createCodeNode(node.value));
          break;
        case "code":
          into.push(createCodeBlockNode(node.lang ?? "", node.value));
          break;
        case "break":
          into.push(createLineBreakNode());
          break;
        case "html":
          into.push(createHtmlSpanNode(node.value));
          break;
        case "blockquote":
          into.push(...this.joinBlocks(node.children));
          break;
        case "list":
        case "definition":
          break;
        default:
          if ("children" in node) {
            this.extractContent(node.children, into);
          }
      }
    }
    return into;
  }

  /**
   * Adds text as a single node; line breaks stay inside the text.
   */
  private pushText(value: string, into: DocumentNode[]): void {
    if (value !== "") {
      into.push(createTextNode(value));
    }
  }

  /**
   * Flattens block children into one run of inline content, with a soft break
   * between consecutive blocks. Lists are skipped.
   */
  private joinBlocks(blocks: Nodes[]): DocumentNode[] {
    const content: DocumentNode[] = [];
    for (const block of blocks) {
      const part = this.extractContent([block]);
      if (part.length === 0) continue;
      if (content.length > 0) content.push(createSoftBreakNode());
      content.push(...part);
    }
    return content;
  }

  private createImage(url: string, alt: string): ImageNode {
    return createImageNode(url, alt, this.images.register(url));
  }

  private handleList(list: List): ListNode {
    const ordered = list.ordered === true;
    const start = list.start ?? 1;
    const items = list.children.map((item, index) =>
      this.handleListItem(item, ordered ? `${start + index}.` : "-"),
    );
    return createListNode(ordered, start, items);
  }

  /**
   * A list item holds one paragraph with all of its inline content, its
   * blocks separated by soft breaks, followed by its nested lists.
   */
  private handleListItem(item: ListItem, marker: string): ListItemNode {
    const content = this.joinBlocks(item.children);
    const nestedLists: ListNode[] = [];
    for (const child of item.children) {
      if (child.type === "list") {
        nestedLists.push(this.handleList(child));
      }
    }

    const children: DocumentNode[] = [];
    if (content.length > 0) {
      children.push(createParagraphNode(content));
    }
    children.push(...nestedLists);

    const checkbox = typeof item.checked === "boolean" ? (item.checked ? " [x]" : " [ ]") : "";
    return createListItemNode(marker + checkbox, children);
  }

  /**
   * Replaces the table's rows and cells with row maps keyed by column header.
   * An empty first header makes the first column the row key.
   */
  private handleTable(table: Table): TableNode {
    const [headerRow, ...bodyRows] = table.children;
    if (!headerRow) {
      return createTableNode({ layout: "positional", rows: [] });
    }

    const headers = headerRow.children.map((cell) => toString(cell));
    if (headers[0] === "") {
      const rows = new Map<string, TableRow>();
      for (const row of bodyRows) {
        const [keyCell] = row.children;
        const rowData = this.collectRowCells(headers, row);
        rowData.delete(headers[0]);
        rows.set(keyCell ? toString(keyCell) : "", rowData);
      }
      return createTableNode({ layout: "keyed", rows });
    }

    const rows: TableRow[] = [];
    for (const row of bodyRows) {
      const rowData = this.collectRowCells(headers, row);
      if (rowData.get("") === "") {
        rowData.delete("");
      }
      if (rowData.size > 0) {
        rows.push(rowData);
      }
    }
    return createTableNode({ layout: "positional", rows });
  }

  /**
   * Maps the cells of a row to the headers by position. Cells past the last
   * header are dropped.
   */
  private collectRowCells(headers: string[], row: MdastTableRow): TableRow {
    const rowData: TableRow = new Map();
    row.children.forEach((cell, index) => {
      if (index < headers.length) {
        rowData.set(headers[index], toString(cell));
      }
    });
    return rowData;
  }

  private collectDefinitions(node: Nodes): void {
    if (node.type === "definition") {
      this.definitions.set(node.identifier, node.url);
      return;
    }
    if ("children" in node) {
      for (const child of node.children) {
        this.collectDefinitions(child);
      }
    }
  }
}
