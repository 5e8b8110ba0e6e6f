import { type OrderedJsonObject, type OrderedJsonValue, stringifyOrdered } from "../utils/json";
import { formatJsonTable, serializeTableRows } from "./table";
import type {
  BlockQuoteNode,
  CodeBlockNode,
  CodeNode,
  DocumentNode,
  HeadingNode,
  HtmlBlockNode,
  HtmlSpanNode,
  ImageNode,
  LineBreakNode,
  LineSeparatorNode,
  LinkNode,
  ListItemNode,
  ListNode,
  ParagraphNode,
  SoftBreakNode,
  TableData,
  TableNode,
  TextNode,
} from "./types";

export const createHeadingNode = (level: number, title: string): HeadingNode => ({
  type: "heading",
  level,
  title,
  children: [],
});

export const createTextNode = (text: string): TextNode => ({
  type: "text",
  text,
  children: [],
});

export const createTableNode = (data: TableData): TableNode => ({
  type: "table",
  data,
  children: [],
});

export const createLinkNode = (url: string, title: string): LinkNode => ({
  type: "link",
  url,
  title,
  children: [],
});

export const createImageNode = (url: string, alt: string, reference: number): ImageNode => ({
  type: "image",
  url,
  alt,
  reference,
  children: [],
});

export const createCodeNode = (code: string): CodeNode => ({
  type: "code",
  code,
  children: [],
});

export const createCodeBlockNode = (language: string, code: string): CodeBlockNode => ({
  type: "codeblock",
  language,
  code,
  children: [],
});

export const createParagraphNode = (children: DocumentNode[]): ParagraphNode => ({
  type: "paragraph",
  children,
});

export const createListNode = (
  ordered: boolean,
  start: number,
  children: DocumentNode[],
): ListNode => ({
  type: "list",
  ordered,
  start,
  children,
});

export const createListItemNode = (marker: string, children: DocumentNode[]): ListItemNode => ({
  type: "listitem",
  marker,
  children,
});

export const createBlockQuoteNode = (children: DocumentNode[]): BlockQuoteNode => ({
  type: "blockquote",
  children,
});

export const createLineBreakNode = (): LineBreakNode => ({ type: "linebreak", children: [] });

export const createSoftBreakNode = (): SoftBreakNode => ({ type: "softbreak", children: [] });

export const createLineSeparatorNode = (): LineSeparatorNode => ({
  type: "lineseparator",
  children: [],
});

export const createHtmlBlockNode = (html: string): HtmlBlockNode => ({
  type: "htmlblock",
  html,
  children: [],
});

export const createHtmlSpanNode = (html: string): HtmlSpanNode => ({
  type: "htmlspan",
  html,
  children: [],
});

/**
 * Inline marker that stands in for an image inside chunk text. `reference`
 * is the image's 1-based position in the document's image list.
 */
export const toImageReference = (reference: number): string => `[image:${reference}]`;

/**
 * Renders the markdown text a node contributes on its own. Children are not
 * included: whoever walks the tree renders them separately.
 */
export function toMarkdown(node: DocumentNode): string {
  switch (node.type) {
    case "heading":
      return `${"#".repeat(node.level)} ${node.title}\n\n`;
    case "text":
      return node.text;
    case "table":
      return formatJsonTable(node.data.layout, serializeTableRows(node.data));
    case "link":
      return `[${node.title}](${node.url})\n\n`;
    case "image":
      return toImageReference(node.reference);
    case "code":
      return `\`${node.code}\``;
    case "codeblock":
      return `\`\`\`${node.language}\n${node.code}\n\`\`\`\n\n`;
    case "listitem":
      return `${node.marker} `;
    case "blockquote":
      return "> ";
    case "linebreak":
    case "softbreak":
      return "\n";
    case "lineseparator":
      return "---\n\n";
    case "htmlblock":
      return `${node.html}\n\n`;
    case "htmlspan":
      return node.html;
    case "paragraph":
    case "list":
      return "";
    default: {
      const unhandled: never = node;
      throw new Error(`Unknown node type: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Converts a node and its subtree into a JSON-ready value. Children are listed
 * under `content`, which is left out for leaf nodes.
 */
export function toJsonValue(node: DocumentNode): OrderedJsonObject {
  const content: OrderedJsonValue[] | undefined =
    node.children.length > 0 ? node.children.map(toJsonValue) : undefined;

  switch (node.type) {
    case "heading":
      return { type: node.type, title: node.title, level: node.level, content };
    case "text":
      return { type: node.type, text: node.text, content };
    case "table":
      return { type: node.type, data: node.data.rows, content };
    case "link":
      return { type: node.type, url: node.url, title: node.title, content };
    case "image":
      return {
        type: node.type,
        url: node.url,
        alt: node.alt,
        reference: node.reference,
        content,
      };
    case "code":
      return { type: node.type, code: node.code, content };
    case "codeblock":
      return { type: node.type, language: node.language, code: node.code, content };
    case "list":
      return { type: node.type, ordered: node.ordered, start: node.start, content };
    case "listitem":
      return { type: node.type, marker: node.marker, content };
    case "htmlblock":
    case "htmlspan":
      return { type: node.type, html: node.html, content };
    default:
      return { type: node.type, content };
  }
}

/**
 * Prints a document tree as indented JSON.
 */
export function serializeDocument(nodes: DocumentNode[]): string {
  return stringifyOrdered(nodes.map(toJsonValue), "  ");
}
