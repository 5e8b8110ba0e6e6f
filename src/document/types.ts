/**
 * Discriminator values of the document node model.
 */
export type DocumentNodeType =
  | "heading"
  | "text"
  | "table"
  | "link"
  | "image"
  | "code"
  | "codeblock"
  | "paragraph"
  | "list"
  | "listitem"
  | "blockquote"
  | "linebreak"
  | "softbreak"
  | "lineseparator"
  | "htmlblock"
  | "htmlspan";

interface BaseNode<T extends DocumentNodeType> {
  type: T;
  /** Nodes nested under this one, owned exclusively by it */
  children: DocumentNode[];
}

/**
 * A heading owns everything that follows it up to the next heading of the
 * same or a shallower level.
 */
export interface HeadingNode extends BaseNode<"heading"> {
  level: number;
  title: string;
}

export interface TextNode extends BaseNode<"text"> {
  text: string;
}

/**
 * One table row: column header → cell text, in header order.
 */
export type TableRow = Map<string, string>;

/**
 * Table contents. A table whose first header cell is empty is "keyed": its
 * first column holds row names and the remaining columns form the row.
 */
export type TableData =
  | { layout: "positional"; rows: TableRow[] }
  | { layout: "keyed"; rows: Map<string, TableRow> };

export interface TableNode extends BaseNode<"table"> {
  data: TableData;
}

export interface LinkNode extends BaseNode<"link"> {
  url: string;
  title: string;
}

export interface ImageNode extends BaseNode<"image"> {
  url: string;
  alt: string;
  /** 1-based position of `url` in the document's image list */
  reference: number;
}

export interface CodeNode extends BaseNode<"code"> {
  code: string;
}

export interface CodeBlockNode extends BaseNode<"codeblock"> {
  language: string;
  code: string;
}

export interface ParagraphNode extends BaseNode<"paragraph"> {}

export interface ListNode extends BaseNode<"list"> {
  ordered: boolean;
  start: number;
}

export interface ListItemNode extends BaseNode<"listitem"> {
  /** "-" for bullet items, "3." style for ordered ones */
  marker: string;
}

export interface BlockQuoteNode extends BaseNode<"blockquote"> {}

export interface LineBreakNode extends BaseNode<"linebreak"> {}

export interface SoftBreakNode extends BaseNode<"softbreak"> {}

export interface LineSeparatorNode extends BaseNode<"lineseparator"> {}

export interface HtmlBlockNode extends BaseNode<"htmlblock"> {
  html: string;
}

export interface HtmlSpanNode extends BaseNode<"htmlspan"> {
  html: string;
}

export type DocumentNode =
  | HeadingNode
  | TextNode
  | TableNode
  | LinkNode
  | ImageNode
  | CodeNode
  | CodeBlockNode
  | ParagraphNode
  | ListNode
  | ListItemNode
  | BlockQuoteNode
  | LineBreakNode
  | SoftBreakNode
  | LineSeparatorNode
  | HtmlBlockNode
  | HtmlSpanNode;
