export { DEFAULT_CHUNK_SIZE, resolveChunkSize } from "./config";
export { DocumentTreeBuilder } from "./document/DocumentTreeBuilder";
export { ImageReferenceRegistry } from "./document/ImageReferenceRegistry";
export { DocumentError, MarkdownParseError } from "./document/errors";
export { serializeDocument, toImageReference, toMarkdown } from "./document/nodes";
export { parseMarkdown } from "./document/parser";
export type * from "./document/types";
export { MarkdownRenderer } from "./renderer/MarkdownRenderer";
export { StructuralMarkdownSplitter } from "./splitter/StructuralMarkdownSplitter";
export { InvalidChunkSizeError, SplitterError } from "./splitter/errors";
export { TableContentSplitter } from "./splitter/splitters/TableContentSplitter";
export type { DocumentSplitter, SplitResult } from "./splitter/types";
export { formatChunks } from "./utils/string";
