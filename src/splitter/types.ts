/**
 * Output of splitting one markdown document
 */
export interface SplitResult {
  /** Chunk texts in document order */
  chunks: string[];
  /**
   * Distinct image URLs in order of first appearance. The placeholder
   * `[image:N]` in a chunk refers to `images[N - 1]`.
   */
  images: string[];
}

/**
 * Interface for a splitter that processes markdown content into chunks
 */
export interface DocumentSplitter {
  splitText(markdown: string): SplitResult;
}
