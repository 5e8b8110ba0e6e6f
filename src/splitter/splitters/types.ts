/**
 * Core interface for content splitters
 */
export interface ContentSplitter<T> {
  /**
   * Splits content into fragments. The first fragment is bounded by
   * `firstChunkLimit` so that it can share a chunk with text that precedes
   * it; every later fragment is bounded by `nextChunksLimit`.
   */
  split(content: T, firstChunkLimit: number, nextChunksLimit: number): string[];
}
