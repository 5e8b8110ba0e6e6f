/**
 * Numbers the distinct image URLs of a document in order of first appearance.
 * Reference N always points at `urls[N - 1]`.
 */
export class ImageReferenceRegistry {
  private readonly references = new Map<string, number>();

  /**
   * Returns the reference number of `url`, assigning the next one if the URL
   * has not been seen yet.
   */
  register(url: string): number {
    const existing = this.references.get(url);
    if (existing !== undefined) {
      return existing;
    }
    const reference = this.references.size + 1;
    this.references.set(url, reference);
    return reference;
  }

  get size(): number {
    return this.references.size;
  }

  /** Distinct image URLs in reference order */
  get urls(): string[] {
    return Array.from(this.references.keys());
  }
}
