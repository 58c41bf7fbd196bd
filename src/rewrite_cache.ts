/**
 * Request-scoped memo of source URL -> final URL. Grows until cleared.
 */
export class RewriteCache {
  private readonly entries = new Map<string, string>();

  get(url: string): string | undefined {
    return this.entries.get(url);
  }

  set(url: string, rewritten: string): void {
    this.entries.set(url, rewritten);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
