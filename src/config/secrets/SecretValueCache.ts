/**
 * Secret Value Cache
 *
 * Maps a raw reference string to its resolved value for the lifetime of the
 * owning resolver. There is no TTL and no invalidation: a secret rotated
 * upstream is only observed after the process (or the resolver) is recreated.
 */
export class SecretValueCache {
  private readonly values = new Map<string, string>();

  get(reference: string): string | undefined {
    return this.values.get(reference);
  }

  has(reference: string): boolean {
    return this.values.has(reference);
  }

  /**
   * Stores a value unless one is already cached for the reference.
   *
   * @returns The value that is cached after the call (first writer wins)
   */
  getOrInsert(reference: string, value: string): string {
    const existing = this.values.get(reference);
    if (existing !== undefined) {
      return existing;
    }
    this.values.set(reference, value);
    return value;
  }

  get size(): number {
    return this.values.size;
  }
}
