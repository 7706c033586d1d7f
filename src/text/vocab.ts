/**
 * Vocabulary handle
 *
 * Immutable word -> id table. This is the only type the contracts
 * accept where an operation takes a vocabulary.
 */
export class Vocab {
  private readonly ids: ReadonlyMap<string, number>;

  constructor(entries: Iterable<readonly [string, number]>) {
    this.ids = new Map(entries);
  }

  /**
   * Assign consecutive ids to words, with special tokens placed
   * before or after them
   */
  static fromWords(
    words: readonly string[],
    specialTokens: readonly string[] = [],
    specialFirst = true
  ): Vocab {
    const ordered = specialFirst
      ? [...specialTokens, ...words]
      : [...words, ...specialTokens];
    return new Vocab(ordered.map((word, id) => [word, id] as const));
  }

  get size(): number {
    return this.ids.size;
  }

  has(word: string): boolean {
    return this.ids.has(word);
  }

  lookup(word: string): number | undefined {
    return this.ids.get(word);
  }

  /** Words ordered by id */
  words(): string[] {
    return [...this.ids.entries()]
      .sort(([, a], [, b]) => a - b)
      .map(([word]) => word);
  }

  entries(): IterableIterator<[string, number]> {
    return this.ids.entries();
  }

  toJSON(): { vocab: number } {
    return { vocab: this.size };
  }
}
