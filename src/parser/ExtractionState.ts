/**
 * ReceiptLens – Per-call extraction state
 *
 * Lives for one analyze() call only; nothing here is shared between calls.
 */

export interface ResolvedField {
  value: string;
  /** Arena indices the value was read from (label first when distinct) */
  fragments: number[];
  via: "inline" | "spatial" | "sniffer";
}

export class ExtractionState {
  private readonly consumedBits: Uint8Array;
  readonly resolved = new Map<string, ResolvedField>();

  constructor(fragmentCount: number) {
    this.consumedBits = new Uint8Array(fragmentCount);
  }

  isConsumed(index: number): boolean {
    return this.consumedBits[index] === 1;
  }

  isResolved(key: string): boolean {
    return this.resolved.has(key);
  }

  /**
   * Record a field value and mark its fragments consumed.
   *
   * @throws Error when a fragment is already consumed or the field is set;
   *         both indicate a resolver bug, never bad input.
   */
  resolve(key: string, field: ResolvedField): void {
    if (this.resolved.has(key)) {
      throw new Error(`Field '${key}' resolved twice`);
    }
    for (const index of field.fragments) {
      if (this.isConsumed(index)) {
        throw new Error(`Fragment ${index} consumed twice (field '${key}')`);
      }
    }
    for (const index of field.fragments) this.consumedBits[index] = 1;
    this.resolved.set(key, field);
  }

  get consumedCount(): number {
    return this.consumedBits.reduce((sum, bit) => sum + bit, 0);
  }
}
