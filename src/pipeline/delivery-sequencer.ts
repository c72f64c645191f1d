/**
 * Releases the results of one source's segments in submission order.
 *
 * Jobs finish in any order; a job's items are held until every lower sequence
 * number has settled, either with items or through `skip`.
 */
export class DeliverySequencer<T> {
  private nextSequence: number;
  private readonly settled = new Map<number, readonly T[]>();

  public constructor(
    private readonly release: (items: readonly T[], sequence: number) => void,
    firstSequence = 1,
  ) {
    this.nextSequence = firstSequence;
  }

  public get expectedSequence(): number {
    return this.nextSequence;
  }

  /** Number of settled sequences waiting behind an unsettled one. */
  public get pending(): number {
    return this.settled.size;
  }

  /** Returns false when the sequence was already settled or released. */
  public settle(sequence: number, items: readonly T[]): boolean {
    if (sequence < this.nextSequence || this.settled.has(sequence)) return false;
    this.settled.set(sequence, items);
    this.drain();
    return true;
  }

  public skip(sequence: number): boolean {
    return this.settle(sequence, []);
  }

  private drain(): void {
    let items = this.settled.get(this.nextSequence);
    while (items) {
      const sequence = this.nextSequence;
      this.settled.delete(sequence);
      this.nextSequence += 1;
      if (items.length > 0) this.release(items, sequence);
      items = this.settled.get(this.nextSequence);
    }
  }
}
