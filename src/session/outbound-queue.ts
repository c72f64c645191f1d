export type OutboundFrame =
  | { readonly kind: "json"; readonly text: string }
  | { readonly kind: "audio"; readonly payload: Buffer };

/**
 * A control notice is never evicted; a translation's caption and audio are
 * queued, written and evicted together.
 */
export type OutboundEntry =
  | { readonly kind: "control"; readonly frame: OutboundFrame }
  | { readonly kind: "translation"; readonly caption: OutboundFrame; readonly audio: OutboundFrame };

export type EnqueueResult = {
  readonly queueSize: number;
  readonly droppedOldest: boolean;
};

export function framesOf(entry: OutboundEntry): readonly OutboundFrame[] {
  return entry.kind === "control" ? [entry.frame] : [entry.caption, entry.audio];
}

/** FIFO of entries waiting to be written to one connection, holding at most `maxQueue` translations. */
export class OutboundQueue {
  private readonly entries: OutboundEntry[] = [];
  private translations = 0;
  private dropped = 0;

  public constructor(private readonly maxQueue: number) {}

  public enqueue(entry: OutboundEntry): EnqueueResult {
    this.entries.push(entry);
    let droppedOldest = false;
    if (entry.kind === "translation") {
      this.translations += 1;
      if (this.translations > this.maxQueue) {
        const oldest = this.entries.findIndex((queued) => queued.kind === "translation");
        this.entries.splice(oldest, 1);
        this.translations -= 1;
        this.dropped += 1;
        droppedOldest = true;
      }
    }
    return { queueSize: this.entries.length, droppedOldest };
  }

  public dequeue(): OutboundEntry | undefined {
    const entry = this.entries.shift();
    if (entry?.kind === "translation") this.translations -= 1;
    return entry;
  }

  public clear(): number {
    const discarded = this.entries.length;
    this.entries.length = 0;
    this.translations = 0;
    return discarded;
  }

  public get size(): number {
    return this.entries.length;
  }

  public get droppedCount(): number {
    return this.dropped;
  }
}
