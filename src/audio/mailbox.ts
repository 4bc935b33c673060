// Single-slot mailbox. A producer never waits: offering into a full slot drops the
// new value, so a slow consumer cannot stall the timer loop.
export class Mailbox<T> {
  private slot: { value: T } | null = null;
  private droppedCount = 0;

  offer(value: T): boolean {
    if (this.slot) {
      this.droppedCount++;
      return false;
    }
    this.slot = { value };
    return true;
  }

  take(): T | undefined {
    const s = this.slot;
    this.slot = null;
    return s?.value;
  }

  get pending(): boolean { return this.slot !== null; }
  get dropped(): number { return this.droppedCount; }

  clear(): void {
    this.slot = null;
  }
}

export interface AudioSignal {
  // Timer tick count at which the sound timer expired
  tick: number;
}
