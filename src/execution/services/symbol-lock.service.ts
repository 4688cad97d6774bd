/**
 * Symbol Lock Service - Per-symbol serialization and the single-entry slot.
 *
 * runExclusive() queues work per symbol so two evaluations of the same symbol
 * never interleave. claim()/release() track which queued entry owns the
 * symbol; the owner keeps the slot until it reaches a terminal state.
 */

export class SymbolLockService {
  private readonly chains: Map<string, Promise<void>> = new Map();
  private readonly slots: Map<string, string> = new Map();

  async runExclusive<T>(symbol: string, work: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(symbol) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.chains.set(symbol, current);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.chains.get(symbol) === current) {
        this.chains.delete(symbol);
      }
    }
  }

  /**
   * Claims the entry slot. Synchronous, so a check-then-claim cannot be split by an await.
   */
  claim(symbol: string, entryId: string): boolean {
    const holder = this.slots.get(symbol);
    if (holder !== undefined && holder !== entryId) {
      return false;
    }
    this.slots.set(symbol, entryId);
    return true;
  }

  release(symbol: string, entryId: string): boolean {
    if (this.slots.get(symbol) !== entryId) {
      return false;
    }
    this.slots.delete(symbol);
    return true;
  }

  holder(symbol: string): string | undefined {
    return this.slots.get(symbol);
  }

  reset(): void {
    this.slots.clear();
  }
}
