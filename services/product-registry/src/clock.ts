/**
 * Source of the current ledger height. Read once per operation; the value
 * never decreases between reads.
 */
export interface LedgerClock {
  currentHeight(): number;
}

export class ManualLedgerClock implements LedgerClock {
  private height: number;

  constructor(initialHeight = 0) {
    if (!Number.isSafeInteger(initialHeight) || initialHeight < 0) {
      throw new Error(`Invalid ledger height '${initialHeight}'`);
    }
    this.height = initialHeight;
  }

  currentHeight(): number {
    return this.height;
  }

  advanceTo(height: number): void {
    if (!Number.isSafeInteger(height) || height < this.height) {
      throw new Error(`Ledger height cannot move from ${this.height} to ${height}`);
    }
    this.height = height;
  }

  advance(blocks = 1): void {
    this.advanceTo(this.height + blocks);
  }
}

// Unix seconds, clamped so a wall-clock step backwards never lowers the height.
export class SystemLedgerClock implements LedgerClock {
  private readonly now: () => number;
  private last = 0;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  currentHeight(): number {
    this.last = Math.max(this.last, Math.floor(this.now() / 1000));
    return this.last;
  }
}
