export type FeeTransferResult = { ok: true } | { ok: false; reason: string };

export interface FeeTransfer {
  from: string;
  to: string;
  amount: number;
}

/**
 * Moves creation fees from a caller into the registry treasury.
 */
export interface FeeTreasury {
  readonly account: string;
  transfer(from: string, amount: number): FeeTransferResult;
}

interface InMemoryTreasuryOptions {
  account?: string;
  // When set, transfers are checked against and debited from these balances.
  balances?: Record<string, number>;
}

export class InMemoryTreasury implements FeeTreasury {
  readonly account: string;
  readonly transfers: FeeTransfer[] = [];
  private readonly balances: Map<string, number> | null;

  constructor(options: InMemoryTreasuryOptions = {}) {
    this.account = options.account || "treasury";
    this.balances = options.balances ? new Map(Object.entries(options.balances)) : null;
  }

  transfer(from: string, amount: number): FeeTransferResult {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      return { ok: false, reason: "invalid_amount" };
    }
    if (from === this.account) {
      return { ok: false, reason: "sender_is_recipient" };
    }

    if (this.balances) {
      const available = this.balances.get(from) ?? 0;
      if (available < amount) {
        return { ok: false, reason: "insufficient_balance" };
      }
      this.balances.set(from, available - amount);
      this.balances.set(this.account, (this.balances.get(this.account) ?? 0) + amount);
    }

    this.transfers.push({ from, to: this.account, amount });
    return { ok: true };
  }

  balanceOf(identity: string): number | null {
    if (!this.balances) return null;
    return this.balances.get(identity) ?? 0;
  }
}
