/**
 * @tallystake/ledger: Balance book.
 *
 * Tracks per-account balances and the supply counters.
 *
 * Rules:
 * - Balances never go negative
 * - totalSupply === sum of all balances
 * - totalSupply never exceeds maxSupply
 * - Burns decrement totalSupply and increment totalBurned
 * - The zero address never holds a balance
 * - Accounts are created on first credit and never removed
 */

import type { Address } from "@tallystake/types";
import { ZERO_ADDRESS, isAddress } from "@tallystake/types";
import { assertNonNegativeAmount } from "./amount-math.js";
import type { BalanceSnapshot, HolderBalance } from "./types.js";
import { LedgerError } from "./types.js";

export class BalanceBook {
  private readonly _balances: Map<Address, bigint> = new Map();
  private _totalSupply = 0n;
  private _totalBurned = 0n;
  private readonly _maxSupply: bigint;

  constructor(maxSupply: bigint) {
    assertNonNegativeAmount(maxSupply, "Max supply");
    this._maxSupply = maxSupply;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this._balances.get(address) ?? 0n;
  }

  has(address: Address): boolean {
    return this._balances.has(address);
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  get totalBurned(): bigint {
    return this._totalBurned;
  }

  get maxSupply(): bigint {
    return this._maxSupply;
  }

  /**
   * All known accounts, in order of first credit.
   */
  holders(): readonly HolderBalance[] {
    return [...this._balances].map(([address, balance]) => ({ address, balance }));
  }

  /**
   * Whether the sum of balances matches totalSupply.
   */
  isConserved(): boolean {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      sum += balance;
    }
    return sum === this._totalSupply;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Add to an account without touching supply. Zero is a no-op.
   */
  credit(address: Address, amount: bigint): void {
    this._assertHolder(address);
    assertNonNegativeAmount(amount, "Credit amount");
    if (amount === 0n) return;
    this._balances.set(address, this.balanceOf(address) + amount);
  }

  /**
   * Remove from an account without touching supply. Zero is a no-op.
   */
  debit(address: Address, amount: bigint): void {
    this._assertHolder(address);
    assertNonNegativeAmount(amount, "Debit amount");
    if (amount === 0n) return;

    const balance = this.balanceOf(address);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${address}" holds ${balance.toString()}, needs ${amount.toString()}`,
      );
    }
    this._balances.set(address, balance - amount);
  }

  /**
   * Move an amount between two accounts.
   */
  move(from: Address, to: Address, amount: bigint): void {
    this._assertHolder(to);
    this.debit(from, amount);
    this.credit(to, amount);
  }

  /**
   * Create new supply into an account.
   */
  mint(to: Address, amount: bigint): void {
    assertNonNegativeAmount(amount, "Mint amount");
    const next = this._totalSupply + amount;
    if (next > this._maxSupply) {
      throw new LedgerError(
        "MAX_SUPPLY_EXCEEDED",
        `Minting ${amount.toString()} would raise supply to ${next.toString()}, above the cap of ${this._maxSupply.toString()}`,
      );
    }
    this.credit(to, amount);
    this._totalSupply = next;
  }

  /**
   * Destroy supply held by an account.
   */
  burn(from: Address, amount: bigint): void {
    this.debit(from, amount);
    this._totalSupply -= amount;
    this._totalBurned += amount;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  export(): BalanceSnapshot {
    return {
      version: 1,
      balances: this.holders(),
      totalSupply: this._totalSupply,
      totalBurned: this._totalBurned,
      maxSupply: this._maxSupply,
    };
  }

  /**
   * Replace the book's state with a snapshot.
   * Used to roll back a failed operation.
   */
  import(snapshot: BalanceSnapshot): void {
    if (snapshot.maxSupply !== this._maxSupply) {
      throw new LedgerError(
        "MAX_SUPPLY_EXCEEDED",
        `Snapshot cap ${snapshot.maxSupply.toString()} does not match book cap ${this._maxSupply.toString()}`,
      );
    }
    this._balances.clear();
    for (const { address, balance } of snapshot.balances) {
      this._balances.set(address, balance);
    }
    this._totalSupply = snapshot.totalSupply;
    this._totalBurned = snapshot.totalBurned;
  }

  static fromSnapshot(snapshot: BalanceSnapshot): BalanceBook {
    const book = new BalanceBook(snapshot.maxSupply);
    book.import(snapshot);
    return book;
  }

  private _assertHolder(address: Address): void {
    if (!isAddress(address)) {
      throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${String(address)}"`);
    }
    if (address === ZERO_ADDRESS) {
      throw new LedgerError("INVALID_ADDRESS", "The zero address cannot hold a balance");
    }
  }
}
