import { isDeepStrictEqual } from 'util';
import { CasToken } from '../store/KeyValueStore';

export interface TokenSnapshot {
  readonly key: string;
  readonly value: unknown;
}

let nextTableId = 1;

/**
 * Synthetic CAS tokens handed out by a transaction's reads.
 *
 * Backend tokens go stale once writes are deferred, so each read gets a
 * local token bound to a copy of the value it saw. Token numbers keep
 * counting across `clear()`, so a token from an earlier transaction on the
 * same instance never resolves again.
 */
export class TokenTable {
  private readonly tableId = nextTableId++;
  private nextToken = 1;
  private snapshots = new Map<CasToken, TokenSnapshot>();

  issue(key: string, value: unknown): CasToken {
    const token = `t${this.tableId}-${this.nextToken++}`;
    this.snapshots.set(token, { key, value: structuredClone(value) });
    return token;
  }

  lookup(token: CasToken): TokenSnapshot | null {
    return this.snapshots.get(token) ?? null;
  }

  clear(): void {
    this.snapshots.clear();
  }

  get size(): number {
    return this.snapshots.size;
  }

  static matches(snapshot: TokenSnapshot, value: unknown): boolean {
    return isDeepStrictEqual(snapshot.value, value);
  }
}
