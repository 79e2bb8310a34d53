/**
 * Pending-call table: request id -> single-assignment result slot.
 *
 * The connection's reader is the only writer of a slot; the caller that
 * registered it is the only reader. Every path that ends a call (response,
 * timeout, teardown) removes the entry, so a slot is settled at most once.
 */

import type { JsonRpcId } from './protocol/envelope';
import type { MCPError } from './protocol/errors';

export type CallOutcome =
  | { ok: true; result: unknown }
  | { ok: false; error: MCPError };

export interface PendingCall {
  id: number;
  method: string;
  /** Settles exactly once; never rejects */
  slot: Promise<CallOutcome>;
  createdAt: number;
}

interface PendingEntry {
  call: PendingCall;
  settle: (outcome: CallOutcome) => void;
}

export class CorrelationTable {
  private entries = new Map<number, PendingEntry>();
  private nextId = 1;

  get size(): number {
    return this.entries.size;
  }

  /**
   * Allocate a fresh id with an empty slot.
   */
  register(method: string): PendingCall {
    const id = this.nextId++;
    let settle: (outcome: CallOutcome) => void = () => undefined;
    const slot = new Promise<CallOutcome>((resolve) => {
      settle = resolve;
    });
    const call: PendingCall = { id, method, slot, createdAt: Date.now() };
    this.entries.set(id, { call, settle });
    return call;
  }

  has(id: JsonRpcId): boolean {
    return typeof id === 'number' && this.entries.has(id);
  }

  /**
   * Fulfil and remove the matching entry. False for unknown or stale ids.
   */
  resolve(id: JsonRpcId, outcome: CallOutcome): boolean {
    if (typeof id !== 'number') {
      return false;
    }
    const entry = this.entries.get(id);
    if (!entry) {
      return false;
    }
    this.entries.delete(id);
    entry.settle(outcome);
    return true;
  }

  /**
   * Drop an entry without settling it (the caller has stopped waiting).
   */
  cancel(id: number): boolean {
    return this.entries.delete(id);
  }

  /**
   * Fail every outstanding slot. Returns how many there were.
   */
  cancelAll(error: MCPError): number {
    const entries = [...this.entries.values()];
    this.entries.clear();
    for (const entry of entries) {
      entry.settle({ ok: false, error });
    }
    return entries.length;
  }

  pendingMethods(): string[] {
    return [...this.entries.values()].map((entry) => entry.call.method);
  }
}
