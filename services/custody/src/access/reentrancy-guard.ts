/**
 * Reentrancy Guard
 *
 * One lock per collection. run() releases on every exit path, including
 * thrown validation errors.
 */

import { custodyError } from "../errors.js";

export interface GuardToken {
  readonly id: number;
  readonly operation: string;
}

export class ReentrancyGuard {
  private holder: GuardToken | null = null;
  private nextId = 1;

  get held(): boolean {
    return this.holder !== null;
  }

  get heldBy(): string | undefined {
    return this.holder?.operation;
  }

  acquire(operation: string): GuardToken {
    if (this.holder) {
      throw custodyError("REENTRANT_CALL", {
        context: { operation, heldBy: this.holder.operation },
      });
    }
    const token: GuardToken = { id: this.nextId++, operation };
    this.holder = token;
    return token;
  }

  release(token: GuardToken): void {
    if (this.holder !== token) {
      throw new Error(`Guard release by non-holder: ${token.operation}#${token.id}`);
    }
    this.holder = null;
  }

  run<T>(operation: string, fn: () => T): T {
    const token = this.acquire(operation);
    try {
      return fn();
    } finally {
      this.release(token);
    }
  }
}
