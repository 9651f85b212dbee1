/**
 * Staged state for guarded calls
 *
 * Scalars and the capability record are always copied. A table is copied
 * only when the call names it as one it writes; the rest are shared with the
 * committed state and must be treated as read-only by the call.
 */

import type { CollectionState } from "./types.js";

export type StateTable = "roles" | "whitelist" | "pendingWithdrawals" | "approvals";

export function stageState(state: CollectionState, writes: readonly StateTable[]): CollectionState {
  const draft: CollectionState = { ...state, capability: { ...state.capability } };

  for (const table of writes) {
    switch (table) {
      case "roles":
        draft.roles = new Map(state.roles);
        break;
      case "whitelist":
        draft.whitelist = new Map(state.whitelist);
        break;
      case "pendingWithdrawals":
        draft.pendingWithdrawals = structuredClone(state.pendingWithdrawals);
        break;
      case "approvals":
        draft.approvals = structuredClone(state.approvals);
        break;
    }
  }

  return draft;
}
