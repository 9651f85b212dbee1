/**
 * Role Registry
 *
 * Address → permission bitmask. Grants overwrite (no union merge); a zero
 * mask is rejected so a grant can never silently strip a user. Removal goes
 * through revoke().
 */

import { custodyLogger as logger, ROLE, type Address } from "@mintvault/shared";
import { custodyError } from "../errors.js";
import type { Role, RoleMask, RoleName } from "./types.js";

const roleLogger = logger.child({ component: "role-registry" });

export const VALID_ROLE_MASKS: readonly RoleMask[] = [1, 2, 3, 4, 5, 6, 7];

const ROLE_NAMES: readonly RoleName[] = ["ADMIN", "MINTER", "WITHDRAWER"];

const ROLE_NAME_BY_BIT: Record<Role, RoleName> = {
  1: "ADMIN",
  2: "MINTER",
  4: "WITHDRAWER",
};

export function isRoleMask(value: number): value is RoleMask {
  return VALID_ROLE_MASKS.some((mask) => mask === value);
}

/**
 * Validate a raw bitmask against the seven legal combinations
 */
export function parseRoleMask(value: number): RoleMask {
  if (!isRoleMask(value)) {
    throw custodyError("INVALID_ROLE_MASK", { context: { mask: value } });
  }
  return value;
}

/**
 * Names of the bits set in a mask, in bit order
 */
export function describeRoles(mask: number): RoleName[] {
  return ROLE_NAMES.filter((name) => (mask & ROLE[name]) !== 0);
}

// ============================================
// ROLE REGISTRY
// ============================================

export class RoleRegistry {
  constructor(private readonly entries: Map<Address, RoleMask>) {}

  /**
   * Replace any prior mask for the address
   */
  grant(address: Address, mask: number): RoleMask {
    const parsed = parseRoleMask(mask);
    const previous = this.entries.get(address);
    this.entries.set(address, parsed);

    roleLogger.debug({
      address,
      previous,
      roles: describeRoles(parsed),
    }, "Roles granted");

    return parsed;
  }

  /**
   * Remove every role for the address. Returns false if it had none.
   */
  revoke(address: Address): boolean {
    return this.entries.delete(address);
  }

  has(address: Address, role: Role): boolean {
    const mask = this.entries.get(address);
    return mask !== undefined && (mask & role) !== 0;
  }

  rolesOf(address: Address): RoleMask | undefined {
    return this.entries.get(address);
  }

  /**
   * Throw MISSING_ROLE unless the address holds the bit
   */
  require(address: Address, role: Role): void {
    if (!this.has(address, role)) {
      throw custodyError("MISSING_ROLE", {
        context: { address, required: ROLE_NAME_BY_BIT[role] },
      });
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
