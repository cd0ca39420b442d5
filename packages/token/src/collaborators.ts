/**
 * Simple in-process collaborators.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Single-process embeddings that keep roles in memory
 */

import type { Address } from "@tallystake/types";
import type { AccessControl, PauseGate, Role, RoleGrant } from "./types.js";

/**
 * Role membership held in a map of sets.
 */
export class InMemoryAccessControl implements AccessControl {
  private readonly members = new Map<Role, Set<Address>>();

  constructor(grants: readonly RoleGrant[] = []) {
    for (const { role, account } of grants) {
      this.grant(role, account);
    }
  }

  hasRole(caller: Address, role: Role): boolean {
    return this.members.get(role)?.has(caller) ?? false;
  }

  grant(role: Role, account: Address): void {
    let set = this.members.get(role);
    if (set === undefined) {
      set = new Set();
      this.members.set(role, set);
    }
    set.add(account);
  }

  revoke(role: Role, account: Address): void {
    this.members.get(role)?.delete(account);
  }
}

/**
 * A pause flag flipped by its owner.
 */
export class SwitchPauseGate implements PauseGate {
  private paused: boolean;

  constructor(paused = false) {
    this.paused = paused;
  }

  isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    this.paused = true;
  }

  unpause(): void {
    this.paused = false;
  }
}
