import { assertAddress } from "../crowdfunding/address.js";
import { AuthorizationError } from "../crowdfunding/errors.js";
import type { AccessControl, Address, PauseGate } from "../crowdfunding/types.js";

/**
 * One owner plus a set of admins. The owner is always treated as an admin.
 */
export class RoleRegistry implements AccessControl {
  private owner: Address;
  private readonly admins = new Set<Address>();

  constructor(owner: Address, admins: Address[] = []) {
    this.owner = assertAddress(owner, "Owner");
    for (const admin of admins) this.admins.add(assertAddress(admin, "Admin"));
  }

  isOwner(address: Address): boolean {
    return address === this.owner;
  }

  isAdmin(address: Address): boolean {
    return this.isOwner(address) || this.admins.has(address);
  }

  getOwner(): Address {
    return this.owner;
  }

  getAdmins(): Address[] {
    return Array.from(this.admins);
  }

  grantAdmin(caller: Address, admin: Address): void {
    this.assertOwner(caller);
    this.admins.add(assertAddress(admin, "Admin"));
  }

  revokeAdmin(caller: Address, admin: Address): void {
    this.assertOwner(caller);
    this.admins.delete(admin);
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.assertOwner(caller);
    this.owner = assertAddress(newOwner, "Owner");
  }

  private assertOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new AuthorizationError("Caller is not the owner");
    }
  }
}

/** Admin-controlled pause flag. Pausing twice or resuming twice is a no-op. */
export class PauseSwitch implements PauseGate {
  private paused = false;

  constructor(private readonly access: AccessControl) {}

  isPaused(): boolean {
    return this.paused;
  }

  pause(caller: Address): void {
    this.assertAdmin(caller);
    this.paused = true;
  }

  unpause(caller: Address): void {
    this.assertAdmin(caller);
    this.paused = false;
  }

  private assertAdmin(caller: Address): void {
    if (!this.access.isAdmin(caller)) {
      throw new AuthorizationError("Caller is not an admin");
    }
  }
}
