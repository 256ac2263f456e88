/**
 * Access control
 *
 * Capability checks for privileged ledger operations. The owner holds every
 * capability; other actors hold what the owner grants them.
 */

import { UnauthorizedError } from '../ledger/ledger-errors.js';
import type { LedgerEvents } from '../ledger/ledger-events.js';
import type { CallerContext } from '../ledger/ledger-types.js';

type CapabilityList = readonly string[];

export const LEDGER_CAPABILITIES = [
  // withdraw, spend, rotate, borrow, escrow, liquidate, swap
  'ledger:operate',
  // oracle and swap router wiring
  'ledger:configure',
] as const satisfies CapabilityList;

export type LedgerCapability = (typeof LEDGER_CAPABILITIES)[number];

export function isLedgerCapability(value: unknown): value is LedgerCapability {
  return typeof value === 'string' && LEDGER_CAPABILITIES.some((capability) => capability === value);
}

export class AccessControl {
  private ownerActor: string;
  private readonly grants = new Map<string, Set<LedgerCapability>>();

  constructor(
    owner: string,
    private readonly events?: LedgerEvents
  ) {
    this.ownerActor = requireActor(owner);
  }

  get owner(): string {
    return this.ownerActor;
  }

  hasCapability(actor: string, capability: LedgerCapability): boolean {
    const key = actor.trim();
    if (key === this.ownerActor) {
      return true;
    }
    return this.grants.get(key)?.has(capability) ?? false;
  }

  requireCapability(caller: CallerContext, capability: LedgerCapability): void {
    if (!this.hasCapability(caller.actor, capability)) {
      throw new UnauthorizedError(caller.actor, `capability "${capability}"`);
    }
  }

  capabilitiesOf(actor: string): LedgerCapability[] {
    const key = actor.trim();
    if (key === this.ownerActor) {
      return [...LEDGER_CAPABILITIES];
    }
    return [...(this.grants.get(key) ?? [])];
  }

  grant(caller: CallerContext, actor: string, capability: LedgerCapability): void {
    this.requireOwner(caller);
    const target = requireActor(actor);
    const held = this.grants.get(target) ?? new Set<LedgerCapability>();
    held.add(capability);
    this.grants.set(target, held);
  }

  revoke(caller: CallerContext, actor: string, capability: LedgerCapability): void {
    this.requireOwner(caller);
    const target = requireActor(actor);
    const held = this.grants.get(target);
    if (!held) {
      return;
    }
    held.delete(capability);
    if (held.size === 0) {
      this.grants.delete(target);
    }
  }

  transferOwnership(caller: CallerContext, newOwner: string): void {
    this.requireOwner(caller);
    const previousOwner = this.ownerActor;
    this.ownerActor = requireActor(newOwner);

    this.events?.emit({
      type: 'ownership.transferred',
      previousOwner,
      newOwner: this.ownerActor,
    });
  }

  private requireOwner(caller: CallerContext): void {
    if (caller.actor.trim() !== this.ownerActor) {
      throw new UnauthorizedError(caller.actor, 'ownership');
    }
  }
}

function requireActor(actor: string): string {
  const trimmed = actor.trim();
  if (!trimmed) {
    throw new TypeError('Actor identity must not be empty');
  }
  return trimmed;
}
