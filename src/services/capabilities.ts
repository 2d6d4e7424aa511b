/**
 * Caller Capabilities
 *
 * Role checks are pure predicates over the set of capabilities a caller
 * holds in a given store. No role classes; every operation derives the set
 * at its start and checks what it needs.
 */

import type { Address } from 'viem';
import type { Alert } from '../types/index.js';
import type { RegistryStore } from './store.js';

export type Capability =
  | 'owner'
  | 'registered'
  | 'verified'
  | 'firstResponder'
  | 'emergencyService';

/**
 * Derive the capability set of `identity`
 */
export function capabilitiesOf(store: RegistryStore, identity: Address): ReadonlySet<Capability> {
  const caps = new Set<Capability>();

  if (identity === store.owner) caps.add('owner');
  if (store.emergencyServices.has(identity)) caps.add('emergencyService');

  const user = store.users.get(identity);
  if (user?.isRegistered) {
    caps.add('registered');
    if (user.isVerified) caps.add('verified');
    if (user.isFirstResponder) caps.add('firstResponder');
  }

  return caps;
}

export function hasCapability(caps: ReadonlySet<Capability>, capability: Capability): boolean {
  return caps.has(capability);
}

export function hasAnyCapability(
  caps: ReadonlySet<Capability>,
  capabilities: readonly Capability[]
): boolean {
  return capabilities.some((capability) => caps.has(capability));
}

/**
 * Capabilities that may close any alert, regardless of who reported it
 */
export const RESOLVER_CAPABILITIES: readonly Capability[] = [
  'owner',
  'firstResponder',
  'emergencyService',
];

/**
 * Whether `caller` may move `alert` to a terminal status
 */
export function canResolveAlert(
  alert: Alert,
  caller: Address,
  caps: ReadonlySet<Capability>
): boolean {
  return alert.reporter === caller || hasAnyCapability(caps, RESOLVER_CAPABILITIES);
}
