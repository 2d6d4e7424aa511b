/**
 * Shared test identities and builders
 *
 * Addresses are digits only so their checksum form equals the literal.
 */

import type { Address } from 'viem';
import { createRegistryStore, type RegistryStore } from '../src/services/store.js';
import { RegistryService, type CreateAlertInput } from '../src/services/registry.js';

export const OWNER: Address = '0x1000000000000000000000000000000000000001';
export const ALICE: Address = '0x2000000000000000000000000000000000000002';
export const BOB: Address = '0x3000000000000000000000000000000000000003';
export const CAROL: Address = '0x4000000000000000000000000000000000000004';
export const DISPATCH: Address = '0x5000000000000000000000000000000000000005';
export const STRANGER: Address = '0x6000000000000000000000000000000000000006';

export const FIXED_NOW = 1_700_000_000;

export function createTestRegistry(): { store: RegistryStore; registry: RegistryService } {
  const store = createRegistryStore(OWNER);
  const registry = new RegistryService(store, { now: () => FIXED_NOW });
  return { store, registry };
}

export function alertInput(overrides: Partial<CreateAlertInput> = {}): CreateAlertInput {
  return {
    alertType: 'SUSPICIOUS',
    location: 'Elm St & 4th Ave',
    description: 'Person checking car door handles',
    latitude: 40712776,
    longitude: -74005974,
    radius: 250,
    ...overrides,
  };
}
