/**
 * Registry Store
 *
 * Plain keyed storage for alerts, users, neighborhoods and emergency-service
 * flags. The store is created once and passed by reference into the
 * RegistryService; nothing in the domain layer holds module-level state.
 */

import type { Address } from 'viem';
import type { Alert, Neighborhood, UserProfile } from '../types/index.js';
import { RegistryEventLog } from './events.js';

export interface RegistryStore {
  /** Identity with owner privileges, fixed at creation */
  readonly owner: Address;
  readonly alerts: Map<number, Alert>;
  readonly users: Map<Address, UserProfile>;
  readonly neighborhoods: Map<number, Neighborhood>;
  readonly emergencyServices: Set<Address>;
  readonly events: RegistryEventLog;
  nextAlertId: number;
  nextNeighborhoodId: number;
}

/**
 * Create an empty store owned by `owner`
 */
export function createRegistryStore(owner: Address): RegistryStore {
  return {
    owner,
    alerts: new Map(),
    users: new Map(),
    neighborhoods: new Map(),
    emergencyServices: new Set(),
    events: new RegistryEventLog(),
    nextAlertId: 0,
    nextNeighborhoodId: 0,
  };
}
