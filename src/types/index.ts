import type { Address } from 'viem';

// =============================================================================
// Alerts
// =============================================================================

export const ALERT_TYPES = [
  'EMERGENCY',
  'SUSPICIOUS',
  'WEATHER',
  'MISSING_PERSON',
  'TRAFFIC',
  'UTILITY',
] as const;

/**
 * Category of a reported incident
 */
export type AlertType = (typeof ALERT_TYPES)[number];

export const ALERT_STATUSES = ['ACTIVE', 'RESOLVED', 'FALSE_ALARM'] as const;

/**
 * Alert lifecycle state. ACTIVE is the only non-terminal state.
 */
export type AlertStatus = (typeof ALERT_STATUSES)[number];

/**
 * Terminal states an ACTIVE alert can move to
 */
export type ResolutionStatus = Exclude<AlertStatus, 'ACTIVE'>;

/**
 * Location-tagged incident report
 */
export interface Alert {
  /** Sequential identifier, assigned at creation */
  id: number;
  /** Identity of the user who reported it */
  reporter: Address;
  alertType: AlertType;
  status: AlertStatus;
  location: string;
  description: string;
  /** Unix seconds at creation */
  timestamp: number;
  /** Fixed-point latitude */
  latitude: number;
  /** Fixed-point longitude */
  longitude: number;
  /** Radius in meters (1-5000) */
  radius: number;
  /** Responders in the order they volunteered */
  responders: Address[];
  verified: boolean;
}

// =============================================================================
// Users
// =============================================================================

/**
 * Registered resident profile
 */
export interface UserProfile {
  address: Address;
  isRegistered: boolean;
  isVerified: boolean;
  isFirstResponder: boolean;
  /** Never negative */
  reputationScore: number;
  alertsReported: number;
  alertsResponded: number;
  /** Opaque, stored as given */
  contactInfo: string;
}

// =============================================================================
// Neighborhoods
// =============================================================================

export interface Neighborhood {
  id: number;
  name: string;
  centerLat: number;
  centerLng: number;
  radius: number;
  /** Creator first; re-joining appends again */
  residents: Address[];
  moderator: Address;
  isActive: boolean;
}

// =============================================================================
// Events
// =============================================================================

export interface AlertCreatedEvent {
  type: 'AlertCreated';
  alertId: number;
  reporter: Address;
  alertType: AlertType;
  location: string;
}

export interface AlertRespondedEvent {
  type: 'AlertResponded';
  alertId: number;
  responder: Address;
}

export interface AlertResolvedEvent {
  type: 'AlertResolved';
  alertId: number;
  status: ResolutionStatus;
  resolvedBy: Address;
}

export interface UserRegisteredEvent {
  type: 'UserRegistered';
  user: Address;
}

export interface UserVerifiedEvent {
  type: 'UserVerified';
  user: Address;
}

export interface NeighborhoodCreatedEvent {
  type: 'NeighborhoodCreated';
  neighborhoodId: number;
  name: string;
  moderator: Address;
}

/**
 * Notification payload emitted after a successful mutation
 */
export type RegistryEventPayload =
  | AlertCreatedEvent
  | AlertRespondedEvent
  | AlertResolvedEvent
  | UserRegisteredEvent
  | UserVerifiedEvent
  | NeighborhoodCreatedEvent;

/**
 * Event as recorded in the log
 */
export type RegistryEvent = RegistryEventPayload & {
  /** Position in the log, starting at 1 */
  seq: number;
  /** Unix seconds when emitted */
  emittedAt: number;
};

// =============================================================================
// API responses
// =============================================================================

export interface AlertSummaryResponse {
  total: number;
  active: number[];
}

export interface HealthResponse {
  status: 'healthy';
  users: number;
  alerts: number;
  neighborhoods: number;
}
