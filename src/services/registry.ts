/**
 * Registry Service
 *
 * Owns the alert, user and neighborhood state machine.
 *
 * Rules:
 * - Only registered users with reputation >= MIN_REPUTATION may report alerts
 * - Alerts move ACTIVE -> RESOLVED | FALSE_ALARM exactly once
 * - A user responds to a given alert at most once
 * - Reputation never drops below zero
 * - Owner-only: verification, first-responder flag, emergency services
 *
 * Every operation runs all of its checks before its first write, so a thrown
 * error leaves the store untouched.
 */

import type { Address } from 'viem';
import { createChildLogger } from '../utils/logger.js';
import { shortAddress } from '../utils/address.js';
import {
  AuthorizationError,
  ConflictError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import {
  ALERT_STATUSES,
  ALERT_TYPES,
  type Alert,
  type AlertStatus,
  type AlertType,
  type Neighborhood,
  type RegistryEvent,
  type RegistryEventPayload,
  type UserProfile,
} from '../types/index.js';
import { capabilitiesOf, canResolveAlert, hasCapability } from './capabilities.js';
import type { RegistryStore } from './store.js';

const log = createChildLogger({ module: 'registry' });

/**
 * Reputation rules
 */
export const REPUTATION = {
  /** Starting score, and the minimum needed to report an alert */
  MIN_REPUTATION: 50,
  RESPONSE_REWARD: 10,
  RESOLUTION_REWARD: 10,
  FALSE_ALARM_PENALTY: 25,
  VERIFICATION_BONUS: 25,
} as const;

export const MAX_ALERT_RADIUS = 5000;

export interface CreateAlertInput {
  alertType: AlertType;
  location: string;
  description: string;
  latitude: number;
  longitude: number;
  radius: number;
}

export interface CreateNeighborhoodInput {
  name: string;
  centerLat: number;
  centerLng: number;
  radius: number;
}

export interface RegistryServiceOptions {
  /** Clock in unix seconds */
  now?: () => number;
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

function requireNonEmpty(value: string, field: string): void {
  if (value.length === 0) {
    throw new ValidationError(`${field} must not be empty`, field);
  }
}

function requireInteger(value: number, field: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
}

function isAlertType(value: string): value is AlertType {
  return (ALERT_TYPES as readonly string[]).includes(value);
}

function isAlertStatus(value: string): value is AlertStatus {
  return (ALERT_STATUSES as readonly string[]).includes(value);
}

function copyAlert(alert: Alert): Alert {
  return { ...alert, responders: [...alert.responders] };
}

function copyNeighborhood(neighborhood: Neighborhood): Neighborhood {
  return { ...neighborhood, residents: [...neighborhood.residents] };
}

/**
 * Registry Service class
 */
export class RegistryService {
  private readonly now: () => number;

  constructor(
    private readonly store: RegistryStore,
    options: RegistryServiceOptions = {}
  ) {
    this.now = options.now ?? unixNow;
  }

  // ---------------------------------------------------------------------------
  // Alert lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Report a new alert. Returns the new alert id.
   */
  createAlert(caller: Address, input: CreateAlertInput): number {
    const reporter = this.requireRegisteredCaller(caller);
    if (reporter.reputationScore < REPUTATION.MIN_REPUTATION) {
      throw new AuthorizationError(
        `Reputation ${reporter.reputationScore} is below the ${REPUTATION.MIN_REPUTATION} required to report alerts`
      );
    }

    if (!isAlertType(input.alertType)) {
      throw new ValidationError(`Unknown alert type: ${input.alertType}`, 'alertType');
    }
    requireNonEmpty(input.location, 'location');
    requireNonEmpty(input.description, 'description');
    requireInteger(input.latitude, 'latitude');
    requireInteger(input.longitude, 'longitude');
    requireInteger(input.radius, 'radius');
    if (input.radius < 1 || input.radius > MAX_ALERT_RADIUS) {
      throw new ValidationError(`radius must be between 1 and ${MAX_ALERT_RADIUS}`, 'radius');
    }

    const id = this.store.nextAlertId;
    const verified =
      reporter.isVerified || (input.alertType === 'EMERGENCY' && reporter.isFirstResponder);

    this.store.alerts.set(id, {
      id,
      reporter: caller,
      alertType: input.alertType,
      status: 'ACTIVE',
      location: input.location,
      description: input.description,
      timestamp: this.now(),
      latitude: input.latitude,
      longitude: input.longitude,
      radius: input.radius,
      responders: [],
      verified,
    });
    this.store.nextAlertId = id + 1;
    reporter.alertsReported += 1;

    log.info(
      { alertId: id, reporter: shortAddress(caller), alertType: input.alertType, verified },
      'Alert created'
    );
    this.emit({
      type: 'AlertCreated',
      alertId: id,
      reporter: caller,
      alertType: input.alertType,
      location: input.location,
    });

    return id;
  }

  /**
   * Volunteer as a responder to an active alert
   */
  respondToAlert(caller: Address, alertId: number): void {
    const responder = this.requireRegisteredCaller(caller);
    const alert = this.requireAlert(alertId);

    if (alert.status !== 'ACTIVE') {
      throw new InvalidStateError(`Alert ${alertId} is ${alert.status}`);
    }

    for (const existing of alert.responders) {
      if (existing === caller) {
        throw new ConflictError(`Already responding to alert ${alertId}`);
      }
    }

    alert.responders.push(caller);
    responder.alertsResponded += 1;
    responder.reputationScore += REPUTATION.RESPONSE_REWARD;

    log.info(
      { alertId, responder: shortAddress(caller), responders: alert.responders.length },
      'Alert response recorded'
    );
    this.emit({ type: 'AlertResponded', alertId, responder: caller });
  }

  /**
   * Close an active alert as RESOLVED or FALSE_ALARM and settle the
   * reporter's reputation
   */
  resolveAlert(caller: Address, alertId: number, newStatus: AlertStatus): void {
    if (!isAlertStatus(newStatus) || newStatus === 'ACTIVE') {
      throw new ValidationError('Status must be RESOLVED or FALSE_ALARM', 'status');
    }

    const alert = this.requireAlert(alertId);
    if (alert.status !== 'ACTIVE') {
      throw new InvalidStateError(`Alert ${alertId} is already ${alert.status}`);
    }

    const caps = capabilitiesOf(this.store, caller);
    if (!canResolveAlert(alert, caller, caps)) {
      throw new AuthorizationError('Not authorized to resolve this alert');
    }

    alert.status = newStatus;

    // Reporter records are never removed once registered
    const reporter = this.store.users.get(alert.reporter);
    if (reporter) {
      if (newStatus === 'FALSE_ALARM') {
        reporter.reputationScore = Math.max(
          0,
          reporter.reputationScore - REPUTATION.FALSE_ALARM_PENALTY
        );
      } else {
        reporter.reputationScore += REPUTATION.RESOLUTION_REWARD;
      }
    }

    log.info(
      {
        alertId,
        status: newStatus,
        resolvedBy: shortAddress(caller),
        reporterReputation: reporter?.reputationScore,
      },
      'Alert resolved'
    );
    this.emit({ type: 'AlertResolved', alertId, status: newStatus, resolvedBy: caller });
  }

  // ---------------------------------------------------------------------------
  // User management
  // ---------------------------------------------------------------------------

  registerUser(caller: Address, contactInfo: string): UserProfile {
    if (this.store.users.get(caller)?.isRegistered) {
      throw new ConflictError('User already registered');
    }
    requireNonEmpty(contactInfo, 'contactInfo');

    const user: UserProfile = {
      address: caller,
      isRegistered: true,
      isVerified: false,
      isFirstResponder: false,
      reputationScore: REPUTATION.MIN_REPUTATION,
      alertsReported: 0,
      alertsResponded: 0,
      contactInfo,
    };
    this.store.users.set(caller, user);

    log.info({ user: shortAddress(caller) }, 'User registered');
    this.emit({ type: 'UserRegistered', user: caller });

    return { ...user };
  }

  verifyUser(caller: Address, target: Address): void {
    this.requireOwner(caller);
    const user = this.requireUser(target);
    if (user.isVerified) {
      throw new ConflictError('User already verified');
    }

    user.isVerified = true;
    user.reputationScore += REPUTATION.VERIFICATION_BONUS;

    log.info({ user: shortAddress(target) }, 'User verified');
    this.emit({ type: 'UserVerified', user: target });
  }

  setFirstResponder(caller: Address, target: Address, isFirstResponder: boolean): void {
    this.requireOwner(caller);
    const user = this.requireUser(target);
    if (!user.isVerified) {
      throw new InvalidStateError('Only verified users can be first responders');
    }

    user.isFirstResponder = isFirstResponder;

    log.info({ user: shortAddress(target), isFirstResponder }, 'First responder flag updated');
  }

  addEmergencyService(caller: Address, service: Address): void {
    this.requireOwner(caller);

    this.store.emergencyServices.add(service);

    log.info({ service: shortAddress(service) }, 'Emergency service added');
  }

  // ---------------------------------------------------------------------------
  // Neighborhoods
  // ---------------------------------------------------------------------------

  /**
   * Create a neighborhood moderated by the caller. Returns its id.
   */
  createNeighborhood(caller: Address, input: CreateNeighborhoodInput): number {
    const caps = capabilitiesOf(this.store, caller);
    if (!hasCapability(caps, 'verified')) {
      throw new AuthorizationError('Only verified users can create neighborhoods');
    }

    requireNonEmpty(input.name, 'name');
    requireInteger(input.centerLat, 'centerLat');
    requireInteger(input.centerLng, 'centerLng');
    requireInteger(input.radius, 'radius');
    if (input.radius <= 0) {
      throw new ValidationError('radius must be positive', 'radius');
    }

    const id = this.store.nextNeighborhoodId;
    this.store.neighborhoods.set(id, {
      id,
      name: input.name,
      centerLat: input.centerLat,
      centerLng: input.centerLng,
      radius: input.radius,
      residents: [caller],
      moderator: caller,
      isActive: true,
    });
    this.store.nextNeighborhoodId = id + 1;

    log.info({ neighborhoodId: id, moderator: shortAddress(caller) }, 'Neighborhood created');
    this.emit({ type: 'NeighborhoodCreated', neighborhoodId: id, name: input.name, moderator: caller });

    return id;
  }

  /**
   * Add the caller to a neighborhood's residents. Joining twice appends a
   * second entry.
   */
  joinNeighborhood(caller: Address, neighborhoodId: number): void {
    this.requireRegisteredCaller(caller);

    const neighborhood = this.store.neighborhoods.get(neighborhoodId);
    if (!neighborhood) {
      throw new NotFoundError('Neighborhood', neighborhoodId);
    }
    if (!neighborhood.isActive) {
      throw new InvalidStateError(`Neighborhood ${neighborhoodId} is not active`);
    }

    neighborhood.residents.push(caller);

    log.info(
      { neighborhoodId, resident: shortAddress(caller), residents: neighborhood.residents.length },
      'Neighborhood joined'
    );
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getAlert(alertId: number): Alert {
    return copyAlert(this.requireAlert(alertId));
  }

  getAlertResponders(alertId: number): Address[] {
    return [...this.requireAlert(alertId).responders];
  }

  getUserProfile(identity: Address): UserProfile {
    return { ...this.requireUser(identity) };
  }

  getNeighborhood(neighborhoodId: number): Neighborhood {
    const neighborhood = this.store.neighborhoods.get(neighborhoodId);
    if (!neighborhood) {
      throw new NotFoundError('Neighborhood', neighborhoodId);
    }
    return copyNeighborhood(neighborhood);
  }

  getTotalAlerts(): number {
    return this.store.nextAlertId;
  }

  getTotalNeighborhoods(): number {
    return this.store.nextNeighborhoodId;
  }

  getTotalUsers(): number {
    return this.store.users.size;
  }

  /**
   * Ids of ACTIVE alerts in ascending order
   */
  getActiveAlerts(): number[] {
    const total = this.store.nextAlertId;

    let count = 0;
    for (let id = 0; id < total; id++) {
      if (this.store.alerts.get(id)?.status === 'ACTIVE') count++;
    }

    const active = new Array<number>(count);
    let index = 0;
    for (let id = 0; id < total; id++) {
      if (this.store.alerts.get(id)?.status === 'ACTIVE') {
        active[index++] = id;
      }
    }

    return active;
  }

  isEmergencyService(identity: Address): boolean {
    return this.store.emergencyServices.has(identity);
  }

  getOwner(): Address {
    return this.store.owner;
  }

  getEvents(sinceSeq: number = 0): RegistryEvent[] {
    return this.store.events.list(sinceSeq);
  }

  getEventCount(): number {
    return this.store.events.size;
  }

  /**
   * Subscribe to notifications. Returns an unsubscribe function.
   */
  onEvent(listener: (event: RegistryEvent) => void): () => void {
    return this.store.events.subscribe(listener);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private emit(payload: RegistryEventPayload): void {
    this.store.events.append(payload, this.now());
  }

  private requireAlert(alertId: number): Alert {
    const alert = this.store.alerts.get(alertId);
    if (!alert) {
      throw new NotFoundError('Alert', alertId);
    }
    return alert;
  }

  private requireUser(identity: Address): UserProfile {
    const user = this.store.users.get(identity);
    if (!user?.isRegistered) {
      throw new NotFoundError('User', identity);
    }
    return user;
  }

  private requireRegisteredCaller(caller: Address): UserProfile {
    const user = this.store.users.get(caller);
    if (!user?.isRegistered) {
      throw new AuthorizationError('Caller is not a registered user');
    }
    return user;
  }

  private requireOwner(caller: Address): void {
    if (!hasCapability(capabilitiesOf(this.store, caller), 'owner')) {
      throw new AuthorizationError('Only the registry owner can perform this action');
    }
  }
}
