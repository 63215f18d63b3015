/**
 * Travel domain types
 *
 * Destinations, transition states and the outcome reported for each attempt.
 */

import type * as THREE from 'three';
import type { Vec3Tuple } from '@waystone/shared';

export interface Destination {
  name: string;
  /** World-space arrival point; null until configured or discovered */
  coordinates: Vec3Tuple | null;
  /** Null falls back to the global default price */
  price: number | null;
  enabled: boolean;
  visited: boolean;
  /** Scene to load for this destination; null means the active scene */
  sceneId: string | null;
  /** Named object in the destination scene whose position wins over coordinates */
  anchorName: string | null;
  description: string;
}

export enum TransitionState {
  IDLE = 'idle',
  CHARGING = 'charging',
  STAGING_LOAD = 'staging-load',
  DESTINATION_LOADING = 'destination-loading',
  PLACING = 'placing',
  DONE = 'done'
}

export enum TransitionOutcomeKind {
  SUCCEEDED = 'succeeded',
  INSUFFICIENT_FUNDS = 'insufficient-funds',
  DETECTION_FAILED = 'detection-failed',
  MISSING_COORDINATES = 'missing-coordinates',
  ENTITY_NOT_FOUND = 'entity-not-found',
  LOAD_FAILED = 'load-failed',
  CANCELLED = 'cancelled',
  BUSY = 'busy',
  UNAVAILABLE = 'unavailable'
}

export type ResolutionStrategy = 'name-prefix' | 'role-component' | 'tag' | 'scene-keyword' | 'camera';

export interface ResolvedEntity {
  /** Non-owning handle into the live scene graph, valid for the current operation only */
  object: THREE.Object3D;
  strategy: ResolutionStrategy;
}

export interface StageTiming {
  stage: 'staging' | 'destination';
  sceneId: string;
  elapsedMs: number;
}

export interface TransitionDiagnostics {
  resolutionStrategy?: ResolutionStrategy;
  placementStrategy?: ResolutionStrategy;
  currencyCandidate?: string;
  charged?: number;
  refunded?: boolean;
  timings: StageTiming[];
  /** Anchor object the arrival point was taken from */
  anchor?: string;
  placedAt?: Vec3Tuple;
  grounded?: boolean;
  error?: string;
}

export interface TransitionOutcome {
  kind: TransitionOutcomeKind;
  destination: string;
  reason?: string;
  diagnostics: TransitionDiagnostics;
}

export interface TransitionRequest {
  destination: Destination;
  entity: ResolvedEntity | null;
  price: number;
  staged: boolean;
  coordinates: Vec3Tuple;
  signal?: AbortSignal;
}

export interface TravelOptions {
  /** Arrival point for a destination that has no stored coordinates yet */
  coordinates?: Vec3Tuple;
  /** Overrides the configured staged-transition default for this attempt */
  staged?: boolean;
  signal?: AbortSignal;
}

/** Outcomes where the price was taken but the player did not arrive */
export const DISCREPANCY_OUTCOMES: ReadonlySet<TransitionOutcomeKind> = new Set([
  TransitionOutcomeKind.LOAD_FAILED,
  TransitionOutcomeKind.ENTITY_NOT_FOUND,
  TransitionOutcomeKind.CANCELLED
]);
