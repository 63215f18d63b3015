/**
 * Transition Orchestrator
 *
 * Drives one paid trip at a time:
 *   Idle -> Charging -> (StagingLoad) -> DestinationLoading -> Placing -> Done
 *
 * The price is taken before any scene load. Every failure after that point is
 * a discrepancy that the refund policy settles. A destination's named anchor,
 * when the loaded scene has one, is preferred over its coordinates.
 */

import EventEmitter from 'eventemitter3';
import * as THREE from 'three';
import {
  ErrorSeverity,
  createConditionalLogger,
  formatVector3,
  getComponent,
  logError,
  toError,
  tupleToVector3,
  vector3ToTuple,
  type RefundPolicy,
  type Vec3Tuple
} from '@waystone/shared';
import type { CurrencyLedger, ChargeReceipt } from '../currency/CurrencyLedger';
import type { DestinationRegistry } from '../destinations/DestinationRegistry';
import type { GroundProbe } from '../ground/GroundProbe';
import type { EntityResolver } from '../resolver/EntityResolver';
import type { FrameScheduler, SceneLoadHandle, SceneLoader, ScreenOverlay, WorldQuery } from '../types/collaborators';
import { RIGID_BODY_COMPONENT, isRigidBody } from '../types/components';
import {
  DISCREPANCY_OUTCOMES,
  TransitionOutcomeKind,
  TransitionState,
  type Destination,
  type ResolvedEntity,
  type StageTiming,
  type TransitionDiagnostics,
  type TransitionOutcome,
  type TransitionRequest,
  type TravelOptions
} from '../types/travel-types';

const SYSTEM = 'travel';
const logger = createConditionalLogger(SYSTEM);

export interface OrchestratorSettings {
  useTransitionScene: boolean;
  transitionSceneId: string;
  loadTimeoutMs: number;
  refundPolicy: RefundPolicy;
}

export interface TransitionOrchestratorDeps {
  resolver: EntityResolver;
  query: WorldQuery;
  ledger: CurrencyLedger;
  groundProbe: GroundProbe;
  sceneLoader: SceneLoader;
  registry: DestinationRegistry;
  scheduler: FrameScheduler;
  overlay: ScreenOverlay;
  settings: OrchestratorSettings;
}

export interface TravelEvents {
  'travel:started': [destination: string];
  'travel:state': [state: TransitionState, destination: string];
  'travel:finished': [outcome: TransitionOutcome];
}

interface Attempt {
  name: string;
  diagnostics: TransitionDiagnostics;
  request: TransitionRequest | null;
  receipt: ChargeReceipt | null;
}

export class TransitionOrchestrator extends EventEmitter<TravelEvents> {
  private _state = TransitionState.IDLE;
  private _inProgress = false;
  private cancelRequested = false;

  constructor(private deps: TransitionOrchestratorDeps) {
    super();
  }

  get state(): TransitionState {
    return this._state;
  }

  get inProgress(): boolean {
    return this._inProgress;
  }

  get settings(): OrchestratorSettings {
    return this.deps.settings;
  }

  /**
   * Ask the running attempt to stop before the player is moved
   */
  cancel(): boolean {
    if (!this._inProgress) return false;
    this.cancelRequested = true;
    return true;
  }

  async attemptTravel(name: string, options: TravelOptions = {}): Promise<TransitionOutcome> {
    const attempt: Attempt = { name, diagnostics: { timings: [] }, request: null, receipt: null };

    if (this._inProgress) {
      logger.warn(`Travel to ${name} rejected: another transition is in progress`);
      return this.outcome(attempt, TransitionOutcomeKind.BUSY, 'another transition is in progress');
    }

    this._inProgress = true;
    this.cancelRequested = false;

    let outcome: TransitionOutcome;
    try {
      this.emit('travel:started', name);
      outcome = await this.run(attempt, options);
    } catch (error) {
      logError(`Transition to ${name} failed`, error, { system: SYSTEM, method: 'attemptTravel' }, ErrorSeverity.ERROR);
      attempt.diagnostics.error = toError(error).message;
      outcome = this.outcome(attempt, TransitionOutcomeKind.LOAD_FAILED, toError(error).message);
    }

    try {
      if (attempt.receipt && DISCREPANCY_OUTCOMES.has(outcome.kind)) {
        this.settleDiscrepancy(attempt, outcome);
      }
    } finally {
      this.cancelRequested = false;
      this._inProgress = false;
      try {
        this.deps.overlay.clear();
        this.setState(TransitionState.DONE, name);
      } finally {
        this.setState(TransitionState.IDLE, name);
      }
    }

    this.report(outcome);
    this.emit('travel:finished', outcome);
    return outcome;
  }

  private async run(attempt: Attempt, options: TravelOptions): Promise<TransitionOutcome> {
    const { registry, resolver, ledger, overlay, settings } = this.deps;

    const destination = registry.get(attempt.name);
    if (!destination || !registry.isAvailable(destination)) {
      return this.outcome(attempt, TransitionOutcomeKind.UNAVAILABLE, destination ? 'destination is locked' : 'unknown destination');
    }
    attempt.name = destination.name;

    const coordinates = destination.coordinates ?? options.coordinates ?? null;
    if (!coordinates) {
      return this.outcome(attempt, TransitionOutcomeKind.MISSING_COORDINATES, 'destination has no arrival point');
    }

    this.setState(TransitionState.CHARGING, attempt.name);
    if (this.isCancelled(options.signal)) {
      return this.outcome(attempt, TransitionOutcomeKind.CANCELLED, 'cancelled before charging');
    }

    const entity = resolver.resolvePlayer();
    const price = registry.priceOf(destination);
    const request: TransitionRequest = {
      destination,
      entity,
      price,
      staged: destination.sceneId !== null && (options.staged ?? settings.useTransitionScene),
      coordinates,
      signal: options.signal
    };
    attempt.request = request;

    if (!entity) {
      return this.outcome(attempt, TransitionOutcomeKind.ENTITY_NOT_FOUND, 'player not found; nothing was charged');
    }
    attempt.diagnostics.resolutionStrategy = entity.strategy;

    const charge = ledger.tryCharge(entity, price);
    if (charge.status === 'insufficient-funds') {
      return this.outcome(
        attempt,
        TransitionOutcomeKind.INSUFFICIENT_FUNDS,
        `costs ${price}, player holds ${charge.available}`
      );
    }
    if (charge.status === 'detection-failed') {
      return this.outcome(attempt, TransitionOutcomeKind.DETECTION_FAILED, charge.reason);
    }
    attempt.receipt = charge;
    attempt.diagnostics.currencyCandidate = charge.candidate;
    attempt.diagnostics.charged = charge.amount;

    await overlay.fadeOut();

    if (destination.sceneId !== null) {
      if (request.staged) {
        this.setState(TransitionState.STAGING_LOAD, attempt.name);
        const failed = await this.loadScene(settings.transitionSceneId, 'staging', attempt, options.signal);
        if (failed) return failed;
      }
      this.setState(TransitionState.DESTINATION_LOADING, attempt.name);
      const failed = await this.loadScene(destination.sceneId, 'destination', attempt, options.signal);
      if (failed) return failed;
    }

    if (this.isCancelled(options.signal)) {
      return this.outcome(attempt, TransitionOutcomeKind.CANCELLED, 'cancelled before placing');
    }

    this.setState(TransitionState.PLACING, attempt.name);
    const placed = this.place(destination, coordinates, attempt);
    if (placed.kind === TransitionOutcomeKind.SUCCEEDED) {
      await overlay.fadeIn();
    }
    return placed;
  }

  /**
   * Load a scene through to activation. Resolves to a failure outcome, or null
   * once the scene is active and has had a frame to settle.
   */
  private async loadScene(
    sceneId: string,
    stage: StageTiming['stage'],
    attempt: Attempt,
    signal?: AbortSignal
  ): Promise<TransitionOutcome | null> {
    const { sceneLoader, scheduler, settings } = this.deps;
    const startedAt = scheduler.now();
    let handle: SceneLoadHandle | null = null;
    let activated = false;

    try {
      handle = sceneLoader.beginLoad(sceneId);
      while (!sceneLoader.isReadyToActivate(handle)) {
        if (this.isCancelled(signal)) {
          return this.outcome(attempt, TransitionOutcomeKind.CANCELLED, `cancelled while loading ${sceneId}`);
        }
        const elapsed = scheduler.now() - startedAt;
        if (elapsed >= settings.loadTimeoutMs) {
          const progress = sceneLoader.progress(handle);
          return this.outcome(
            attempt,
            TransitionOutcomeKind.LOAD_FAILED,
            `timed out loading ${sceneId} after ${Math.round(elapsed)}ms at ${Math.round(progress * 100)}%`
          );
        }
        await scheduler.nextFrame();
      }
      sceneLoader.activate(handle);
      activated = true;
      await scheduler.nextFrame();
    } catch (error) {
      logError(`Loading ${sceneId} failed`, error, { system: SYSTEM, method: 'loadScene' }, ErrorSeverity.ERROR);
      attempt.diagnostics.error = toError(error).message;
      return this.outcome(attempt, TransitionOutcomeKind.LOAD_FAILED, `could not load ${sceneId}: ${toError(error).message}`);
    } finally {
      if (handle && !activated) {
        sceneLoader.abandon(handle);
        logger.debug(`Abandoned load of ${sceneId} (handle ${handle.id})`);
      }
    }

    const elapsedMs = scheduler.now() - startedAt;
    attempt.diagnostics.timings.push({ stage, sceneId, elapsedMs });
    logger.debug(`${stage} scene ${sceneId} ready after ${Math.round(elapsedMs)}ms`);
    return null;
  }

  private place(destination: Destination, coordinates: Vec3Tuple, attempt: Attempt): TransitionOutcome {
    const { resolver, groundProbe, registry } = this.deps;

    const entity = resolver.resolvePlayer();
    if (!entity) {
      return this.outcome(attempt, TransitionOutcomeKind.ENTITY_NOT_FOUND, 'player not found after loading');
    }
    attempt.diagnostics.placementStrategy = entity.strategy;
    const character = resolver.resolveActualCharacter(entity.object);

    const body = getComponent(character, RIGID_BODY_COMPONENT);
    if (isRigidBody(body)) {
      body.velocity.set(0, 0, 0);
      body.angularVelocity.set(0, 0, 0);
    }

    const anchor = destination.anchorName ? this.deps.query.findByName(destination.anchorName) : null;
    const requested = anchor ? anchor.getWorldPosition(new THREE.Vector3()) : tupleToVector3(coordinates);
    if (anchor) attempt.diagnostics.anchor = anchor.name;
    const probe = groundProbe.probe(requested, character);
    const target = probe.success ? probe.position : groundProbe.ensureClearance(requested);

    const local = target.clone();
    if (character.parent) {
      character.parent.updateMatrixWorld(true);
      character.parent.worldToLocal(local);
    }
    character.position.copy(local);
    character.updateMatrixWorld(true);

    attempt.diagnostics.placedAt = vector3ToTuple(target);
    attempt.diagnostics.grounded = probe.success;
    logger.debug(`Placed '${character.name}' at ${formatVector3(target)} (${probe.method})`);

    registry.markVisited(destination.name, destination.coordinates ? undefined : vector3ToTuple(requested));
    return this.outcome(attempt, TransitionOutcomeKind.SUCCEEDED);
  }

  private settleDiscrepancy(attempt: Attempt, outcome: TransitionOutcome): void {
    const receipt = attempt.receipt;
    if (!receipt) return;

    if (this.deps.settings.refundPolicy !== 'refund') {
      attempt.diagnostics.refunded = false;
      logger.error(`Discrepancy: charged ${receipt.amount} for ${attempt.name} but the trip ended ${outcome.kind}; no refund issued`);
      return;
    }

    const entity: ResolvedEntity | null = this.deps.resolver.resolvePlayer() ?? attempt.request?.entity ?? null;
    const refunded = entity !== null && this.deps.ledger.refund(entity, receipt);
    attempt.diagnostics.refunded = refunded;
    if (refunded) {
      logger.warn(`Refunded ${receipt.amount} for ${attempt.name} after ${outcome.kind}`);
    } else {
      logger.error(`Discrepancy: refund of ${receipt.amount} for ${attempt.name} failed after ${outcome.kind}`);
    }
  }

  private isCancelled(signal?: AbortSignal): boolean {
    return this.cancelRequested || signal?.aborted === true;
  }

  private setState(state: TransitionState, destination: string): void {
    if (this._state === state) return;
    this._state = state;
    this.emit('travel:state', state, destination);
  }

  private outcome(attempt: Attempt, kind: TransitionOutcomeKind, reason?: string): TransitionOutcome {
    return { kind, destination: attempt.name, reason, diagnostics: attempt.diagnostics };
  }

  private report(outcome: TransitionOutcome): void {
    const suffix = outcome.reason ? `: ${outcome.reason}` : '';
    if (outcome.kind === TransitionOutcomeKind.SUCCEEDED) {
      logger.info(`Arrived at ${outcome.destination}`);
    } else {
      logger.warn(`Travel to ${outcome.destination} ended ${outcome.kind}${suffix}`);
    }
  }
}
