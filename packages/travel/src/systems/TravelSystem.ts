import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs-extra';
import * as THREE from 'three';
import { Config, ErrorSeverity, System, createConditionalLogger, logError } from '@waystone/shared';
import type { World, WorldOptions } from '@waystone/shared';
import { CurrencyLedger } from '../currency/CurrencyLedger';
import { DestinationRegistry } from '../destinations/DestinationRegistry';
import { VisitedStore } from '../destinations/VisitedStore';
import { GroundProbe } from '../ground/GroundProbe';
import { ThreeGroundRaycaster } from '../ground/ThreeGroundRaycaster';
import { EntityResolver } from '../resolver/EntityResolver';
import { ThreeWorldQuery } from '../resolver/ThreeWorldQuery';
import { SceneManagerSystem } from '../scenes/SceneManagerSystem';
import { FadeOverlay } from '../transition/FadeOverlay';
import { TransitionOrchestrator } from '../transition/TransitionOrchestrator';
import { WorldFrameScheduler } from '../transition/WorldFrameScheduler';
import type { Destination, TransitionOutcome, TravelOptions } from '../types/travel-types';

const logger = createConditionalLogger('travel-system');

export const BUNDLED_DESTINATIONS_FILE = fileURLToPath(new URL('../../data/destinations.json', import.meta.url));
export const DESTINATIONS_FILE = 'destinations.json';
export const VISITED_FILE = 'visited-destinations.json';

interface SceneChangedEvent {
  sceneId: string | null;
  previousSceneId: string | null;
}

/**
 * Travel System
 *
 * Wires player resolution, the currency ledger, ground probing and scene
 * loading into the world and exposes paid travel to a named destination.
 * A `destinations.json` in the data directory replaces the bundled seeds.
 */
export class TravelSystem extends System {
  readonly scheduler: WorldFrameScheduler;
  readonly overlay: FadeOverlay;
  readonly query: ThreeWorldQuery;
  readonly resolver: EntityResolver;
  readonly groundProbe: GroundProbe;

  private _registry: DestinationRegistry | null = null;
  private _ledger: CurrencyLedger | null = null;
  private _orchestrator: TransitionOrchestrator | null = null;

  constructor(world: World) {
    super(world);
    this.scheduler = new WorldFrameScheduler(world);
    this.overlay = new FadeOverlay(this.scheduler, Config.get().travel.fadeDurationMs);
    this.query = new ThreeWorldQuery(world);
    this.resolver = new EntityResolver(this.query);
    this.groundProbe = new GroundProbe(new ThreeGroundRaycaster(world));
  }

  getDependencies() {
    return { required: ['scenes'] };
  }

  async init(options: WorldOptions): Promise<void> {
    const config = Config.get();
    const dataDir = options.dataDir ?? config.dataDir;

    const scenes = this.world.getSystem('scenes');
    if (!(scenes instanceof SceneManagerSystem)) {
      throw new Error('TravelSystem requires a SceneManagerSystem registered as "scenes"');
    }

    const localSeeds = path.join(dataDir, DESTINATIONS_FILE);
    const seedsFile = fs.pathExistsSync(localSeeds) ? localSeeds : BUNDLED_DESTINATIONS_FILE;
    const store = new VisitedStore(path.join(dataDir, VISITED_FILE));
    this._registry = DestinationRegistry.fromFile(seedsFile, { defaultPrice: config.travel.defaultPrice, store });
    this._ledger = new CurrencyLedger(this.resolver, { currencyItem: config.travel.currencyItem });

    this._orchestrator = new TransitionOrchestrator({
      resolver: this.resolver,
      query: this.query,
      ledger: this._ledger,
      groundProbe: this.groundProbe,
      sceneLoader: scenes,
      registry: this._registry,
      scheduler: this.scheduler,
      overlay: this.overlay,
      settings: config.travel
    });
    this._orchestrator.on('travel:started', (destination) => this.emit('travel:started', destination));
    this._orchestrator.on('travel:state', (state, destination) => this.emit('travel:state', state, destination));
    this._orchestrator.on('travel:finished', (outcome) => this.emit('travel:finished', outcome));

    this.world.on('scene:changed', this.onSceneChanged);
    logger.info(`Loaded ${this._registry.all().length} destinations from ${seedsFile}`);
    await super.init(options);
  }

  get registry(): DestinationRegistry {
    if (!this._registry) throw new Error('TravelSystem used before init');
    return this._registry;
  }

  get ledger(): CurrencyLedger {
    if (!this._ledger) throw new Error('TravelSystem used before init');
    return this._ledger;
  }

  get orchestrator(): TransitionOrchestrator {
    if (!this._orchestrator) throw new Error('TravelSystem used before init');
    return this._orchestrator;
  }

  listDestinations(): Destination[] {
    return this.registry.list();
  }

  travelTo(name: string, options?: TravelOptions): Promise<TransitionOutcome> {
    return this.orchestrator.attemptTravel(name, options);
  }

  cancel(): boolean {
    return this.orchestrator.cancel();
  }

  flush(): Promise<void> {
    return this.registry.flush();
  }

  private onSceneChanged = ({ sceneId }: SceneChangedEvent): void => {
    // trips mark their own destination on arrival
    if (!sceneId || this._orchestrator?.inProgress) return;
    const entity = this.resolver.resolvePlayer();
    const position = entity
      ? this.resolver.resolveActualCharacter(entity.object).getWorldPosition(new THREE.Vector3())
      : null;
    this.registry.recordArrival(sceneId, position);
  };

  update(_delta: number): void {
    this.scheduler.tick();
  }

  destroy(): void {
    this.world.off('scene:changed', this.onSceneChanged);
    this._registry?.flush().catch((error: unknown) => {
      logError('Flushing visited destinations failed', error, { system: 'travel-system', method: 'destroy' }, ErrorSeverity.WARNING);
    });
    this.removeAllListeners();
    super.destroy();
  }
}
