import { World } from '@waystone/shared';
import { CurrencyLedger } from '../../currency/CurrencyLedger';
import { DestinationRegistry } from '../../destinations/DestinationRegistry';
import type { DestinationSeed } from '../../destinations/schema';
import { GroundProbe } from '../../ground/GroundProbe';
import { ThreeGroundRaycaster } from '../../ground/ThreeGroundRaycaster';
import { EntityResolver, RESOLUTION_CHAIN } from '../../resolver/EntityResolver';
import { ThreeWorldQuery } from '../../resolver/ThreeWorldQuery';
import { FadeOverlay } from '../../transition/FadeOverlay';
import { TransitionOrchestrator, type OrchestratorSettings } from '../../transition/TransitionOrchestrator';
import { createGround, createPlayer, replaceScene, type PlayerFixture } from './fixtures';
import { ManualScheduler } from './ManualScheduler';
import { ScriptedSceneLoader, type ScriptedScene } from './ScriptedSceneLoader';

export const TEST_DESTINATIONS: DestinationSeed[] = [
  { name: 'Harbor Gate', sceneId: 'HarborGate', coordinates: [100, 1.5, -20], price: 150 },
  { name: 'Old Quarry', sceneId: null, coordinates: [8, 2, 14] },
  { name: 'Cinder Ridge', sceneId: 'CinderRidge', coordinates: null, price: 75 },
  { name: 'Saltmarsh', sceneId: 'Saltmarsh', coordinates: [-55, 0.5, -310], enabled: false },
  { name: 'Far Isle', sceneId: null, coordinates: [0, 500, 0], price: 50 }
];

export interface HarnessOptions {
  silver?: number;
  /** Seeds added after TEST_DESTINATIONS */
  destinations?: DestinationSeed[];
  settings?: Partial<OrchestratorSettings>;
  scenes?: Record<string, ScriptedScene>;
  /** Leave the active camera out of player resolution */
  withoutCameraFallback?: boolean;
}

export interface TravelHarness {
  world: World;
  player: PlayerFixture;
  scheduler: ManualScheduler;
  loader: ScriptedSceneLoader;
  registry: DestinationRegistry;
  resolver: EntityResolver;
  ledger: CurrencyLedger;
  overlay: FadeOverlay;
  orchestrator: TransitionOrchestrator;
}

/**
 * Orchestrator wired to a headless world: ground at y=0, one persistent
 * player, scripted scene loads that swap in a fresh grounded scene
 */
export function createHarness(options: HarnessOptions = {}): TravelHarness {
  const world = new World();
  world.scene.add(createGround(0));
  const player = createPlayer(options.silver ?? 500);
  world.scene.add(player.root);
  world.markPersistent(player.root);

  const scheduler = new ManualScheduler();
  const loader = new ScriptedSceneLoader(options.scenes, (sceneId) => {
    replaceScene(world, sceneId);
  });
  const registry = new DestinationRegistry([...TEST_DESTINATIONS, ...(options.destinations ?? [])], {
    defaultPrice: 200
  });
  const chain = options.withoutCameraFallback
    ? RESOLUTION_CHAIN.filter(([strategy]) => strategy !== 'camera')
    : RESOLUTION_CHAIN;
  const query = new ThreeWorldQuery(world);
  const resolver = new EntityResolver(query, {}, chain);
  const ledger = new CurrencyLedger(resolver, { currencyItem: 'Silver' });
  const overlay = new FadeOverlay(scheduler, 0);

  const orchestrator = new TransitionOrchestrator({
    resolver,
    query,
    ledger,
    groundProbe: new GroundProbe(new ThreeGroundRaycaster(world)),
    sceneLoader: loader,
    registry,
    scheduler,
    overlay,
    settings: {
      useTransitionScene: true,
      transitionSceneId: 'LowMemory_TransitionScene',
      loadTimeoutMs: 30000,
      refundPolicy: 'none',
      ...options.settings
    }
  });

  return { world, player, scheduler, loader, registry, resolver, ledger, overlay, orchestrator };
}
