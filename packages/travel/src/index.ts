export { TravelSystem, BUNDLED_DESTINATIONS_FILE, DESTINATIONS_FILE, VISITED_FILE } from './systems/TravelSystem';
export { SceneManagerSystem, ACTIVATION_THRESHOLD } from './scenes/SceneManagerSystem';
export type { SceneFactory, SceneRegistration } from './scenes/SceneManagerSystem';

export { TransitionOrchestrator } from './transition/TransitionOrchestrator';
export type { OrchestratorSettings, TransitionOrchestratorDeps, TravelEvents } from './transition/TransitionOrchestrator';
export { FadeOverlay } from './transition/FadeOverlay';
export { WorldFrameScheduler } from './transition/WorldFrameScheduler';

export {
  EntityResolver,
  DEFAULT_PLAYER_CONVENTIONS,
  RESOLUTION_CHAIN,
  hierarchyRoot,
  findByNamePrefix,
  findByRoleComponent,
  findByTag,
  findBySceneKeyword,
  findByActiveCamera
} from './resolver/EntityResolver';
export type { PlayerConventions, StrategyFn } from './resolver/EntityResolver';
export { ThreeWorldQuery } from './resolver/ThreeWorldQuery';

export { GroundProbe, RAY_START_HEIGHT, RAY_MAX_DISTANCE, GROUND_CLEARANCE, FLAT_CLEARANCE } from './ground/GroundProbe';
export { ThreeGroundRaycaster } from './ground/ThreeGroundRaycaster';

export { CurrencyLedger } from './currency/CurrencyLedger';
export type { ChargeResult, ChargeReceipt, InsufficientFunds, DetectionFailed, CurrencyLedgerOptions } from './currency/CurrencyLedger';
export {
  InventoryFieldCandidate,
  ItemSlotCandidate,
  NumericFieldCandidate,
  createDefaultCandidates
} from './currency/CurrencyCandidates';
export type { CurrencyCandidate, CurrencyContext } from './currency/CurrencyCandidates';

export { DestinationRegistry } from './destinations/DestinationRegistry';
export type { DestinationRegistryOptions } from './destinations/DestinationRegistry';
export { VisitedStore } from './destinations/VisitedStore';
export {
  DestinationSeedSchema,
  DestinationSeedFileSchema,
  DestinationOverrideSchema,
  VisitedRecordSchema
} from './destinations/schema';
export type { DestinationSeed, DestinationOverride, VisitedRecord } from './destinations/schema';

export * from './types/travel-types';
export * from './types/components';
export type * from './types/collaborators';
