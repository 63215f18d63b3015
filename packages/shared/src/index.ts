export { World } from './World';
export { System } from './systems/System';
export type { SystemConstructor, SystemDependencies } from './systems/System';
export type { WorldOptions, GroundPositionResult, GroundProbeMethod } from './types/index';

export { default as THREE, tupleToVector3, vector3ToTuple, formatVector3 } from './extras/three';
export type { Vec3Tuple, Vec3Like } from './extras/three';

export {
  attachComponent,
  detachComponent,
  getComponent,
  getComponentInChildren,
  hasComponent,
  listComponents,
  setTag,
  getTag,
  isRecord
} from './components/ComponentStore';

export {
  Config,
  DEFAULT_TRAVEL_SETTINGS,
  RefundPolicySchema,
  WaystoneConfigSchema,
  loadConfiguration
} from './config';
export type { RefundPolicy, TravelSettings, WaystoneConfig } from './config';

export {
  LogLevel,
  configureLogging,
  createConditionalLogger,
  formatLogMessage,
  isLoggingEnabled,
  parseLogLevel,
  resetLogging
} from './utils/LoggingConfig';
export type { LogConfig, LogLevelName, Logger } from './utils/LoggingConfig';

export { ErrorSeverity, logError, toError, tryOrNull } from './utils/ErrorHandling';
export type { ErrorContext } from './utils/ErrorHandling';

export { Storage } from './utils/Storage';
