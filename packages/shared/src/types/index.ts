export type { GroundPositionResult, GroundProbeMethod } from './ground-types';

export interface WorldOptions {
  /** Directory for persisted world data (visited flags, captured coordinates) */
  dataDir?: string;
}
