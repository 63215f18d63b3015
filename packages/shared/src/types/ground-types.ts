/**
 * Ground positioning types
 *
 * Used for ground detection and placing entities on surfaces.
 */

import type * as THREE from 'three';

export type GroundProbeMethod = 'raycast' | 'unchanged';

/**
 * Result of a ground position calculation
 */
export interface GroundPositionResult {
  position: THREE.Vector3;
  method: GroundProbeMethod;
  success: boolean;
  groundHeight?: number;
  hitObjectName?: string;
}
