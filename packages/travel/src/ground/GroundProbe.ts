/**
 * Ground Probe
 * Corrects a travel target onto standable ground with a single downward ray
 */

import * as THREE from 'three';
import {
  ErrorSeverity,
  createConditionalLogger,
  formatVector3,
  tryOrNull,
  type GroundPositionResult
} from '@waystone/shared';
import type { GroundRaycaster } from '../types/collaborators';

const SYSTEM = 'travel-ground';
const logger = createConditionalLogger(SYSTEM);

export const RAY_START_HEIGHT = 5;
export const RAY_MAX_DISTANCE = 50;
export const GROUND_CLEARANCE = 0.1;
export const FLAT_CLEARANCE = 0.5;

export class GroundProbe {
  constructor(private raycaster: GroundRaycaster) {}

  /**
   * Best effort: a miss returns the input point unchanged, which is not a safety guarantee
   */
  groundedPosition(point: THREE.Vector3, ignore?: THREE.Object3D): THREE.Vector3 {
    return this.probe(point, ignore).position;
  }

  probe(point: THREE.Vector3, ignore?: THREE.Object3D): GroundPositionResult {
    const origin = new THREE.Vector3(point.x, point.y + RAY_START_HEIGHT, point.z);
    const hit = tryOrNull(
      () => this.raycaster.castDown(origin, RAY_MAX_DISTANCE, ignore),
      { system: SYSTEM, method: 'probe' },
      ErrorSeverity.WARNING
    );

    if (!hit) {
      logger.info(`No ground below ${formatVector3(point)}; keeping the requested point`);
      return { position: point.clone(), method: 'unchanged', success: false };
    }

    const position = new THREE.Vector3(point.x, hit.point.y + GROUND_CLEARANCE, point.z);
    logger.debug(`Grounded ${formatVector3(point)} onto '${hit.objectName}' at ${formatVector3(position)}`);
    return {
      position,
      method: 'raycast',
      success: true,
      groundHeight: hit.point.y,
      hitObjectName: hit.objectName
    };
  }

  /**
   * Flat lift for points that have no ray-cast ground data at all
   */
  ensureClearance(point: THREE.Vector3): THREE.Vector3 {
    return new THREE.Vector3(point.x, point.y + FLAT_CLEARANCE, point.z);
  }
}
