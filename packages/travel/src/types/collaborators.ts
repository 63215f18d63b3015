/**
 * Contracts for the collaborators the travel core drives
 */

import type * as THREE from 'three';

/**
 * Read-only view of the live scene graph used by player resolution
 */
export interface WorldQuery {
  /** Every object in the active scene graph */
  liveObjects(): Iterable<THREE.Object3D>;
  /** Objects carrying a component of the given type name */
  componentOwners(typeName: string): THREE.Object3D[];
  findWithTag(tag: string): THREE.Object3D | null;
  /** First live object with exactly this name */
  findByName(name: string): THREE.Object3D | null;
  activeSceneRoots(): THREE.Object3D[];
  activeCamera(): THREE.Object3D | null;
}

export interface SceneLoadHandle {
  readonly id: number;
  readonly sceneId: string;
}

/**
 * Asynchronous scene loading primitive; polled once per frame
 */
export interface SceneLoader {
  beginLoad(sceneId: string): SceneLoadHandle;
  /** Load progress in [0, 1] */
  progress(handle: SceneLoadHandle): number;
  isReadyToActivate(handle: SceneLoadHandle): boolean;
  activate(handle: SceneLoadHandle): void;
  /** Drop a load that will not be activated; unknown handles are ignored */
  abandon(handle: SceneLoadHandle): void;
}

/**
 * Cooperative frame clock; travel suspends only through nextFrame()
 */
export interface FrameScheduler {
  nextFrame(): Promise<void>;
  /** Milliseconds on the frame clock */
  now(): number;
}

export interface GroundHit {
  point: THREE.Vector3;
  objectName: string;
}

export interface GroundRaycaster {
  /**
   * Closest solid (non-trigger) surface straight below origin within maxDistance
   */
  castDown(origin: THREE.Vector3, maxDistance: number, ignore?: THREE.Object3D): GroundHit | null;
}

export interface ScreenOverlay {
  readonly alpha: number;
  fadeOut(): Promise<void>;
  fadeIn(): Promise<void>;
  /** Drop the overlay immediately */
  clear(): void;
}
