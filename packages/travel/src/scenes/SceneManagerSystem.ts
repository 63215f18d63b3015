import * as THREE from 'three';
import { System, createConditionalLogger } from '@waystone/shared';
import type { World } from '@waystone/shared';
import type { SceneLoader, SceneLoadHandle } from '../types/collaborators';

const logger = createConditionalLogger('scenes');

/** Progress at which a load waits for activation */
export const ACTIVATION_THRESHOLD = 0.9;

export type SceneFactory = (scene: THREE.Scene, world: World) => void;

export interface SceneRegistration {
  /** Frames a load takes before it can be activated */
  loadFrames?: number;
}

interface SceneDefinition {
  factory: SceneFactory;
  loadFrames: number;
}

interface PendingLoad {
  handle: SceneLoadHandle;
  framesLoaded: number;
  framesRequired: number;
}

/**
 * In-process scene loader: registered scene factories load over a number of
 * frames, stop at the activation threshold, and replace the world scene when
 * activated.
 */
export class SceneManagerSystem extends System implements SceneLoader {
  private definitions = new Map<string, SceneDefinition>();
  private loads = new Map<number, PendingLoad>();
  private nextHandleId = 1;

  registerScene(sceneId: string, factory: SceneFactory, options: SceneRegistration = {}): void {
    const loadFrames = Math.max(0, Math.floor(options.loadFrames ?? 3));
    this.definitions.set(sceneId, { factory, loadFrames });
  }

  get activeLoads(): number {
    return this.loads.size;
  }

  beginLoad(sceneId: string): SceneLoadHandle {
    const definition = this.definitions.get(sceneId);
    if (!definition) {
      throw new Error(`Scene ${sceneId} is not registered`);
    }
    const handle: SceneLoadHandle = { id: this.nextHandleId++, sceneId };
    this.loads.set(handle.id, { handle, framesLoaded: 0, framesRequired: definition.loadFrames });
    logger.debug(`Loading ${sceneId} (handle ${handle.id}, ${definition.loadFrames} frames)`);
    return handle;
  }

  private pendingFor(handle: SceneLoadHandle): PendingLoad {
    const load = this.loads.get(handle.id);
    if (!load) {
      throw new Error(`No pending load for ${handle.sceneId} (handle ${handle.id})`);
    }
    return load;
  }

  progress(handle: SceneLoadHandle): number {
    const load = this.pendingFor(handle);
    if (load.framesRequired === 0) return ACTIVATION_THRESHOLD;
    return Math.min(1, load.framesLoaded / load.framesRequired) * ACTIVATION_THRESHOLD;
  }

  isReadyToActivate(handle: SceneLoadHandle): boolean {
    return this.progress(handle) >= ACTIVATION_THRESHOLD;
  }

  activate(handle: SceneLoadHandle): void {
    if (!this.isReadyToActivate(handle)) {
      throw new Error(`Scene ${handle.sceneId} activated before it finished loading`);
    }
    this.loads.delete(handle.id);
    this.enterScene(handle.sceneId);
  }

  /**
   * Build and switch to a registered scene without a load phase
   */
  enterScene(sceneId: string): THREE.Scene {
    const definition = this.definitions.get(sceneId);
    if (!definition) {
      throw new Error(`Scene ${sceneId} is not registered`);
    }
    const scene = new THREE.Scene();
    scene.name = sceneId;
    definition.factory(scene, this.world);
    this.world.setScene(scene, sceneId);
    logger.info(`Activated scene ${sceneId}`);
    this.emit('scene:activated', { sceneId });
    return scene;
  }

  /**
   * Drop a load that will never be activated
   */
  abandon(handle: SceneLoadHandle): void {
    this.loads.delete(handle.id);
  }

  update(_delta: number): void {
    for (const load of this.loads.values()) {
      if (load.framesLoaded < load.framesRequired) {
        load.framesLoaded++;
      }
    }
  }

  destroy(): void {
    this.loads.clear();
    this.definitions.clear();
    this.removeAllListeners();
    super.destroy();
  }
}
