import EventEmitter from 'eventemitter3';
import * as THREE from './extras/three';
import type { System, SystemConstructor } from './systems/System';
import type { WorldOptions } from './types/index';
import { Config } from './config';
import { createConditionalLogger } from './utils/LoggingConfig';

const logger = createConditionalLogger('world');

export class World extends EventEmitter {

  // Time management
  maxDeltaTime = 1 / 30;
  frame = 0;
  time = 0;

  // Core properties
  id: string;
  systems: System[] = [];
  systemsByName = new Map<string, System>();
  dataDir = '';

  // Three.js objects
  rig: THREE.Object3D;
  camera: THREE.PerspectiveCamera;
  scene: THREE.Scene;
  sceneId: string | null = null;

  // Objects carried over when the active scene is replaced
  private persistent = new Set<THREE.Object3D>();

  constructor() {
    super();

    this.id = `world_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;

    this.rig = new THREE.Object3D();
    this.rig.name = 'CameraRig';
    this.camera = new THREE.PerspectiveCamera(70, 1, 0.2, 1200);
    this.camera.name = 'MainCamera';
    this.rig.add(this.camera);
    this.scene = new THREE.Scene();
  }

  getSystem<T extends System = System>(systemKey: string): T | undefined {
    return this.systemsByName.get(systemKey) as T | undefined;
  }

  register<T extends System>(key: string, SystemClass: new (world: World) => T): T {
    const system = new SystemClass(this);
    this.addSystem(key, system);
    return system;
  }

  addSystem(key: string, system: System): void {
    if (this.systemsByName.has(key)) {
      throw new Error(`System ${key} is already registered`);
    }
    this.systems.push(system);
    this.systemsByName.set(key, system);
  }

  /**
   * Topologically sort systems based on their dependencies
   */
  topologicalSort(systems: System[]): System[] {
    const sorted: System[] = [];
    const visited = new Set<System>();
    const visiting = new Set<System>();

    const systemToName = new Map<System, string>();
    this.systemsByName.forEach((system, name) => {
      systemToName.set(system, name);
    });

    const visit = (system: System) => {
      if (visited.has(system)) return;
      if (visiting.has(system)) {
        const systemName = systemToName.get(system) || system.constructor.name;
        throw new Error(`Circular dependency detected involving system: ${systemName}`);
      }

      visiting.add(system);

      const deps = system.getDependencies();
      if (deps.required) {
        for (const depName of deps.required) {
          const depSystem = this.systemsByName.get(depName);
          if (!depSystem) {
            const systemName = systemToName.get(system) || system.constructor.name;
            throw new Error(`System ${systemName} requires ${depName}, but ${depName} is not registered`);
          }
          visit(depSystem);
        }
      }
      if (deps.optional) {
        for (const depName of deps.optional) {
          const depSystem = this.systemsByName.get(depName);
          if (depSystem) visit(depSystem);
        }
      }

      visiting.delete(system);
      visited.add(system);
      sorted.push(system);
    };

    for (const system of systems) {
      visit(system);
    }

    return sorted;
  }

  async init(options: WorldOptions = {}): Promise<void> {
    this.dataDir = options.dataDir ?? '';
    Config.applyLogging();

    const sortedSystems = this.topologicalSort(this.systems);
    for (const system of sortedSystems) {
      await system.init(options);
    }

    this.start();
  }

  start(): void {
    for (const system of this.systems) {
      system.start();
    }
  }

  tick = (time: number): void => {
    for (const system of this.systems) {
      system.preTick();
    }

    // time arrives in milliseconds, systems work in seconds
    time /= 1000;
    let delta = time - this.time;
    if (delta < 0) delta = 0;
    if (delta > this.maxDeltaTime) {
      delta = this.maxDeltaTime;
    }

    this.frame++;
    this.time = time;

    for (const system of this.systems) {
      system.update(delta);
    }
    for (const system of this.systems) {
      system.lateUpdate(delta);
    }
    for (const system of this.systems) {
      system.postTick();
    }
  };

  /**
   * Keep an object alive across scene replacement
   */
  markPersistent(object: THREE.Object3D): void {
    this.persistent.add(object);
  }

  /**
   * Replace the active scene graph. Everything not marked persistent is torn down
   * with the old scene.
   */
  setScene(scene: THREE.Scene, sceneId: string | null = null): void {
    const previous = this.scene;
    const previousId = this.sceneId;

    for (const object of this.persistent) {
      scene.add(object);
    }
    previous.clear();

    this.scene = scene;
    this.sceneId = sceneId;
    logger.debug(`Active scene ${previousId ?? '<none>'} -> ${sceneId ?? '<none>'}`);
    this.emit('scene:changed', { sceneId, previousSceneId: previousId });
  }

  destroy(): void {
    for (const system of this.systems) {
      system.destroy();
    }
    this.systems = [];
    this.systemsByName.clear();
    this.persistent.clear();
    this.scene.clear();
    this.removeAllListeners();
  }
}

export type { SystemConstructor };
