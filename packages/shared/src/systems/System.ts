import EventEmitter from 'eventemitter3';

import type { WorldOptions } from '../types/index';

import type { World } from '../World';

export interface SystemConstructor {
  new (world: World): System;
}

export interface SystemDependencies {
  required?: string[]; // Systems that must be initialized before this one
  optional?: string[]; // Systems that should be initialized if available
}

/**
 * Base class for all world systems
 * Systems manage specific aspects of the world (scenes, travel, overlays, ...)
 */
export abstract class System extends EventEmitter {
  world: World;
  protected initialized: boolean = false;
  protected started: boolean = false;

  constructor(world: World) {
    super();
    this.world = world;
  }

  /**
   * Override this to declare system dependencies
   * Called before initialization to determine init order
   */
  getDependencies(): SystemDependencies {
    return {};
  }

  /**
   * Initialize the system with world options
   * Called once when the world is initialized
   * All required dependencies are guaranteed to be initialized before this is called
   */
  async init(_options: WorldOptions): Promise<void> {
    this.initialized = true;
  }

  /**
   * Start the system
   * Called after ALL systems have been initialized
   */
  start(): void {
    this.started = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Destroy the system and clean up resources
   */
  destroy(): void {
    this.started = false;
    this.initialized = false;
  }

  // Update cycle methods - override as needed in subclasses

  /**
   * Called at the beginning of each frame
   */
  preTick(): void {}

  /**
   * Main update loop
   */
  update(_delta: number): void {}

  /**
   * Late update for camera and final adjustments
   */
  lateUpdate(_delta: number): void {}

  /**
   * Called at the end of each frame
   */
  postTick(): void {}
}
