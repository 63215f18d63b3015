/**
 * Unit tests for World
 * Tests system registration, dependency ordering, ticking and scene replacement
 */

import { describe, expect, it, vi } from 'vitest';
import * as THREE from 'three';
import { World } from './World';
import { Config } from './config';
import { LogLevel, isLoggingEnabled } from './utils/LoggingConfig';
import { System, type SystemDependencies } from './systems/System';

const initOrder: string[] = [];

class AlphaSystem extends System {
  updates: number[] = [];

  override async init(): Promise<void> {
    initOrder.push('alpha');
    this.initialized = true;
  }

  override update(delta: number): void {
    this.updates.push(delta);
  }
}

class BetaSystem extends System {
  override getDependencies(): SystemDependencies {
    return { required: ['alpha'] };
  }

  override async init(): Promise<void> {
    initOrder.push('beta');
    this.initialized = true;
  }
}

class NeedsMissingSystem extends System {
  override getDependencies(): SystemDependencies {
    return { required: ['nowhere'] };
  }
}

describe('World', () => {
  describe('systems', () => {
    it('initializes required dependencies before dependents', async () => {
      initOrder.length = 0;
      const world = new World();
      world.register('beta', BetaSystem);
      world.register('alpha', AlphaSystem);

      await world.init();

      expect(initOrder).toEqual(['alpha', 'beta']);
      expect(world.getSystem<AlphaSystem>('alpha')?.isStarted()).toBe(true);
      expect(world.getSystem<BetaSystem>('beta')?.isStarted()).toBe(true);
    });

    it('applies the configured log level on init', async () => {
      Config.update({ logLevel: 'error' });
      const world = new World();

      await world.init();

      expect(isLoggingEnabled('travel', LogLevel.ERROR)).toBe(true);
      expect(isLoggingEnabled('travel', LogLevel.WARN)).toBe(false);
    });

    it('rejects a system whose required dependency is not registered', async () => {
      const world = new World();
      world.register('broken', NeedsMissingSystem);

      await expect(world.init()).rejects.toThrow('System broken requires nowhere, but nowhere is not registered');
    });

    it('refuses to register the same key twice', () => {
      const world = new World();
      world.register('alpha', AlphaSystem);

      expect(() => world.register('alpha', AlphaSystem)).toThrow('System alpha is already registered');
    });
  });

  describe('tick', () => {
    it('passes delta in seconds, clamped to maxDeltaTime', async () => {
      const world = new World();
      const alpha = world.register('alpha', AlphaSystem);
      await world.init();

      world.tick(10);
      world.tick(20);
      world.tick(1000);

      expect(world.frame).toBe(3);
      expect(alpha.updates[0]).toBeCloseTo(1 / 100);
      expect(alpha.updates[1]).toBeCloseTo(1 / 100);
      expect(alpha.updates[2]).toBeCloseTo(world.maxDeltaTime);
      expect(world.time).toBeCloseTo(1);
    });
  });

  describe('setScene', () => {
    it('carries persistent objects into the new scene and drops the rest', () => {
      const world = new World();
      const player = new THREE.Object3D();
      player.name = 'PlayerChar_1';
      const prop = new THREE.Object3D();
      prop.name = 'Barrel';
      world.scene.add(player, prop);
      world.markPersistent(player);

      const listener = vi.fn();
      world.on('scene:changed', listener);

      const next = new THREE.Scene();
      world.setScene(next, 'Harbor');

      expect(world.scene).toBe(next);
      expect(world.sceneId).toBe('Harbor');
      expect(player.parent).toBe(next);
      expect(prop.parent).toBeNull();
      expect(listener).toHaveBeenCalledWith({ sceneId: 'Harbor', previousSceneId: null });
    });
  });
});
