/**
 * Unit tests for EntityResolver
 * Tests strategy order, hierarchy roots and character narrowing
 */

import { describe, expect, it } from 'vitest';
import * as THREE from 'three';
import { World, attachComponent, setTag } from '@waystone/shared';
import type { WorldQuery } from '../types/collaborators';
import { EntityResolver, hierarchyRoot } from './EntityResolver';
import { ThreeWorldQuery } from './ThreeWorldQuery';

function named<T extends THREE.Object3D>(object: T, name: string): T {
  object.name = name;
  return object;
}

function setup() {
  const world = new World();
  const resolver = new EntityResolver(new ThreeWorldQuery(world));
  return { world, resolver };
}

describe('EntityResolver', () => {
  it('finds the player by name prefix and returns its hierarchy root', () => {
    const { world, resolver } = setup();
    const party = named(new THREE.Group(), 'Party');
    const player = named(new THREE.Object3D(), 'PlayerChar_Main');
    party.add(player);
    world.scene.add(named(new THREE.Object3D(), 'Terrain'), party);

    const resolved = resolver.resolvePlayer();

    expect(resolved?.strategy).toBe('name-prefix');
    expect(resolved?.object).toBe(party);
  });

  it('matches the prefix case-insensitively', () => {
    const { world, resolver } = setup();
    const player = named(new THREE.Object3D(), 'playerchar');
    world.scene.add(player);

    expect(resolver.resolvePlayer()).toEqual({ object: player, strategy: 'name-prefix' });
  });

  it('skips camera objects that carry the prefix', () => {
    const { world, resolver } = setup();
    world.scene.add(named(new THREE.PerspectiveCamera(), 'PlayerChar_View'));
    world.scene.add(named(new THREE.Object3D(), 'PlayerChar_Cam'));
    const hero = named(new THREE.Object3D(), 'Hero');
    attachComponent(hero, 'PlayerController', {});
    world.scene.add(hero);

    expect(resolver.resolvePlayer()).toEqual({ object: hero, strategy: 'role-component' });
  });

  it('does not mistake names that merely contain cam for cameras', () => {
    const { world, resolver } = setup();
    world.scene.add(named(new THREE.Object3D(), 'PlayerChar_MainCamera'));
    const camper = named(new THREE.Object3D(), 'PlayerChar_Camper');
    world.scene.add(camper);

    expect(resolver.resolvePlayer()).toEqual({ object: camper, strategy: 'name-prefix' });
  });

  it('falls back to the player tag', () => {
    const { world, resolver } = setup();
    const body = named(new THREE.Object3D(), 'Body');
    const root = named(new THREE.Group(), 'Hero');
    root.add(body);
    setTag(body, 'Player');
    world.scene.add(root);

    expect(resolver.resolvePlayer()).toEqual({ object: root, strategy: 'tag' });
  });

  it('falls back to a loose name match in the active scene', () => {
    const { world, resolver } = setup();
    const spawner = named(new THREE.Group(), 'Spawner');
    spawner.add(named(new THREE.Object3D(), 'spawned_PLAYER_proxy'));
    world.scene.add(spawner);

    expect(resolver.resolvePlayer()).toEqual({ object: spawner, strategy: 'scene-keyword' });
  });

  it('falls back to the root of the active camera', () => {
    const { world, resolver } = setup();

    expect(resolver.resolvePlayer()).toEqual({ object: world.rig, strategy: 'camera' });
  });

  it('treats a throwing strategy as a miss', () => {
    const hero = named(new THREE.Object3D(), 'Hero');
    const query: WorldQuery = {
      liveObjects: () => {
        throw new Error('scene graph is being rebuilt');
      },
      componentOwners: (typeName) => (typeName === 'PlayerEntity' ? [hero] : []),
      findWithTag: () => null,
      findByName: () => null,
      activeSceneRoots: () => [],
      activeCamera: () => null
    };

    expect(new EntityResolver(query).resolvePlayer()).toEqual({ object: hero, strategy: 'role-component' });
  });

  it('returns null when no strategy finds anything', () => {
    const query: WorldQuery = {
      liveObjects: () => [],
      componentOwners: () => [],
      findWithTag: () => null,
      findByName: () => null,
      activeSceneRoots: () => [],
      activeCamera: () => null
    };

    expect(new EntityResolver(query).resolvePlayer()).toBeNull();
  });

  it('honours custom naming conventions', () => {
    const { world } = setup();
    const hero = named(new THREE.Object3D(), 'Avatar_7');
    world.scene.add(hero);
    const resolver = new EntityResolver(new ThreeWorldQuery(world), { namePrefix: 'avatar_' });

    expect(resolver.resolvePlayer()).toEqual({ object: hero, strategy: 'name-prefix' });
  });

  describe('resolveActualCharacter', () => {
    it('narrows a container to the prefixed character breadth-first', () => {
      const { resolver } = setup();
      const container = named(new THREE.Group(), 'Rig');
      const deep = named(new THREE.Object3D(), 'Pivot');
      const character = named(new THREE.Object3D(), 'PlayerChar_Body');
      const decoy = named(new THREE.Object3D(), 'PlayerChar_Shadow');
      container.add(deep, character);
      deep.add(decoy);

      expect(resolver.resolveActualCharacter(container)).toBe(character);
    });

    it('narrows to a role component owner', () => {
      const { resolver } = setup();
      const container = named(new THREE.Group(), 'Rig');
      const controller = named(new THREE.Object3D(), 'Driver');
      attachComponent(controller, 'LocalPlayer', {});
      container.add(controller);

      expect(resolver.resolveActualCharacter(container)).toBe(controller);
    });

    it('ignores prefixed cameras and falls back to the root', () => {
      const { resolver } = setup();
      const container = named(new THREE.Group(), 'Rig');
      container.add(named(new THREE.PerspectiveCamera(), 'PlayerChar_View'));

      expect(resolver.resolveActualCharacter(container)).toBe(container);
    });
  });

  describe('hierarchyRoot', () => {
    it('stops below the scene', () => {
      const scene = new THREE.Scene();
      const top = new THREE.Group();
      const leaf = new THREE.Object3D();
      scene.add(top);
      top.add(leaf);

      expect(hierarchyRoot(leaf)).toBe(top);
    });

    it('returns a detached object itself', () => {
      const loose = new THREE.Object3D();

      expect(hierarchyRoot(loose)).toBe(loose);
    });
  });
});
