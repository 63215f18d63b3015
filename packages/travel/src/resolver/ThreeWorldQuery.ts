import type * as THREE from 'three';
import { getTag, hasComponent, type World } from '@waystone/shared';
import type { WorldQuery } from '../types/collaborators';

/**
 * WorldQuery over the world's active three.js scene and camera.
 * Reads world.scene on every call since scene activation replaces it.
 */
export class ThreeWorldQuery implements WorldQuery {
  constructor(private world: World) {}

  *liveObjects(): Iterable<THREE.Object3D> {
    const stack: THREE.Object3D[] = [...this.world.scene.children].reverse();
    while (stack.length > 0) {
      const object = stack.pop();
      if (!object) break;
      yield object;
      for (let i = object.children.length - 1; i >= 0; i--) {
        stack.push(object.children[i]);
      }
    }
  }

  componentOwners(typeName: string): THREE.Object3D[] {
    const owners: THREE.Object3D[] = [];
    for (const object of this.liveObjects()) {
      if (hasComponent(object, typeName)) owners.push(object);
    }
    return owners;
  }

  findWithTag(tag: string): THREE.Object3D | null {
    for (const object of this.liveObjects()) {
      if (getTag(object) === tag) return object;
    }
    return null;
  }

  findByName(name: string): THREE.Object3D | null {
    for (const object of this.liveObjects()) {
      if (object.name === name) return object;
    }
    return null;
  }

  activeSceneRoots(): THREE.Object3D[] {
    return [...this.world.scene.children];
  }

  activeCamera(): THREE.Object3D | null {
    return this.world.camera;
  }
}
