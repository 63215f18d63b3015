import * as THREE from 'three';
import { getComponent, type World } from '@waystone/shared';
import type { GroundHit, GroundRaycaster } from '../types/collaborators';
import { COLLIDER_COMPONENT, isCollider } from '../types/components';

function isTrigger(object: THREE.Object3D): boolean {
  const collider = getComponent(object, COLLIDER_COMPONENT);
  return isCollider(collider) && collider.isTrigger;
}

function isDescendantOf(object: THREE.Object3D, ancestor: THREE.Object3D): boolean {
  let current: THREE.Object3D | null = object;
  while (current) {
    if (current === ancestor) return true;
    current = current.parent;
  }
  return false;
}

/**
 * Ray casts against the meshes of the world's active scene
 */
export class ThreeGroundRaycaster implements GroundRaycaster {
  private raycaster = new THREE.Raycaster();
  private direction = new THREE.Vector3(0, -1, 0);

  constructor(private world: World) {}

  castDown(origin: THREE.Vector3, maxDistance: number, ignore?: THREE.Object3D): GroundHit | null {
    const scene = this.world.scene;
    scene.updateMatrixWorld(true);

    this.raycaster.set(origin, this.direction);
    this.raycaster.near = 0;
    this.raycaster.far = maxDistance;

    const hits = this.raycaster.intersectObjects(scene.children, true);
    for (const hit of hits) {
      if (isTrigger(hit.object)) continue;
      if (ignore && isDescendantOf(hit.object, ignore)) continue;
      return { point: hit.point.clone(), objectName: hit.object.name };
    }
    return null;
  }
}
