import * as THREE from 'three';
import { attachComponent, setTag, type World } from '@waystone/shared';
import type { RigidBodyComponent } from '../../types/components';

export interface PlayerFixture {
  root: THREE.Group;
  body: RigidBodyComponent;
  inventory: { silver: number };
}

/**
 * A player the way a level would hold it: a root object with a body mesh,
 * an inventory and a rigid body
 */
export function createPlayer(silver = 500, name = 'PlayerChar_01'): PlayerFixture {
  const root = new THREE.Group();
  root.name = name;

  const mesh = new THREE.Mesh(new THREE.BoxGeometry(1, 2, 1), new THREE.MeshBasicMaterial());
  mesh.name = 'Body';
  mesh.position.y = 1;
  root.add(mesh);

  const inventory = attachComponent(root, 'CharacterInventory', { silver });
  const body = attachComponent(root, 'RigidBody', {
    velocity: new THREE.Vector3(3, -9, 1),
    angularVelocity: new THREE.Vector3(0, 2, 0)
  });
  attachComponent(root, 'LocalPlayer', {});
  setTag(root, 'Player');
  return { root, body, inventory };
}

/**
 * A horizontal plane facing up at the given height
 */
export function createGround(height = 0, name = 'Ground'): THREE.Mesh {
  const ground = new THREE.Mesh(new THREE.PlaneGeometry(2000, 2000), new THREE.MeshBasicMaterial());
  ground.name = name;
  ground.rotation.x = -Math.PI / 2;
  ground.position.y = height;
  ground.updateMatrixWorld(true);
  return ground;
}

/**
 * Swap the world to a fresh scene with ground at the given height
 */
export function replaceScene(world: World, sceneId: string, groundHeight = 0): THREE.Scene {
  const scene = new THREE.Scene();
  scene.name = sceneId;
  scene.add(createGround(groundHeight));
  world.setScene(scene, sceneId);
  return scene;
}
