/**
 * Component and tag registry for scene objects.
 *
 * Components are plain objects keyed by a type name, the same way engine
 * components are looked up by type. Entries live in weak maps so a scene
 * that is torn down takes its components with it.
 */

import type * as THREE from 'three';

const components = new WeakMap<THREE.Object3D, Map<string, unknown>>();
const tags = new WeakMap<THREE.Object3D, string>();

export function attachComponent<T extends object>(object: THREE.Object3D, typeName: string, component: T): T {
  let byType = components.get(object);
  if (!byType) {
    byType = new Map();
    components.set(object, byType);
  }
  byType.set(typeName, component);
  return component;
}

export function detachComponent(object: THREE.Object3D, typeName: string): boolean {
  return components.get(object)?.delete(typeName) ?? false;
}

export function getComponent(object: THREE.Object3D, typeName: string): unknown {
  return components.get(object)?.get(typeName);
}

export function hasComponent(object: THREE.Object3D, typeName: string): boolean {
  return components.get(object)?.has(typeName) ?? false;
}

export function listComponents(object: THREE.Object3D): Array<[typeName: string, component: unknown]> {
  const byType = components.get(object);
  return byType ? Array.from(byType.entries()) : [];
}

/**
 * First component of the given type on the object or any descendant (depth-first)
 */
export function getComponentInChildren(object: THREE.Object3D, typeName: string): unknown {
  const own = getComponent(object, typeName);
  if (own !== undefined) return own;
  for (const child of object.children) {
    const found = getComponentInChildren(child, typeName);
    if (found !== undefined) return found;
  }
  return undefined;
}

export function setTag(object: THREE.Object3D, tag: string): void {
  tags.set(object, tag);
}

export function getTag(object: THREE.Object3D): string | undefined {
  return tags.get(object);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
