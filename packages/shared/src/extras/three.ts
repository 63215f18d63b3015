import * as THREE_NAMESPACE from 'three';

// Re-export THREE namespace and all named exports
export * from 'three';
// Also export the namespace as default so `import THREE from` reads the same everywhere
export default THREE_NAMESPACE;

export type Vec3Tuple = [number, number, number];

export interface Vec3Like {
  x: number;
  y: number;
  z: number;
}

// Vector3 compatibility utilities
export function tupleToVector3(tuple: Vec3Tuple): THREE_NAMESPACE.Vector3 {
  return new THREE_NAMESPACE.Vector3(tuple[0], tuple[1], tuple[2]);
}

export function vector3ToTuple(v: Vec3Like): Vec3Tuple {
  return [v.x, v.y, v.z];
}

export function formatVector3(v: Vec3Like): string {
  return `(${v.x.toFixed(2)}, ${v.y.toFixed(2)}, ${v.z.toFixed(2)})`;
}
