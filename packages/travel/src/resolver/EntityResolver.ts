/**
 * Player entity resolution
 *
 * The live scene graph is rebuilt on every scene swap, so the player is found
 * fresh for each operation through an ordered chain of heuristics. The first
 * strategy that yields an object wins; a strategy that throws counts as a miss.
 */

import * as THREE from 'three';
import { ErrorSeverity, createConditionalLogger, hasComponent, tryOrNull } from '@waystone/shared';
import type { WorldQuery } from '../types/collaborators';
import { PLAYER_ROLE_COMPONENTS } from '../types/components';
import type { ResolutionStrategy, ResolvedEntity } from '../types/travel-types';

const SYSTEM = 'travel-resolver';
const logger = createConditionalLogger(SYSTEM);

export interface PlayerConventions {
  /** Name prefix of the player object (case-insensitive) */
  namePrefix: string;
  /** Component type names only the player carries */
  roleComponents: readonly string[];
  tag: string;
  /** Looser substring used when scanning the active scene */
  keyword: string;
}

export const DEFAULT_PLAYER_CONVENTIONS: PlayerConventions = {
  namePrefix: 'PlayerChar',
  roleComponents: PLAYER_ROLE_COMPONENTS,
  tag: 'Player',
  keyword: 'player'
};

export type StrategyFn = (query: WorldQuery, conventions: PlayerConventions) => THREE.Object3D | null;

/**
 * Topmost ancestor below the scene itself
 */
export function hierarchyRoot(object: THREE.Object3D): THREE.Object3D {
  let current = object;
  while (current.parent && !(current.parent instanceof THREE.Scene)) {
    current = current.parent;
  }
  return current;
}

// a whole `cam` token or a token ending in `camera`: PlayerChar_Cam, MainCamera
function isCameraLike(object: THREE.Object3D): boolean {
  if (object instanceof THREE.Camera) return true;
  return object.name
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .some((token) => token === 'cam' || token.endsWith('camera'));
}

function matchesPrefix(object: THREE.Object3D, prefix: string): boolean {
  return object.name.toLowerCase().startsWith(prefix.toLowerCase());
}

function findInTree(root: THREE.Object3D, predicate: (object: THREE.Object3D) => boolean): THREE.Object3D | null {
  if (predicate(root)) return root;
  for (const child of root.children) {
    const found = findInTree(child, predicate);
    if (found) return found;
  }
  return null;
}

function hasRoleComponent(object: THREE.Object3D, roleComponents: readonly string[]): boolean {
  return roleComponents.some((typeName) => hasComponent(object, typeName));
}

export const findByNamePrefix: StrategyFn = (query, { namePrefix }) => {
  for (const object of query.liveObjects()) {
    if (isCameraLike(object)) continue;
    if (matchesPrefix(object, namePrefix)) return hierarchyRoot(object);
  }
  return null;
};

export const findByRoleComponent: StrategyFn = (query, { roleComponents }) => {
  for (const typeName of roleComponents) {
    const [owner] = query.componentOwners(typeName);
    if (owner) return hierarchyRoot(owner);
  }
  return null;
};

export const findByTag: StrategyFn = (query, { tag }) => {
  const tagged = query.findWithTag(tag);
  return tagged ? hierarchyRoot(tagged) : null;
};

export const findBySceneKeyword: StrategyFn = (query, { keyword }) => {
  const needle = keyword.toLowerCase();
  for (const root of query.activeSceneRoots()) {
    const match = findInTree(root, (object) => object.name.toLowerCase().includes(needle));
    if (match) return hierarchyRoot(match);
  }
  return null;
};

export const findByActiveCamera: StrategyFn = (query) => {
  const camera = query.activeCamera();
  return camera ? hierarchyRoot(camera) : null;
};

export const RESOLUTION_CHAIN: ReadonlyArray<readonly [ResolutionStrategy, StrategyFn]> = [
  ['name-prefix', findByNamePrefix],
  ['role-component', findByRoleComponent],
  ['tag', findByTag],
  ['scene-keyword', findBySceneKeyword],
  ['camera', findByActiveCamera]
];

export class EntityResolver {
  private conventions: PlayerConventions;

  constructor(
    private query: WorldQuery,
    conventions: Partial<PlayerConventions> = {},
    private chain: ReadonlyArray<readonly [ResolutionStrategy, StrategyFn]> = RESOLUTION_CHAIN
  ) {
    this.conventions = { ...DEFAULT_PLAYER_CONVENTIONS, ...conventions };
  }

  resolvePlayer(): ResolvedEntity | null {
    for (const [strategy, find] of this.chain) {
      const object = tryOrNull(
        () => find(this.query, this.conventions),
        { system: SYSTEM, method: strategy },
        ErrorSeverity.DEBUG
      );
      if (object) {
        logger.debug(`Resolved player '${object.name}' via ${strategy}`);
        return { object, strategy };
      }
    }
    logger.warn('No strategy could locate the player');
    return null;
  }

  /**
   * Narrow a coarse root (which may be a container around the player) down to the
   * object that actually has to move
   */
  resolveActualCharacter(root: THREE.Object3D): THREE.Object3D {
    const found = tryOrNull(() => {
      const queue: THREE.Object3D[] = [root];
      while (queue.length > 0) {
        const next = queue.shift();
        if (!next) break;
        if (matchesPrefix(next, this.conventions.namePrefix) && !isCameraLike(next)) return next;
        if (hasRoleComponent(next, this.conventions.roleComponents)) return next;
        queue.push(...next.children);
      }
      return null;
    }, { system: SYSTEM, method: 'resolveActualCharacter' });

    if (found && found !== root) {
      logger.debug(`Narrowed '${root.name}' to character '${found.name}'`);
    }
    return found ?? root;
  }
}
