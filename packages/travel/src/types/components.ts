/**
 * Component type names and shapes the travel core looks for on scene objects
 */

import * as THREE from 'three';
import { isRecord } from '@waystone/shared';

/** Components that mark an object as the controllable player */
export const PLAYER_ROLE_COMPONENTS = ['LocalPlayer', 'PlayerCharacter', 'PlayerEntity', 'PlayerController'] as const;

/** Inventory-like components that may hold the currency */
export const INVENTORY_COMPONENTS = ['CharacterInventory', 'PlayerInventory', 'Inventory'] as const;

export const RIGID_BODY_COMPONENT = 'RigidBody';
export const COLLIDER_COMPONENT = 'Collider';

export interface RigidBodyComponent {
  velocity: THREE.Vector3;
  angularVelocity: THREE.Vector3;
}

export interface ColliderComponent {
  isTrigger: boolean;
}

export interface InventorySlot {
  itemId: string;
  name?: string;
  quantity: number;
}

export function isRigidBody(value: unknown): value is RigidBodyComponent {
  return isRecord(value)
    && value.velocity instanceof THREE.Vector3
    && value.angularVelocity instanceof THREE.Vector3;
}

export function isCollider(value: unknown): value is ColliderComponent {
  return isRecord(value) && typeof value.isTrigger === 'boolean';
}

export function isInventorySlot(value: unknown): value is InventorySlot {
  return isRecord(value)
    && typeof value.itemId === 'string'
    && typeof value.quantity === 'number'
    && (value.name === undefined || typeof value.name === 'string');
}
