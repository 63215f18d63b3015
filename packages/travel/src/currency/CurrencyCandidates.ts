/**
 * Currency candidates
 *
 * Each candidate is one plausible place the player's currency can live. They
 * share a read/write capability so the ledger can try them in a fixed order.
 */

import type * as THREE from 'three';
import { getComponentInChildren, isRecord, listComponents } from '@waystone/shared';
import { INVENTORY_COMPONENTS, isInventorySlot, type InventorySlot } from '../types/components';

export interface CurrencyContext {
  character: THREE.Object3D;
  /** Currency identifier, e.g. "Silver" */
  currencyItem: string;
}

export interface CurrencyCandidate {
  readonly name: string;
  /** Current quantity, or null when this storage shape is absent */
  tryRead(ctx: CurrencyContext): number | null;
  /** Store a new quantity; false when the shape is absent or refused the write */
  tryWrite(ctx: CurrencyContext, value: number): boolean;
}

interface FieldLocation {
  record: Record<string, unknown>;
  key: string;
}

function isQuantity(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Own keys plus accessor names declared on the record's class
 */
function readableKeys(record: Record<string, unknown>): string[] {
  const keys = new Set(Object.keys(record));
  const proto: unknown = Object.getPrototypeOf(record);
  if (isRecord(proto) && proto !== Object.prototype) {
    for (const key of Object.getOwnPropertyNames(proto)) {
      if (key !== 'constructor') keys.add(key);
    }
  }
  return [...keys];
}

function componentsInTree(root: THREE.Object3D): unknown[] {
  const found: unknown[] = [];
  root.traverse((object) => {
    for (const [, component] of listComponents(object)) {
      found.push(component);
    }
  });
  return found;
}

function inventoriesOf(character: THREE.Object3D, typeNames: readonly string[]): Record<string, unknown>[] {
  const inventories: Record<string, unknown>[] = [];
  for (const typeName of typeNames) {
    const component = getComponentInChildren(character, typeName);
    if (isRecord(component)) inventories.push(component);
  }
  return inventories;
}

function readField(location: FieldLocation | null): number | null {
  if (!location) return null;
  const value = location.record[location.key];
  return isQuantity(value) ? value : null;
}

function writeField(location: FieldLocation | null, value: number): boolean {
  if (!location) return false;
  location.record[location.key] = value;
  return true;
}

/**
 * A named quantity field on one of the known inventory component types
 */
export class InventoryFieldCandidate implements CurrencyCandidate {
  readonly name = 'inventory-field';

  constructor(
    private fieldNames: readonly string[] = ['silver', 'money', 'coins', 'currency'],
    private inventoryTypes: readonly string[] = INVENTORY_COMPONENTS
  ) {}

  private locate(ctx: CurrencyContext): FieldLocation | null {
    const wanted = new Set([...this.fieldNames, ctx.currencyItem].map((name) => name.toLowerCase()));
    for (const record of inventoriesOf(ctx.character, this.inventoryTypes)) {
      for (const key of readableKeys(record)) {
        if (wanted.has(key.toLowerCase()) && isQuantity(record[key])) {
          return { record, key };
        }
      }
    }
    return null;
  }

  tryRead(ctx: CurrencyContext): number | null {
    return readField(this.locate(ctx));
  }

  tryWrite(ctx: CurrencyContext, value: number): boolean {
    return writeField(this.locate(ctx), value);
  }
}

/**
 * The first inventory slot holding the currency item
 */
export class ItemSlotCandidate implements CurrencyCandidate {
  readonly name = 'item-slot';

  constructor(private inventoryTypes: readonly string[] = INVENTORY_COMPONENTS) {}

  private locate(ctx: CurrencyContext): InventorySlot | null {
    const wanted = ctx.currencyItem.toLowerCase();
    for (const inventory of inventoriesOf(ctx.character, this.inventoryTypes)) {
      const items = inventory.items;
      if (!Array.isArray(items)) continue;
      for (const slot of items) {
        if (!isInventorySlot(slot)) continue;
        if (slot.itemId.toLowerCase() === wanted || slot.name?.toLowerCase() === wanted) {
          return slot;
        }
      }
    }
    return null;
  }

  tryRead(ctx: CurrencyContext): number | null {
    const slot = this.locate(ctx);
    return slot && isQuantity(slot.quantity) ? slot.quantity : null;
  }

  tryWrite(ctx: CurrencyContext, value: number): boolean {
    const slot = this.locate(ctx);
    if (!slot) return false;
    slot.quantity = value;
    return true;
  }
}

/**
 * Last resort: any numeric field on any component whose name mentions the currency
 */
export class NumericFieldCandidate implements CurrencyCandidate {
  readonly name = 'numeric-field';

  private locate(ctx: CurrencyContext): FieldLocation | null {
    const needle = ctx.currencyItem.toLowerCase();
    for (const component of componentsInTree(ctx.character)) {
      if (!isRecord(component)) continue;
      for (const key of readableKeys(component)) {
        if (key.toLowerCase().includes(needle) && isQuantity(component[key])) {
          return { record: component, key };
        }
      }
    }
    return null;
  }

  tryRead(ctx: CurrencyContext): number | null {
    return readField(this.locate(ctx));
  }

  tryWrite(ctx: CurrencyContext, value: number): boolean {
    return writeField(this.locate(ctx), value);
  }
}

export function createDefaultCandidates(): CurrencyCandidate[] {
  return [new InventoryFieldCandidate(), new ItemSlotCandidate(), new NumericFieldCandidate()];
}
