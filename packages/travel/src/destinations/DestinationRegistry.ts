/**
 * Destination Registry
 *
 * Holds every travel destination. Records come from a seed file, get live
 * overrides merged on top and pick up their visited state from the
 * VisitedStore. Records are mutated in place and never removed.
 */

import fs from 'fs-extra';
import type * as THREE from 'three';
import { createConditionalLogger, formatVector3, vector3ToTuple, type Vec3Tuple } from '@waystone/shared';
import type { Destination } from '../types/travel-types';
import {
  DestinationSeedFileSchema,
  DestinationSeedSchema,
  type DestinationOverride,
  type DestinationSeed
} from './schema';
import type { VisitedStore } from './VisitedStore';

const logger = createConditionalLogger('destinations');

export interface DestinationRegistryOptions {
  defaultPrice: number;
  store?: VisitedStore;
  overrides?: Record<string, DestinationOverride>;
}

export class DestinationRegistry {
  private byName = new Map<string, Destination>();
  private defaultPrice: number;
  private store: VisitedStore | null;

  constructor(seeds: DestinationSeed[], options: DestinationRegistryOptions) {
    this.defaultPrice = options.defaultPrice;
    this.store = options.store ?? null;

    for (const seed of seeds) {
      const destination: Destination = DestinationSeedSchema.parse(seed);
      const key = destination.name.toLowerCase();
      if (this.byName.has(key)) {
        throw new Error(`Duplicate destination: ${destination.name}`);
      }
      this.byName.set(key, destination);
    }

    for (const [name, override] of Object.entries(options.overrides ?? {})) {
      this.applyOverride(name, override);
    }

    this.restoreVisited();
  }

  /**
   * Load seeds from a JSON file of the form { "destinations": [...] }
   */
  static fromFile(file: string, options: DestinationRegistryOptions): DestinationRegistry {
    const raw: unknown = fs.readJsonSync(file);
    const parsed = DestinationSeedFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Invalid destination file ${file}: ${issues.join('; ')}`);
    }
    return new DestinationRegistry(parsed.data.destinations, options);
  }

  private restoreVisited(): void {
    if (!this.store) return;
    for (const destination of this.byName.values()) {
      const record = this.store.get(destination.name);
      if (!record) continue;
      destination.visited = destination.visited || record.visited;
      if (!destination.coordinates && record.coordinates) {
        destination.coordinates = record.coordinates;
      }
    }
  }

  get(name: string): Destination | undefined {
    return this.byName.get(name.toLowerCase());
  }

  /** Destinations a player may pick: visited or enabled */
  list(): Destination[] {
    return this.all().filter((destination) => this.isAvailable(destination));
  }

  all(): Destination[] {
    return Array.from(this.byName.values());
  }

  isAvailable(destination: Destination): boolean {
    return destination.visited || destination.enabled;
  }

  priceOf(destination: Destination): number {
    return destination.price ?? this.defaultPrice;
  }

  applyOverride(name: string, override: DestinationOverride): boolean {
    const destination = this.get(name);
    if (!destination) {
      logger.warn(`Override for unknown destination ${name} ignored`);
      return false;
    }
    if (override.enabled !== undefined) destination.enabled = override.enabled;
    if (override.price !== undefined) destination.price = override.price;
    return true;
  }

  /**
   * Mark a destination visited; the given coordinates are kept only when it has none yet
   */
  markVisited(name: string, coordinates?: Vec3Tuple): boolean {
    const destination = this.get(name);
    if (!destination) return false;

    const captured = destination.coordinates ? null : coordinates ?? null;
    if (destination.visited && !captured) return true;

    destination.visited = true;
    if (captured) {
      destination.coordinates = captured;
      const [x, y, z] = captured;
      logger.info(`Captured coordinates for ${destination.name}: ${formatVector3({ x, y, z })}`);
    }
    this.store?.record(destination.name, true, destination.coordinates);
    return true;
  }

  /**
   * Entering a destination's scene discovers it. Returns the destinations
   * that changed.
   */
  recordArrival(sceneId: string, position: THREE.Vector3 | null): Destination[] {
    const changed: Destination[] = [];
    for (const destination of this.byName.values()) {
      if (destination.sceneId !== sceneId) continue;
      const needsCoordinates = !destination.coordinates && position !== null;
      if (destination.visited && !needsCoordinates) continue;

      this.markVisited(destination.name, position ? vector3ToTuple(position) : undefined);
      logger.info(`Discovered ${destination.name} in ${sceneId}`);
      changed.push(destination);
    }
    return changed;
  }

  flush(): Promise<void> {
    return this.store ? this.store.flush() : Promise.resolve();
  }
}
