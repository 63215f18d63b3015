import { Storage, createConditionalLogger, type Vec3Tuple } from '@waystone/shared';
import { VisitedRecordSchema, type VisitedRecord } from './schema';

const logger = createConditionalLogger('visited-store');

/**
 * Persisted visited flags and discovered arrival points, keyed by
 * lower-cased destination name
 */
export class VisitedStore {
  private storage: Storage<unknown>;

  constructor(file: string, saveIntervalMs = 1000) {
    this.storage = new Storage<unknown>(file, saveIntervalMs);
  }

  get path(): string {
    return this.storage.path;
  }

  get(name: string): VisitedRecord | null {
    const key = name.toLowerCase();
    if (!this.storage.has(key)) return null;
    const parsed = VisitedRecordSchema.safeParse(this.storage.get(key));
    if (!parsed.success) {
      logger.warn(`Ignoring malformed visited entry for ${name}`);
      return null;
    }
    return parsed.data;
  }

  record(name: string, visited: boolean, coordinates: Vec3Tuple | null): void {
    const entry: VisitedRecord = { visited, coordinates };
    this.storage.set(name.toLowerCase(), entry);
  }

  names(): string[] {
    return this.storage.keys();
  }

  flush(): Promise<void> {
    return this.storage.flush();
  }
}
