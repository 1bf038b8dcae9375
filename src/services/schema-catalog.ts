/**
 * Schema Catalog
 *
 * Process-wide cache of object field schemas, held by an explicit context
 * object rather than module state. Populated by `load`, then read by the
 * query builder and the reference resolver.
 *
 * The catalog does no locking. Loads are expected to happen once, before
 * reads, and callers must serialize any reload themselves.
 */

import { createLogger } from '../core/logger.js';
import type {
  FieldDescriptor,
  LoadOptions,
  LoadSummary,
  MetadataProvider,
  ObjectSchema,
  SnapshotStore,
} from '../core/types.js';
import {
  isReferenceField,
  normalizeDescribeField,
  parseSnapshotEntries,
  toObjectSchema,
} from './field-descriptor.js';

const log = createLogger('schema-catalog');

export class SchemaCatalog {
  private schemas = new Map<string, ObjectSchema>();

  /**
   * Populate the catalog from live metadata or from persisted snapshots.
   * Objects already loaded are replaced; other objects are left as they are.
   * Failures are per object: they are logged, listed in `failed`, and never
   * abort the load of the remaining objects.
   */
  async load(options: LoadOptions): Promise<LoadSummary> {
    const { source } = options;
    const names = options.names && options.names.length > 0 ? options.names : undefined;

    if (source.mode === 'live') {
      const objectNames = names ?? (await source.provider.listObjectNames());
      return this.loadLive(objectNames, source.provider, source.persistTo);
    }
    return this.loadSnapshots(source.store, names);
  }

  private async loadLive(
    objectNames: string[],
    provider: MetadataProvider,
    persistTo?: SnapshotStore
  ): Promise<LoadSummary> {
    const summary: LoadSummary = { loaded: [], failed: [] };

    for (const objectName of objectNames) {
      let fields: FieldDescriptor[];
      try {
        const raw = await provider.describe(objectName);
        fields = raw
          .map(normalizeDescribeField)
          .filter((f): f is FieldDescriptor => f !== null);
      } catch (err) {
        log.error({ err, objectName }, 'Object not found or description failed');
        summary.failed.push(objectName);
        continue;
      }

      this.schemas.set(objectName, toObjectSchema(fields));
      summary.loaded.push(objectName);
      log.debug({ objectName, fieldCount: fields.length }, 'Loaded object definition');

      if (persistTo) {
        try {
          await persistTo.write(objectName, fields);
        } catch (err) {
          log.error({ err, objectName }, 'Failed to write object snapshot');
        }
      }
    }

    log.info({ loaded: summary.loaded.length, failed: summary.failed.length }, 'Loaded schemas from Salesforce');
    return summary;
  }

  private async loadSnapshots(store: SnapshotStore, names?: string[]): Promise<LoadSummary> {
    const summary: LoadSummary = { loaded: [], failed: [] };
    const wanted = names ? new Set(names) : undefined;

    for (const listing of await store.listAvailable()) {
      const { objectName } = listing;
      if (wanted && !wanted.has(objectName)) {
        continue;
      }

      if ('error' in listing) {
        log.error({ err: listing.error, objectName }, 'Error loading cached snapshot');
        summary.failed.push(objectName);
        continue;
      }

      try {
        const fields = parseSnapshotEntries(objectName, listing.entries);
        this.schemas.set(objectName, toObjectSchema(fields));
        summary.loaded.push(objectName);
        log.debug({ objectName, fieldCount: fields.length }, 'Loaded cached definition');
      } catch (err) {
        log.error({ err, objectName }, 'Error loading cached snapshot');
        summary.failed.push(objectName);
      }
    }

    log.info({ loaded: summary.loaded.length, failed: summary.failed.length }, 'Loaded schemas from snapshots');
    return summary;
  }

  isLoaded(): boolean {
    return this.schemas.size > 0;
  }

  hasObject(objectName: string): boolean {
    return this.schemas.has(objectName);
  }

  objectNames(): string[] {
    return [...this.schemas.keys()];
  }

  /**
   * Copy of the schema of a loaded object, or undefined when the catalog is
   * empty or the object was never loaded. Changing the copy leaves the
   * catalog untouched.
   */
  getFields(objectName: string): ObjectSchema | undefined {
    if (!this.isLoaded()) {
      log.error({ objectName }, 'Object definitions not loaded. Call load() first.');
      return undefined;
    }

    const schema = this.schemas.get(objectName);
    if (!schema) {
      log.error({ objectName }, 'Object not found in loaded definitions');
      return undefined;
    }
    return new Map(
      [...schema].map(([name, field]) => [name, { ...field, picklistValues: [...field.picklistValues] }])
    );
  }

  /**
   * Reference fields of an object keyed by field name, in schema order.
   */
  getReferenceFields(objectName: string): ObjectSchema {
    const references: ObjectSchema = new Map();
    const schema = this.getFields(objectName);
    if (!schema) {
      return references;
    }

    for (const [name, field] of schema) {
      if (isReferenceField(field)) {
        references.set(name, field);
      }
    }
    return references;
  }
}
