/**
 * Shared TypeScript types
 *
 * Data model of the schema catalog plus the collaborator contracts the core
 * talks to (metadata provider, query executor, record writer, snapshot store).
 */

// === Schema Types ===

/**
 * Normalized metadata for one field of one object.
 */
export interface FieldDescriptor {
  /** API name, unique within its object */
  name: string;
  /** Human-readable label; equals `name` when the source has none */
  label: string;
  /** Salesforce field type (e.g. 'string', 'reference', 'picklist') */
  type: string;
  /** Target object of a reference field; only the first target of a polymorphic lookup is kept */
  reference: string | null;
  length: number | null;
  /** Picklist option values in provider order; empty for non-picklists */
  picklistValues: string[];
}

/**
 * Field name → descriptor for one object. Iteration order is the order the
 * source returned the fields in.
 */
export type ObjectSchema = Map<string, FieldDescriptor>;

/**
 * Field metadata as returned by a describe call. Only the properties the
 * catalog reads are listed; everything may be missing.
 */
export interface RawFieldMetadata {
  name?: string | null;
  label?: string | null;
  type?: string | null;
  referenceTo?: string[] | null;
  length?: number | null;
  picklistValues?: Array<{ value: string }> | null;
}

// === Record Types ===

/**
 * A record as returned by a query: field name → value. Once references are
 * resolved, relationship keys hold nested records.
 */
export type SObjectRecord = Record<string, unknown>;

export interface SaveResult {
  id: string;
  success: boolean;
  errors: string[];
}

// === Collaborator Contracts ===

export interface MetadataProvider {
  /** Raw field metadata of one object. Rejects when the object cannot be described. */
  describe(objectApiName: string): Promise<RawFieldMetadata[]>;
  /** Every object name the org exposes; empty on failure. */
  listObjectNames(): Promise<string[]>;
}

export interface QueryExecutor {
  /** All records matching a SOQL query, in provider order; empty on failure. */
  execute(soql: string): Promise<SObjectRecord[]>;
}

export interface RecordWriter {
  /** Create one record; null on failure. */
  create(objectApiName: string, data: SObjectRecord): Promise<SaveResult | null>;
}

/**
 * One persisted snapshot as found by a store. Either its raw entries or the
 * reason it could not be read.
 */
export type SnapshotListing =
  | { objectName: string; entries: unknown[] }
  | { objectName: string; error: Error };

export interface SnapshotStore {
  write(objectName: string, fields: FieldDescriptor[]): Promise<void>;
  listAvailable(): Promise<SnapshotListing[]>;
}

// === Catalog Load Types ===

export type SchemaSource =
  | {
      mode: 'live';
      provider: MetadataProvider;
      /** Persist every loaded schema as a snapshot */
      persistTo?: SnapshotStore;
    }
  | {
      mode: 'snapshot';
      store: SnapshotStore;
    };

export interface LoadOptions {
  /** Objects to load. Live mode loads every object the provider lists when omitted or empty. */
  names?: string[];
  source: SchemaSource;
}

export interface LoadSummary {
  loaded: string[];
  failed: string[];
}
