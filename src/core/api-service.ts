/**
 * API Service - Core Business Logic Layer
 *
 * The one entry point consumers use. It owns the schema catalog for the
 * lifetime of the process and wires the record service and the reference
 * resolver to one set of Salesforce collaborators.
 */

import type { AppConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { SchemaCatalog } from '../services/schema-catalog.js';
import { RecordService } from '../services/record-service.js';
import { ReferenceResolver } from '../services/reference-resolver.js';
import { buildSelect } from '../services/query-builder.js';
import { SalesforceService } from '../services/salesforce.js';
import { establishSession } from '../services/session.js';
import { YamlSnapshotStore } from '../services/snapshot-store.js';
import { createLogger } from './logger.js';
import type {
  LoadSummary,
  MetadataProvider,
  ObjectSchema,
  QueryExecutor,
  RecordWriter,
  SaveResult,
  SObjectRecord,
} from './types.js';

const log = createLogger('api-service');

export interface Collaborators {
  metadata: MetadataProvider;
  executor: QueryExecutor;
  writer?: RecordWriter;
}

export interface SchemaLoadRequest {
  /** Objects to load; every object of the org when omitted */
  names?: string[];
  /** Load from snapshots in this directory instead of describing live */
  snapshotDir?: string;
  /** When loading live, persist each schema as a snapshot in this directory */
  persistDir?: string;
}

export class ApiService {
  readonly catalog = new SchemaCatalog();
  private readonly records: RecordService;
  private readonly resolver: ReferenceResolver;

  private constructor(private readonly collaborators: Collaborators) {
    this.records = new RecordService(this.catalog, collaborators.executor, collaborators.writer);
    this.resolver = new ReferenceResolver(this.catalog, this.records);
  }

  /**
   * Build a service around injected collaborators.
   */
  static fromCollaborators(collaborators: Collaborators): ApiService {
    return new ApiService(collaborators);
  }

  /**
   * Connect to Salesforce with the configured credentials.
   * Nothing works without a session, so a failure here ends the process.
   */
  static async connect(config: AppConfig = loadConfig()): Promise<ApiService> {
    try {
      const conn = await establishSession(config);
      const salesforce = new SalesforceService(conn);
      return new ApiService({ metadata: salesforce, executor: salesforce, writer: salesforce });
    } catch (err) {
      log.fatal({ err }, 'Error connecting to Salesforce');
      process.exit(1);
    }
  }

  /**
   * Populate the schema catalog, live or from snapshots.
   *
   * @example
   * // every object, live, cached to ./cache
   * await api.loadSchema({ persistDir: './cache' });
   * // Account only, from the cache
   * await api.loadSchema({ names: ['Account'], snapshotDir: './cache' });
   */
  async loadSchema(request: SchemaLoadRequest = {}): Promise<LoadSummary> {
    if (request.snapshotDir) {
      return this.catalog.load({
        names: request.names,
        source: { mode: 'snapshot', store: new YamlSnapshotStore(request.snapshotDir) },
      });
    }

    return this.catalog.load({
      names: request.names,
      source: {
        mode: 'live',
        provider: this.collaborators.metadata,
        persistTo: request.persistDir ? new YamlSnapshotStore(request.persistDir) : undefined,
      },
    });
  }

  getFields(objectName: string): ObjectSchema | undefined {
    return this.catalog.getFields(objectName);
  }

  getReferenceFields(objectName: string): ObjectSchema {
    return this.catalog.getReferenceFields(objectName);
  }

  /**
   * SOQL selecting every known field of an object. The WHERE fragment is
   * used verbatim and must come from a trusted source.
   */
  buildSelect(objectName: string, where?: string): string | null {
    return buildSelect(this.catalog, objectName, where);
  }

  getObject(objectName: string, where?: string): Promise<SObjectRecord[]> {
    return this.records.getObject(objectName, where);
  }

  getObjectById(objectName: string, id: string): Promise<SObjectRecord | null> {
    return this.records.getObjectById(objectName, id);
  }

  resolveReferences<T extends SObjectRecord>(
    record: T,
    objectName: string,
    allowedFields?: readonly string[]
  ): Promise<T> {
    return this.resolver.resolve(record, objectName, allowedFields);
  }

  createObject(objectName: string, data: SObjectRecord): Promise<SaveResult | null> {
    return this.records.createObject(objectName, data);
  }
}
