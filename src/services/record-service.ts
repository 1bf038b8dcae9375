/**
 * Record Service
 *
 * Schema-driven record access: every query selects all fields the catalog
 * knows for the object.
 */

import { createLogger } from '../core/logger.js';
import type { QueryExecutor, RecordWriter, SaveResult, SObjectRecord } from '../core/types.js';
import { buildSelect, idPredicate } from './query-builder.js';
import type { SchemaCatalog } from './schema-catalog.js';

const log = createLogger('record-service');

export class RecordService {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly executor: QueryExecutor,
    private readonly writer?: RecordWriter
  ) {}

  /**
   * Records of an object, optionally filtered by a caller-trusted WHERE
   * fragment (without the WHERE keyword). Empty when the schema is missing
   * or nothing matches.
   */
  async getObject(objectName: string, where?: string): Promise<SObjectRecord[]> {
    const query = buildSelect(this.catalog, objectName, where);
    if (!query) {
      log.error({ objectName }, 'Fields for object not found');
      return [];
    }

    log.debug({ query }, 'Running SOQL query');
    return this.executor.execute(query);
  }

  /**
   * The record with the given Id, or null. If several records match, the
   * first one in provider order is returned.
   */
  async getObjectById(objectName: string, id: string): Promise<SObjectRecord | null> {
    const records = await this.getObject(objectName, idPredicate(id));
    return records.length > 0 ? records[0] : null;
  }

  async createObject(objectName: string, data: SObjectRecord): Promise<SaveResult | null> {
    if (!this.writer) {
      log.error({ objectName }, 'No record writer configured');
      return null;
    }

    const result = await this.writer.create(objectName, data);
    if (result?.success) {
      log.info({ objectName, id: result.id }, 'Created record');
    }
    return result;
  }
}
