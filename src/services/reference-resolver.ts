/**
 * Reference Resolver
 *
 * Replaces lookup Ids on a record with the referenced records themselves,
 * embedded under the relationship key (`Parent__c` → `Parent__r`,
 * `OwnerId` → `Owner`).
 *
 * Resolution is single level: embedded records keep their own lookup Ids
 * unresolved, so schemas with reference cycles (A → B → A, or an object
 * pointing to itself) always terminate after one fetch per populated field.
 * Going deeper would need a depth limit and a visited set keyed by
 * (object, Id).
 */

import { createLogger } from '../core/logger.js';
import type { SObjectRecord } from '../core/types.js';
import type { RecordService } from './record-service.js';
import type { SchemaCatalog } from './schema-catalog.js';

const log = createLogger('reference-resolver');

/**
 * Key under which the record referenced by `fieldName` is embedded.
 */
export function relationshipKey(fieldName: string): string {
  if (fieldName.endsWith('__c')) {
    return `${fieldName.slice(0, -3)}__r`;
  }
  if (fieldName.endsWith('Id') && fieldName.length > 2) {
    return fieldName.slice(0, -2);
  }
  return `${fieldName}__r`;
}

export class ReferenceResolver {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly records: RecordService
  ) {}

  /**
   * Embed the records referenced by `record`'s lookup fields.
   *
   * The record is updated in place and returned. Original keys are never
   * changed. A field whose target cannot be fetched is left unresolved
   * without affecting the others.
   *
   * @param allowedFields - Only resolve these reference fields
   */
  async resolve<T extends SObjectRecord>(
    record: T,
    objectName: string,
    allowedFields?: readonly string[]
  ): Promise<T> {
    const referenceFields = this.catalog.getReferenceFields(objectName);
    if (referenceFields.size === 0) {
      log.debug({ objectName }, 'No reference fields found for object');
      return record;
    }

    const target: SObjectRecord = record;
    for (const [fieldName, field] of referenceFields) {
      const value = target[fieldName];
      if (value === null || value === undefined || value === '') {
        continue;
      }
      if (allowedFields && !allowedFields.includes(fieldName)) {
        continue;
      }
      if (typeof value !== 'string' || field.reference === null) {
        log.warn({ objectName, fieldName }, 'Reference value is not a record Id');
        continue;
      }

      const referenced = await this.records.getObjectById(field.reference, value);
      if (!referenced) {
        log.warn({ objectName, fieldName, reference: field.reference, id: value }, 'Referenced record not found');
        continue;
      }
      target[relationshipKey(fieldName)] = referenced;
    }

    return record;
  }
}
