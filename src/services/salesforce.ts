/**
 * Salesforce Service - jsforce-backed collaborators
 *
 * Implements the metadata provider, query executor and record writer
 * contracts over one jsforce Connection. Apart from `describe`, failures are
 * logged and turned into empty results.
 */

import { Connection } from 'jsforce';
import { isRetryableError, retryWithBackoff } from '../core/concurrency.js';
import { SalesforceApiError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type {
  MetadataProvider,
  QueryExecutor,
  RawFieldMetadata,
  RecordWriter,
  SaveResult,
  SObjectRecord,
} from '../core/types.js';

const log = createLogger('salesforce');

/**
 * Drop the `attributes` envelope jsforce adds to every record.
 */
function flattenRecord(record: Record<string, unknown>): SObjectRecord {
  return Object.fromEntries(Object.entries(record).filter(([key]) => key !== 'attributes'));
}

export class SalesforceService implements MetadataProvider, QueryExecutor, RecordWriter {
  constructor(readonly conn: Connection) {}

  /**
   * Raw field metadata of one object.
   *
   * @throws SalesforceApiError when the object cannot be described
   */
  async describe(objectApiName: string): Promise<RawFieldMetadata[]> {
    try {
      const result = await retryWithBackoff(() => this.conn.describe(objectApiName), {
        shouldRetry: isRetryableError,
        onRetry: (err, attempt, delayMs) =>
          log.warn({ err, objectApiName, attempt, delayMs }, 'Retrying describe'),
      });

      return (result.fields ?? []).map((field) => ({
        name: field.name,
        label: field.label,
        type: field.type,
        referenceTo: field.referenceTo ?? null,
        length: field.length,
        picklistValues: (field.picklistValues ?? []).map((pv) => ({ value: pv.value })),
      }));
    } catch (error) {
      throw new SalesforceApiError(
        `Failed to describe ${objectApiName}: ${error instanceof Error ? error.message : String(error)}`,
        'describe',
        error instanceof Error ? error : undefined
      );
    }
  }

  async listObjectNames(): Promise<string[]> {
    try {
      const result = await this.conn.describeGlobal();
      return result.sobjects.map((obj) => obj.name);
    } catch (err) {
      log.error({ err }, 'Error retrieving all Salesforce objects');
      return [];
    }
  }

  /**
   * Run a SOQL query and follow `nextRecordsUrl` until every page is read.
   */
  async execute(soql: string): Promise<SObjectRecord[]> {
    try {
      let page = await this.conn.query(soql);
      const records = page.records.map(flattenRecord);

      while (!page.done && page.nextRecordsUrl) {
        page = await this.conn.queryMore(page.nextRecordsUrl);
        records.push(...page.records.map(flattenRecord));
      }
      return records;
    } catch (err) {
      log.error({ err, soql }, 'Error running SOQL query');
      return [];
    }
  }

  async create(objectApiName: string, data: SObjectRecord): Promise<SaveResult | null> {
    try {
      const result = await this.conn.sobject(objectApiName).create(data);
      if (!result.success) {
        const errors = result.errors.map((e) => (typeof e === 'string' ? e : e.message));
        log.error({ objectApiName, errors }, 'Record creation rejected');
        return { id: result.id ?? '', success: false, errors };
      }
      return { id: result.id ?? '', success: true, errors: [] };
    } catch (err) {
      log.error({ err, objectApiName }, 'Error creating record');
      return null;
    }
  }
}
