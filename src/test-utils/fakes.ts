/**
 * In-process stand-ins for the Salesforce collaborators.
 */

import type {
  MetadataProvider,
  QueryExecutor,
  RawFieldMetadata,
  RecordWriter,
  SaveResult,
  SObjectRecord,
} from '../core/types.js';

export class FakeMetadataProvider implements MetadataProvider {
  readonly describeCalls: string[] = [];

  constructor(
    private readonly objects: Record<string, RawFieldMetadata[]>,
    private readonly failing: ReadonlySet<string> = new Set()
  ) {}

  async describe(objectApiName: string): Promise<RawFieldMetadata[]> {
    this.describeCalls.push(objectApiName);
    const fields = this.objects[objectApiName];
    if (!fields || this.failing.has(objectApiName)) {
      throw new Error(`NOT_FOUND: ${objectApiName}`);
    }
    return fields;
  }

  async listObjectNames(): Promise<string[]> {
    return Object.keys(this.objects);
  }
}

/**
 * Answers `SELECT ... FROM <Object> [WHERE Id = '<id>']` from in-memory
 * tables. Any other WHERE clause yields no rows.
 */
export class FakeQueryExecutor implements QueryExecutor {
  readonly queries: string[] = [];

  constructor(private readonly tables: Record<string, SObjectRecord[]>) {}

  async execute(soql: string): Promise<SObjectRecord[]> {
    this.queries.push(soql);
    const match = /FROM (\w+)(?: WHERE (.*))?$/.exec(soql);
    if (!match) {
      return [];
    }

    const rows = this.tables[match[1]] ?? [];
    const where = match[2];
    if (!where) {
      return rows.map((r) => ({ ...r }));
    }

    const idMatch = /^Id = '([^']*)'$/.exec(where);
    if (!idMatch) {
      return [];
    }
    return rows.filter((r) => r.Id === idMatch[1]).map((r) => ({ ...r }));
  }
}

export class FakeRecordWriter implements RecordWriter {
  readonly created: Array<{ objectApiName: string; data: SObjectRecord }> = [];

  async create(objectApiName: string, data: SObjectRecord): Promise<SaveResult | null> {
    this.created.push({ objectApiName, data });
    return { id: `new-${this.created.length}`, success: true, errors: [] };
  }
}
