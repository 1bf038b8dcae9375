import { describe, it, expect, beforeEach } from 'vitest';
import { ReferenceResolver, relationshipKey } from './reference-resolver.js';
import { RecordService } from './record-service.js';
import { SchemaCatalog } from './schema-catalog.js';
import { FakeMetadataProvider, FakeQueryExecutor } from '../test-utils/fakes.js';
import { ACCOUNT_FIELDS, CONTACT_FIELDS, USER_FIELDS } from '../test-utils/fixtures.js';
import type { SObjectRecord } from '../core/types.js';

describe('relationshipKey', () => {
  it('swaps the custom field suffix for the relationship suffix', () => {
    expect(relationshipKey('Parent__c')).toBe('Parent__r');
    expect(relationshipKey('ns__Region__c')).toBe('ns__Region__r');
  });

  it('drops the Id suffix of standard lookups', () => {
    expect(relationshipKey('OwnerId')).toBe('Owner');
    expect(relationshipKey('AccountId')).toBe('Account');
  });

  it('appends the relationship suffix to any other name', () => {
    expect(relationshipKey('Manager')).toBe('Manager__r');
  });
});

describe('ReferenceResolver', () => {
  const tables: Record<string, SObjectRecord[]> = {
    Account: [
      { Id: '001A', Name: 'Acme', OwnerId: '005A', Rating: 'Hot', Parent__c: null },
      { Id: '001B', Name: 'Globex', OwnerId: '005A', Rating: 'Cold', Parent__c: '001A' },
    ],
    User: [{ Id: '005A', Username: 'owner@example.com' }],
    Contact: [],
  };

  let catalog: SchemaCatalog;
  let executor: FakeQueryExecutor;
  let resolver: ReferenceResolver;

  beforeEach(async () => {
    catalog = new SchemaCatalog();
    await catalog.load({
      source: {
        mode: 'live',
        provider: new FakeMetadataProvider({ Account: ACCOUNT_FIELDS, Contact: CONTACT_FIELDS, User: USER_FIELDS }),
      },
    });
    executor = new FakeQueryExecutor(tables);
    resolver = new ReferenceResolver(catalog, new RecordService(catalog, executor));
  });

  it('embeds referenced records and keeps the original Ids', async () => {
    const record: SObjectRecord = { Id: '001B', Name: 'Globex', OwnerId: '005A', Rating: 'Cold', Parent__c: '001A' };

    const resolved = await resolver.resolve(record, 'Account');

    expect(resolved).toBe(record);
    expect(resolved).toEqual({
      Id: '001B',
      Name: 'Globex',
      OwnerId: '005A',
      Rating: 'Cold',
      Parent__c: '001A',
      Owner: { Id: '005A', Username: 'owner@example.com' },
      Parent__r: { Id: '001A', Name: 'Acme', OwnerId: '005A', Rating: 'Hot', Parent__c: null },
    });
  });

  it('fetches reference fields in schema order', async () => {
    await resolver.resolve({ Id: '001B', OwnerId: '005A', Parent__c: '001A' }, 'Account');

    expect(executor.queries).toEqual([
      "SELECT Id, Username FROM User WHERE Id = '005A'",
      "SELECT Id, Name, OwnerId, Rating, Parent__c FROM Account WHERE Id = '001A'",
    ]);
  });

  it('skips empty reference values', async () => {
    const record: SObjectRecord = { Id: '001A', OwnerId: '005A', Parent__c: null };

    await resolver.resolve(record, 'Account');

    expect(record).not.toHaveProperty('Parent__r');
    expect(executor.queries).toHaveLength(1);
  });

  it('resolves only the allowed fields', async () => {
    const record: SObjectRecord = { Id: '001B', OwnerId: '005A', Parent__c: '001A' };

    await resolver.resolve(record, 'Account', ['Parent__c']);

    expect(Object.keys(record)).toEqual(['Id', 'OwnerId', 'Parent__c', 'Parent__r']);
  });

  it('leaves a field unresolved when its target is missing and continues', async () => {
    const record: SObjectRecord = { Id: '001C', OwnerId: '005Z', Parent__c: '001A' };

    await resolver.resolve(record, 'Account');

    expect(record).not.toHaveProperty('Owner');
    expect(record.Parent__r).toEqual(tables.Account[0]);
  });

  it('returns the record unchanged when the object has no reference fields', async () => {
    const record: SObjectRecord = { Id: '005A', Username: 'owner@example.com' };

    await resolver.resolve(record, 'User');

    expect(record).toEqual({ Id: '005A', Username: 'owner@example.com' });
    expect(executor.queries).toEqual([]);
  });

  it('returns the record unchanged when the object has no schema', async () => {
    const record: SObjectRecord = { Id: '006A', AccountId: '001A' };

    await resolver.resolve(record, 'Opportunity');

    expect(record).toEqual({ Id: '006A', AccountId: '001A' });
  });

  it('does not change embedded records when resolving the same fields again', async () => {
    const record: SObjectRecord = { Id: '001B', OwnerId: '005A', Parent__c: '001A' };
    await resolver.resolve(record, 'Account');
    const first = structuredClone(record);

    await resolver.resolve(record, 'Account', ['OwnerId', 'Parent__c']);

    expect(record).toEqual(first);
  });

  it('resolves a single level over a reference cycle', async () => {
    const cyclic = new SchemaCatalog();
    await cyclic.load({
      source: {
        mode: 'live',
        provider: new FakeMetadataProvider({
          A__c: [
            { name: 'Id', type: 'id' },
            { name: 'B__c', type: 'reference', referenceTo: ['B__c'] },
          ],
          B__c: [
            { name: 'Id', type: 'id' },
            { name: 'A__c', type: 'reference', referenceTo: ['A__c'] },
          ],
        }),
      },
    });
    const cyclicExecutor = new FakeQueryExecutor({
      A__c: [{ Id: 'a1', B__c: 'b1' }],
      B__c: [{ Id: 'b1', A__c: 'a1' }],
    });
    const cyclicResolver = new ReferenceResolver(cyclic, new RecordService(cyclic, cyclicExecutor));

    const record = await cyclicResolver.resolve({ Id: 'a1', B__c: 'b1' }, 'A__c');

    expect(record).toEqual({ Id: 'a1', B__c: 'b1', B__r: { Id: 'b1', A__c: 'a1' } });
    expect(cyclicExecutor.queries).toHaveLength(1);
  });

  it('resolves a self reference once', async () => {
    const record: SObjectRecord = { Id: '001A', OwnerId: null, Parent__c: '001A' };

    await resolver.resolve(record, 'Account');

    expect(record.Parent__r).toEqual(tables.Account[0]);
    expect(executor.queries).toHaveLength(1);
  });

  it('resolves standard lookups on Contact into the parent account', async () => {
    const record: SObjectRecord = { Id: '003A', LastName: 'Doe', AccountId: '001A', ReportsToId: null };

    await resolver.resolve(record, 'Contact');

    expect(record.Account).toEqual(tables.Account[0]);
    expect(record.AccountId).toBe('001A');
  });
});
