import { describe, it, expect } from 'vitest';
import { SnapshotError } from '../core/errors.js';
import {
  normalizeDescribeField,
  parseSnapshotEntries,
  toObjectSchema,
  toSnapshotEntry,
  isReferenceField,
} from './field-descriptor.js';

describe('normalizeDescribeField', () => {
  it('keeps only the first target of a polymorphic lookup', () => {
    const field = normalizeDescribeField({
      name: 'WhoId',
      label: 'Name ID',
      type: 'reference',
      referenceTo: ['Contact', 'Lead'],
      length: 18,
      picklistValues: [],
    });

    expect(field).toEqual({
      name: 'WhoId',
      label: 'Name ID',
      type: 'reference',
      reference: 'Contact',
      length: 18,
      picklistValues: [],
    });
  });

  it('maps picklist entries to their values in order', () => {
    const field = normalizeDescribeField({
      name: 'Industry',
      label: 'Industry',
      type: 'picklist',
      referenceTo: [],
      length: 255,
      picklistValues: [{ value: 'Banking' }, { value: 'Agriculture' }, { value: 'Energy' }],
    });

    expect(field?.reference).toBeNull();
    expect(field?.picklistValues).toEqual(['Banking', 'Agriculture', 'Energy']);
  });

  it('falls back to the name when the label is missing', () => {
    const field = normalizeDescribeField({ name: 'Code__c', type: 'string' });

    expect(field).toEqual({
      name: 'Code__c',
      label: 'Code__c',
      type: 'string',
      reference: null,
      length: null,
      picklistValues: [],
    });
  });

  it('rejects a field without a name', () => {
    expect(normalizeDescribeField({ label: 'Orphan', type: 'string' })).toBeNull();
  });
});

describe('parseSnapshotEntries', () => {
  it('drops entries without a name and keeps the rest', () => {
    const fields = parseSnapshotEntries('Account', [
      { name: 'Id', label: 'Account ID', type: 'id', reference: null, length: 18, picklistValues: [] },
      { label: 'No name', type: 'string' },
      { name: 'OwnerId', label: 'Owner ID', type: 'reference', reference: 'User', length: 18, picklistValues: [] },
    ]);

    expect(fields.map((f) => f.name)).toEqual(['Id', 'OwnerId']);
    expect(fields[1].reference).toBe('User');
  });

  it('throws a SnapshotError for a malformed named entry', () => {
    expect(() => parseSnapshotEntries('Account', [{ name: 'Id', length: 'eighteen' }])).toThrow(SnapshotError);
  });

  it('reads back what toSnapshotEntry writes', () => {
    const original = {
      name: 'Stage__c',
      label: 'Stage',
      type: 'picklist',
      reference: null,
      length: 255,
      picklistValues: ['New', 'Won'],
    };

    expect(parseSnapshotEntries('Deal__c', [toSnapshotEntry(original)])).toEqual([original]);
  });
});

describe('toObjectSchema', () => {
  it('keys descriptors by name in source order', () => {
    const schema = toObjectSchema([
      { name: 'Id', label: 'Id', type: 'id', reference: null, length: 18, picklistValues: [] },
      { name: 'ParentId', label: 'Parent', type: 'reference', reference: 'Account', length: 18, picklistValues: [] },
    ]);

    expect([...schema.keys()]).toEqual(['Id', 'ParentId']);
    const [id, parent] = [...schema.values()];
    expect(isReferenceField(parent)).toBe(true);
    expect(isReferenceField(id)).toBe(false);
  });
});
