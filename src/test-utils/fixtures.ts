import type { RawFieldMetadata } from '../core/types.js';

export const ACCOUNT_FIELDS: RawFieldMetadata[] = [
  { name: 'Id', label: 'Account ID', type: 'id', referenceTo: [], length: 18, picklistValues: [] },
  { name: 'Name', label: 'Account Name', type: 'string', referenceTo: [], length: 255, picklistValues: [] },
  { name: 'OwnerId', label: 'Owner ID', type: 'reference', referenceTo: ['User'], length: 18, picklistValues: [] },
  {
    name: 'Rating',
    label: 'Account Rating',
    type: 'picklist',
    referenceTo: [],
    length: 255,
    picklistValues: [{ value: 'Hot' }, { value: 'Warm' }, { value: 'Cold' }],
  },
  { name: 'Parent__c', label: 'Parent', type: 'reference', referenceTo: ['Account'], length: 18, picklistValues: [] },
];

export const CONTACT_FIELDS: RawFieldMetadata[] = [
  { name: 'Id', label: 'Contact ID', type: 'id', referenceTo: [], length: 18, picklistValues: [] },
  { name: 'LastName', label: 'Last Name', type: 'string', referenceTo: [], length: 80, picklistValues: [] },
  { name: 'AccountId', label: 'Account ID', type: 'reference', referenceTo: ['Account'], length: 18, picklistValues: [] },
  { label: 'Unnamed', type: 'string', referenceTo: [], length: 10, picklistValues: [] },
  { name: 'ReportsToId', label: 'Reports To ID', type: 'reference', referenceTo: ['Contact'], length: 18, picklistValues: [] },
];

export const USER_FIELDS: RawFieldMetadata[] = [
  { name: 'Id', label: 'User ID', type: 'id', referenceTo: [], length: 18, picklistValues: [] },
  { name: 'Username', label: 'Username', type: 'string', referenceTo: [], length: 80, picklistValues: [] },
];
