/**
 * Field Descriptor construction
 *
 * Live describe metadata and persisted snapshot entries are both normalized
 * here, so that the two load paths of the schema catalog produce the same
 * descriptors for the same field data.
 */

import { z } from 'zod';
import { SnapshotError } from '../core/errors.js';
import type { FieldDescriptor, ObjectSchema, RawFieldMetadata } from '../core/types.js';

/**
 * One entry of a persisted snapshot. Key order here is the on-disk key order.
 */
export const SnapshotEntrySchema = z.object({
  name: z.string().min(1),
  label: z.string().nullish(),
  type: z.string().nullish(),
  reference: z.string().nullish(),
  length: z.number().int().nullish(),
  picklistValues: z.array(z.string()).nullish(),
});

export type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;

function descriptor(
  name: string,
  label: string | null | undefined,
  type: string | null | undefined,
  reference: string | null | undefined,
  length: number | null | undefined,
  picklistValues: string[]
): FieldDescriptor {
  return {
    name,
    label: label || name,
    type: type ?? '',
    reference: reference || null,
    length: length ?? null,
    picklistValues,
  };
}

/**
 * Normalize one field of a describe result.
 * Returns null for a field without a name.
 */
export function normalizeDescribeField(raw: RawFieldMetadata): FieldDescriptor | null {
  if (!raw.name) {
    return null;
  }

  return descriptor(
    raw.name,
    raw.label,
    raw.type,
    raw.referenceTo && raw.referenceTo.length > 0 ? raw.referenceTo[0] : null,
    raw.length,
    (raw.picklistValues ?? []).map((pv) => pv.value)
  );
}

function hasName(entry: unknown): boolean {
  return (
    typeof entry === 'object' &&
    entry !== null &&
    'name' in entry &&
    entry.name !== undefined &&
    entry.name !== null &&
    entry.name !== ''
  );
}

/**
 * Parse the entries of one snapshot into descriptors.
 * Entries without a name are dropped; any other malformed entry makes the
 * whole snapshot unusable.
 *
 * @throws SnapshotError
 */
export function parseSnapshotEntries(objectName: string, entries: unknown[]): FieldDescriptor[] {
  const fields: FieldDescriptor[] = [];

  entries.forEach((entry, index) => {
    if (!hasName(entry)) {
      return;
    }

    const result = SnapshotEntrySchema.safeParse(entry);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new SnapshotError(`Invalid field entry #${index} in snapshot of ${objectName}: ${issues}`, objectName);
    }

    const e = result.data;
    fields.push(descriptor(e.name, e.label, e.type, e.reference, e.length, e.picklistValues ?? []));
  });

  return fields;
}

/**
 * Serialize a descriptor into the persisted snapshot shape.
 */
export function toSnapshotEntry(field: FieldDescriptor): SnapshotEntry {
  return {
    name: field.name,
    label: field.label,
    type: field.type,
    reference: field.reference,
    length: field.length,
    picklistValues: [...field.picklistValues],
  };
}

export function toObjectSchema(fields: FieldDescriptor[]): ObjectSchema {
  return new Map(fields.map((f) => [f.name, f]));
}

export function isReferenceField(field: FieldDescriptor): boolean {
  return field.reference !== null;
}
