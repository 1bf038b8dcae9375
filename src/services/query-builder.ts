/**
 * SOQL Query Builder
 *
 * Builds SELECT statements from the field schemas held by the catalog.
 *
 * SECURITY: the WHERE fragment is appended verbatim. It is neither parsed
 * nor escaped, so callers must only pass fragments they built from trusted
 * values. The same holds for the record Id given to `idPredicate`.
 */

import type { SchemaCatalog } from './schema-catalog.js';

/**
 * Build `SELECT <every field> FROM <object> [WHERE <where>]`.
 * Returns null when the object has no schema in the catalog.
 */
export function buildSelect(catalog: SchemaCatalog, objectName: string, where?: string): string | null {
  const schema = catalog.getFields(objectName);
  if (!schema || schema.size === 0) {
    return null;
  }

  let query = `SELECT ${[...schema.keys()].join(', ')} FROM ${objectName}`;
  if (where) {
    query += ` WHERE ${where}`;
  }
  return query;
}

/**
 * Identifier equality predicate, e.g. `Id = '001000000000001AAA'`.
 */
export function idPredicate(id: string): string {
  return `Id = '${id}'`;
}
