/**
 * Public entry point
 *
 * @example
 * const api = await ApiService.connect();
 * await api.loadSchema({ names: ['Account', 'Contact'], persistDir: './cache' });
 * const [contact] = await api.getObject('Contact', "Email = 'jane@example.com'");
 * await api.resolveReferences(contact, 'Contact');
 */

export * from './core/index.js';
export { loadConfig, saveConfig, type AppConfig } from './config/app-config.js';
export { DEFAULTS } from './config/defaults.js';
export { SchemaCatalog } from './services/schema-catalog.js';
export { RecordService } from './services/record-service.js';
export { ReferenceResolver, relationshipKey } from './services/reference-resolver.js';
export { buildSelect, idPredicate } from './services/query-builder.js';
export { SalesforceService } from './services/salesforce.js';
export { YamlSnapshotStore } from './services/snapshot-store.js';
export { establishSession, requestClientCredentialsToken, getOrgCredentials } from './services/session.js';
export {
  normalizeDescribeField,
  parseSnapshotEntries,
  toSnapshotEntry,
  toObjectSchema,
} from './services/field-descriptor.js';
