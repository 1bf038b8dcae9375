/**
 * YAML Snapshot Store
 *
 * Persists normalized field metadata as one `<ObjectName>.yaml` file per
 * object, a YAML sequence of `name, label, type, reference, length,
 * picklistValues` mappings.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { parse, stringify } from 'yaml';
import { DEFAULTS } from '../config/defaults.js';
import { SnapshotError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { FieldDescriptor, SnapshotListing, SnapshotStore } from '../core/types.js';
import { toSnapshotEntry } from './field-descriptor.js';

const log = createLogger('snapshot-store');

export class YamlSnapshotStore implements SnapshotStore {
  constructor(readonly directory: string) {}

  snapshotPath(objectName: string): string {
    return path.join(this.directory, `${objectName}${DEFAULTS.SNAPSHOT_EXTENSION}`);
  }

  async write(objectName: string, fields: FieldDescriptor[]): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const file = this.snapshotPath(objectName);
    log.debug({ file, fieldCount: fields.length }, 'Writing object snapshot');
    await fs.writeFile(file, stringify(fields.map(toSnapshotEntry)), 'utf-8');
  }

  /**
   * Read every snapshot in the directory. A file that cannot be read or
   * does not hold a YAML sequence is reported with its error instead of
   * failing the listing.
   */
  async listAvailable(): Promise<SnapshotListing[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (err) {
      log.error({ err, directory: this.directory }, 'Snapshot directory not readable');
      return [];
    }

    const listings: SnapshotListing[] = [];
    for (const file of files.filter((f) => f.endsWith(DEFAULTS.SNAPSHOT_EXTENSION)).sort()) {
      const objectName = path.basename(file, DEFAULTS.SNAPSHOT_EXTENSION);
      listings.push(await this.readSnapshot(objectName, path.join(this.directory, file)));
    }
    return listings;
  }

  private async readSnapshot(objectName: string, file: string): Promise<SnapshotListing> {
    try {
      const content: unknown = parse(await fs.readFile(file, 'utf-8'));
      if (!Array.isArray(content)) {
        return {
          objectName,
          error: new SnapshotError(`Snapshot ${file} does not contain a list of fields`, objectName),
        };
      }
      return { objectName, entries: content };
    } catch (err) {
      return {
        objectName,
        error: new SnapshotError(
          `Failed to read snapshot ${file}: ${err instanceof Error ? err.message : String(err)}`,
          objectName,
          err instanceof Error ? err : undefined
        ),
      };
    }
  }
}
