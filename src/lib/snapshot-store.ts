/**
 * Writes fetched data to the data directory and prunes old snapshots
 *
 * Every fetch produces a timestamped file plus a fixed "latest" file that is
 * overwritten each run.
 */

import fs from 'fs';
import path from 'path';
import { logger } from './logger';

export const SNAPSHOT_PATTERNS: RegExp[] = [
  /^jira_.+_issues_\d{8}_\d{6}\.json$/,
  /^airfocus_.+_items_\d{8}_\d{6}\.json$/,
];

export const LATEST_SOURCE_FILE = 'jira_data.json';
export const LATEST_ITEMS_FILE = 'airfocus_data.json';
export const LATEST_SCHEMA_FILE = 'airfocus_fields.json';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class SnapshotStore {
  constructor(
    private readonly dataDir: string,
    private readonly retention: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  saveSourceRecords(projectKey: string, data: unknown): string {
    return this.saveTimestamped(`jira_${projectKey}_issues`, LATEST_SOURCE_FILE, data);
  }

  saveMirrorItems(workspaceId: string, data: unknown): string {
    return this.saveTimestamped(`airfocus_${workspaceId}_items`, LATEST_ITEMS_FILE, data);
  }

  saveSchema(data: unknown): string {
    const filepath = path.join(this.dataDir, LATEST_SCHEMA_FILE);
    this.write(filepath, data);
    return filepath;
  }

  /**
   * Keep the newest `retention` snapshots (by modification time) of each kind.
   * Returns the number of files removed.
   */
  cleanup(): number {
    if (!fs.existsSync(this.dataDir)) {
      return 0;
    }

    const names = fs.readdirSync(this.dataDir);
    let removed = 0;

    for (const pattern of SNAPSHOT_PATTERNS) {
      const files = names
        .filter((name) => pattern.test(name))
        .map((name) => {
          const filepath = path.join(this.dataDir, name);
          return { filepath, mtime: fs.statSync(filepath).mtimeMs };
        })
        .sort((a, b) => b.mtime - a.mtime);

      if (files.length <= this.retention) {
        logger.debug(`${files.length} snapshots match ${pattern.source}; nothing to clean`);
        continue;
      }

      const stale = files.slice(this.retention);
      logger.info(`Cleaning up snapshots: keeping ${this.retention}, deleting ${stale.length}`);

      for (const file of stale) {
        try {
          fs.unlinkSync(file.filepath);
          removed++;
          logger.debug(`Deleted ${file.filepath}`);
        } catch (error) {
          logger.warn(`Failed to delete ${file.filepath}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
    }

    return removed;
  }

  private saveTimestamped(prefix: string, latestName: string, data: unknown): string {
    const filepath = path.join(this.dataDir, `${prefix}_${formatTimestamp(this.now())}.json`);
    this.write(filepath, data);
    this.write(path.join(this.dataDir, latestName), data);
    logger.debug(`Saved snapshot ${filepath}`);
    return filepath;
  }

  private write(filepath: string, data: unknown): void {
    fs.mkdirSync(path.dirname(filepath), { recursive: true });
    fs.writeFileSync(filepath, JSON.stringify(data, null, 2), 'utf-8');
  }
}
