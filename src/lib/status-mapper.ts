/**
 * Maps source (Jira) status names onto mirror (Airfocus) status names
 */

import { StatusMapping } from './types';

interface FrozenEntry {
  readonly mirrorStatus: string;
  readonly sourceStatuses: readonly string[];
}

export class StatusMapper {
  private readonly entries: readonly FrozenEntry[];

  constructor(mapping: StatusMapping) {
    // Frozen copy: the table stays fixed for the whole pass
    this.entries = Object.freeze(
      mapping.map(
        (entry): FrozenEntry =>
          Object.freeze({
            mirrorStatus: entry.mirrorStatus,
            sourceStatuses: Object.freeze([...entry.sourceStatuses]),
          })
      )
    );
  }

  /**
   * First mirror status whose accepted set contains the source status.
   * Unmapped statuses pass through unchanged; an empty status maps to null.
   */
  mapStatus(sourceStatus: string): string | null {
    if (!sourceStatus) {
      return null;
    }

    for (const entry of this.entries) {
      if (entry.sourceStatuses.includes(sourceStatus)) {
        return entry.mirrorStatus;
      }
    }

    return sourceStatus;
  }

  /**
   * True when the status is covered by an explicit mapping entry
   */
  isMapped(sourceStatus: string): boolean {
    return this.entries.some((entry) => entry.sourceStatuses.includes(sourceStatus));
  }

  /** Mirror status names referenced by the mapping, in table order */
  mirrorStatuses(): string[] {
    return this.entries.map((entry) => entry.mirrorStatus);
  }
}
