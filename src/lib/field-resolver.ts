/**
 * Resolves configured field, option and status names to Airfocus ids
 *
 * Matching is exact and case-sensitive. Misses come back as
 * `{ found: false }` with the names that do exist, never as exceptions.
 */

import { logger } from './logger';
import { FieldDefinition, MirrorSchema, MirrorStatus, Resolution } from './types';

export class FieldResolver {
  private readonly fieldsByName = new Map<string, FieldDefinition>();
  private readonly fieldsById = new Map<string, FieldDefinition>();
  private readonly statusesByName = new Map<string, MirrorStatus>();

  constructor(schema: MirrorSchema) {
    for (const field of schema.fields) {
      this.fieldsById.set(field.id, field);
      if (this.fieldsByName.has(field.name)) {
        logger.warn(`Workspace has more than one field named "${field.name}"; using the first (${this.fieldsByName.get(field.name)?.id})`);
        continue;
      }
      this.fieldsByName.set(field.name, field);
    }

    for (const status of schema.statuses) {
      if (this.statusesByName.has(status.name)) {
        logger.warn(`Workspace has more than one status named "${status.name}"; using the first`);
        continue;
      }
      this.statusesByName.set(status.name, status);
    }
  }

  resolveField(name: string): Resolution {
    const field = this.fieldsByName.get(name);
    if (field) {
      return { found: true, id: field.id };
    }
    return {
      found: false,
      reason: `Field "${name}" not found in workspace (available: ${this.describe(this.fieldNames())})`,
    };
  }

  resolveOption(fieldId: string, optionName: string): Resolution {
    const field = this.fieldsById.get(fieldId);
    if (!field) {
      return { found: false, reason: `Field id "${fieldId}" not found in workspace` };
    }

    if (field.kind !== 'single-select' && field.kind !== 'multi-select') {
      return { found: false, reason: `Field "${field.name}" is not a select field (kind: ${field.kind})` };
    }

    const option = field.options.find((o) => o.name === optionName);
    if (option) {
      return { found: true, id: option.id };
    }
    return {
      found: false,
      reason: `Option "${optionName}" not found in field "${field.name}" (available: ${this.describe(field.options.map((o) => o.name))})`,
    };
  }

  resolveStatus(name: string): Resolution {
    const status = this.statusesByName.get(name);
    if (status) {
      return { found: true, id: status.id };
    }
    return {
      found: false,
      reason: `Status "${name}" not found in workspace (available: ${this.describe(this.statusNames())})`,
    };
  }

  getField(fieldId: string): FieldDefinition | undefined {
    return this.fieldsById.get(fieldId);
  }

  fieldNames(): string[] {
    return Array.from(this.fieldsByName.keys());
  }

  statusNames(): string[] {
    return Array.from(this.statusesByName.keys());
  }

  private describe(names: string[]): string {
    return names.length > 0 ? names.map((n) => `"${n}"`).join(', ') : 'none';
  }
}
