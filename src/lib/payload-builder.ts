/**
 * Builds Airfocus create bodies and JSON-Patch update operations
 */

import { CandidateItem, CreateRequestBody, MirrorFieldValue, MirrorItem, ReplaceOperation, ResolvedFields, ResolvedTeamField } from './types';

export interface PayloadOptions {
  color?: string;
  order?: number;
}

function teamValue(team: ResolvedTeamField): MirrorFieldValue {
  if (team.optionId !== undefined) {
    return { selection: [team.optionId] };
  }
  return { text: team.value };
}

export function buildCreatePayload(
  candidate: CandidateItem,
  resolved: ResolvedFields,
  options: PayloadOptions = {}
): CreateRequestBody {
  const fields: Record<string, MirrorFieldValue> = {};

  if (resolved.externalKeyFieldId) {
    fields[resolved.externalKeyFieldId] = { text: candidate.externalKey };
  }
  if (resolved.team) {
    fields[resolved.team.fieldId] = teamValue(resolved.team);
  }

  return {
    name: candidate.title,
    description: {
      markdown: candidate.description,
      richText: true,
    },
    ...(resolved.statusId ? { statusId: resolved.statusId } : {}),
    color: options.color ?? 'blue',
    assigneeUserIds: [],
    assigneeUserGroupIds: [],
    order: options.order ?? 0,
    fields,
  };
}

/**
 * Full overwrite of every managed attribute. The existing item only supplies
 * the target; its current values are never compared.
 */
export function buildUpdateOperations(
  candidate: CandidateItem,
  _existing: MirrorItem,
  resolved: ResolvedFields
): ReplaceOperation[] {
  const operations: ReplaceOperation[] = [
    { op: 'replace', path: '/name', value: candidate.title },
    { op: 'replace', path: '/description', value: candidate.description },
  ];

  if (resolved.statusId) {
    operations.push({ op: 'replace', path: '/statusId', value: resolved.statusId });
  }

  if (resolved.externalKeyFieldId) {
    operations.push({
      op: 'replace',
      path: `/fields/${resolved.externalKeyFieldId}`,
      value: { text: candidate.externalKey },
    });
  }

  if (resolved.team) {
    operations.push({
      op: 'replace',
      path: `/fields/${resolved.team.fieldId}`,
      value: teamValue(resolved.team),
    });
  }

  return operations;
}
