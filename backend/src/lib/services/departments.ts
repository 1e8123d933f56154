import {
  FunctionTag,
  type DepartmentField,
  type DepartmentObservation,
  type FieldValue,
  type MRMDepartment,
  type SupersededValue,
} from '@mrm/shared';
import { normalizeDepartmentName } from '../normalize.js';
import { mergeFieldMap, type WeightOf } from './mergePolicy.js';

// Department-name phrases (normalized, space separated) that imply a function
const FUNCTION_KEYWORDS: Record<FunctionTag, readonly string[]> = {
  governance: ['governance', 'oversight', 'controls'],
  validation: ['validation', 'review', 'audit'],
  risk_management: ['risk management', 'risk oversight'],
  analytics: ['analytics', 'quantitative', 'modeling'],
  ai_ml: ['ai', 'artificial intelligence', 'machine learning', 'ml'],
  credit_risk: ['credit risk', 'credit modeling'],
  market_risk: ['market risk', 'trading risk'],
  operational_risk: ['operational risk', 'op risk'],
};

const FUNCTION_TAGS = Object.values(FunctionTag);

export function inferFunctionTags(departmentName: string): FunctionTag[] {
  const padded = ` ${normalizeDepartmentName(departmentName)} `;
  return FUNCTION_TAGS.filter((tag) =>
    FUNCTION_KEYWORDS[tag].some((keyword) => padded.includes(` ${keyword} `))
  ).sort();
}

type DepartmentEntry = readonly [DepartmentField, string | number | undefined];

export interface DepartmentMerge {
  departments: MRMDepartment[];
  changed: string[];
  superseded: SupersededValue[];
}

/**
 * Additive department merge: unseen names are appended, known ones (by
 * normalized name) merge field by field. Functions are a sorted set union.
 */
export function mergeDepartments(
  existing: readonly MRMDepartment[],
  incoming: readonly DepartmentObservation[],
  toFieldValue: (value: string | number) => FieldValue,
  weightOf: WeightOf,
  supersededAt: string
): DepartmentMerge {
  const departments = existing.map((department) => ({ ...department }));
  const changed: string[] = [];
  const superseded: SupersededValue[] = [];

  for (const observed of incoming) {
    const key = normalizeDepartmentName(observed.name);
    if (!key) continue;

    const entries: DepartmentEntry[] = [
      ['name', observed.name],
      ['parentOrg', observed.parentOrg],
      ['reportingStructure', observed.reportingStructure],
      ['teamSize', observed.teamSize],
    ];
    const values: Array<readonly [DepartmentField, FieldValue]> = [];
    for (const [field, value] of entries) {
      if (value !== undefined) values.push([field, toFieldValue(value)]);
    }

    const index = departments.findIndex((department) => department.key === key);
    const current = departments[index];
    const path = `departments[${key}].`;
    const merged = mergeFieldMap(current?.fields ?? {}, values, weightOf, supersededAt, path);

    const functions = [
      ...new Set([...(current?.functions ?? []), ...(observed.functions ?? inferFunctionTags(observed.name))]),
    ].sort();
    const functionsChanged = functions.length !== (current?.functions.length ?? 0);

    if (!current) {
      departments.push({ key, fields: merged.fields, functions });
      changed.push(`departments[${key}]`);
      continue;
    }

    if (merged.changed.length > 0 || functionsChanged) {
      departments[index] = { key, fields: merged.fields, functions };
      changed.push(...merged.changed);
      if (functionsChanged) changed.push(`${path}functions`);
      superseded.push(...merged.superseded);
    }
  }

  return { departments, changed, superseded };
}
