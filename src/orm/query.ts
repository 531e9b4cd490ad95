/**
 * Translation of filter criteria into the Zendesk record search language.
 *
 * `{ title: "Dune", pages: { $gte: 300 } }` becomes
 * `{ $and: [{ "custom_object_fields.title": { $eq: "Dune" } },
 *           { "custom_object_fields.pages": { $gte: 300 } }] }`.
 */

import { ModelError } from "./errors.js";
import type { AnyField } from "./fields.js";

export const FILTER_OPERATORS = [
  "$eq",
  "$noteq",
  "$gt",
  "$gte",
  "$lt",
  "$lte",
  "$contains",
  "$not_contains",
  "$starts_with",
  "$in",
  "$exists",
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type Condition = Partial<Record<FilterOperator, unknown>>;

/** Attribute → value (equality) or operator object. */
export type Criteria = Record<string, unknown>;

export type SearchFilter = Record<string, unknown>;

/** Standard record fields that can be filtered and sorted on. */
export const STANDARD_FIELDS = ["name", "external_id", "created_at", "updated_at"] as const;

export type StandardField = (typeof STANDARD_FIELDS)[number];

function isStandardField(value: string): value is StandardField {
  return STANDARD_FIELDS.some((field) => field === value);
}

function isFilterOperator(value: string): value is FilterOperator {
  return FILTER_OPERATORS.some((operator) => operator === value);
}

/** The part of a model the query builder needs. */
export interface QueryTarget {
  readonly title: string;
  fieldFor(attribute: string): AnyField | undefined;
}

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value) || value instanceof Date) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => key.startsWith("$"));
}

function encodeStandard(value: unknown): unknown {
  return value instanceof Date ? value.toISOString() : value;
}

interface ResolvedAttribute {
  path: string;
  encode: (value: unknown) => unknown;
}

function resolve(target: QueryTarget, attribute: string): ResolvedAttribute {
  if (isStandardField(attribute)) {
    return { path: attribute, encode: encodeStandard };
  }
  const field = target.fieldFor(attribute);
  if (!field) {
    throw new ModelError(`Unknown attribute '${attribute}' for ${target.title}.`);
  }
  return {
    path: `custom_object_fields.${field.key}`,
    encode: (value) => field.toFilterValue(value),
  };
}

function buildCondition(attribute: string, resolved: ResolvedAttribute, value: unknown): Condition {
  if (!isOperatorObject(value)) {
    return { $eq: resolved.encode(value) };
  }

  const condition: Condition = {};
  for (const [operator, operand] of Object.entries(value)) {
    if (!isFilterOperator(operator)) {
      throw new ModelError(`Unsupported filter operator '${operator}' on '${attribute}'.`);
    }
    if (operator === "$exists") {
      if (typeof operand !== "boolean") {
        throw new ModelError(`$exists on '${attribute}' expects a boolean.`);
      }
      condition[operator] = operand;
    } else if (operator === "$in") {
      if (!Array.isArray(operand)) {
        throw new ModelError(`$in on '${attribute}' expects an array.`);
      }
      condition[operator] = operand.map((item: unknown) => resolved.encode(item));
    } else {
      condition[operator] = resolved.encode(operand);
    }
  }
  return condition;
}

/**
 * Search filter for the given criteria; undefined when there are none.
 * Criteria set to `undefined` are left out.
 */
export function buildFilter(target: QueryTarget, criteria: Criteria): SearchFilter | undefined {
  const conditions: SearchFilter[] = [];
  for (const [attribute, value] of Object.entries(criteria)) {
    if (value === undefined) {
      continue;
    }
    const resolved = resolve(target, attribute);
    conditions.push({ [resolved.path]: buildCondition(attribute, resolved, value) });
  }

  if (conditions.length === 0) {
    return undefined;
  }
  if (conditions.length === 1) {
    return conditions[0];
  }
  return { $and: conditions };
}

/**
 * `sort` parameter for an attribute, `-` prefixed for descending order.
 */
export function buildSort(target: QueryTarget, orderBy: string): string {
  const descending = orderBy.startsWith("-");
  const attribute = descending ? orderBy.slice(1) : orderBy;
  return `${descending ? "-" : ""}${resolve(target, attribute).path}`;
}
