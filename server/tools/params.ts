/**
 * Tool parameter readers
 *
 * Tool input arrives as untyped JSON from the agent. Each reader checks one
 * parameter and throws ToolInputError naming it.
 */

import { AGGREGATE_FUNCTIONS, type AggregateFunction, type AggregateSpec } from '../query/types.js';

export type ToolParams = Record<string, unknown>;

export class ToolInputError extends Error {
  constructor(
    message: string,
    public param?: string
  ) {
    super(message);
    this.name = 'ToolInputError';
  }
}

const OBJECT_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;
const FIELD_PATH = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)*$/;
const FIELD_LIST = /^[A-Za-z][A-Za-z0-9_.]*(\s*,\s*[A-Za-z][A-Za-z0-9_.]*)*$/;
const DATE_LITERAL = /^[A-Za-z0-9_:-]+$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function optionalString(params: ToolParams, name: string): string | undefined {
  const value = params[name];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ToolInputError(`Parameter "${name}" must be a string`, name);
  }
  return value;
}

export function requireString(params: ToolParams, name: string): string {
  const value = optionalString(params, name);
  if (value === undefined) {
    throw new ToolInputError(`Missing required parameter "${name}"`, name);
  }
  return value;
}

function checkPattern(value: string, pattern: RegExp, name: string, what: string): string {
  if (!pattern.test(value)) {
    throw new ToolInputError(`Parameter "${name}" is not a valid ${what}: "${value}"`, name);
  }
  return value;
}

export function requireObjectName(params: ToolParams, name = 'object_name'): string {
  return checkPattern(requireString(params, name), OBJECT_NAME, name, 'object name');
}

export function optionalFieldPath(params: ToolParams, name: string): string | undefined {
  const value = optionalString(params, name);
  return value === undefined ? undefined : checkPattern(value, FIELD_PATH, name, 'field name');
}

export function optionalFieldList(params: ToolParams, name: string): string | undefined {
  const value = optionalString(params, name);
  return value === undefined ? undefined : checkPattern(value, FIELD_LIST, name, 'field list');
}

export function optionalDateLiteral(params: ToolParams, name: string): string | undefined {
  const value = optionalString(params, name);
  return value === undefined ? undefined : checkPattern(value, DATE_LITERAL, name, 'date literal');
}

export function optionalInteger(
  params: ToolParams,
  name: string,
  bounds: { min?: number; max?: number } = {}
): number | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ToolInputError(`Parameter "${name}" must be an integer`, name);
  }
  if (bounds.min !== undefined && value < bounds.min) {
    throw new ToolInputError(`Parameter "${name}" must be at least ${bounds.min}`, name);
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new ToolInputError(`Parameter "${name}" must be at most ${bounds.max}`, name);
  }
  return value;
}

export function optionalNumber(params: ToolParams, name: string): number | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ToolInputError(`Parameter "${name}" must be a number`, name);
  }
  return value;
}

export function optionalBoolean(params: ToolParams, name: string): boolean | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ToolInputError(`Parameter "${name}" must be a boolean`, name);
  }
  return value;
}

export function optionalEnum<T extends string>(
  params: ToolParams,
  name: string,
  allowed: readonly T[]
): T | undefined {
  const value = optionalString(params, name);
  if (value === undefined) return undefined;
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new ToolInputError(`Parameter "${name}" must be one of ${allowed.join(', ')}`, name);
  }
  return match;
}

export function optionalFieldArray(params: ToolParams, name: string): string[] | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ToolInputError(`Parameter "${name}" must be an array of field names`, name);
  }
  return value.map(item => {
    if (typeof item !== 'string') {
      throw new ToolInputError(`Parameter "${name}" must be an array of field names`, name);
    }
    return checkPattern(item, FIELD_PATH, name, 'field name');
  });
}

export function optionalStringArray(params: ToolParams, name: string): string[] | undefined {
  const value = params[name];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ToolInputError(`Parameter "${name}" must be an array of strings`, name);
  }
  return value;
}

export function requireRecord(params: ToolParams, name: string): Record<string, unknown> {
  const value = params[name];
  if (!isRecord(value)) {
    throw new ToolInputError(`Parameter "${name}" must be an object`, name);
  }
  return value;
}

function toAggregateFunction(value: unknown, name: string): AggregateFunction {
  const upper = typeof value === 'string' ? value.toUpperCase() : 'COUNT';
  const match = AGGREGATE_FUNCTIONS.find(fn => fn === upper);
  if (match === undefined || (value !== undefined && typeof value !== 'string')) {
    throw new ToolInputError(`Parameter "${name}" has an unknown aggregate function: ${String(value)}`, name);
  }
  return match;
}

/**
 * Reads `[{ function, field?, alias? }]`. Function names are case-insensitive
 * and default to COUNT, matching the tool description.
 */
export function parseAggregateSpecs(params: ToolParams, name: string, required: boolean): AggregateSpec[] {
  const value = params[name];
  if (value === undefined || value === null) {
    if (required) throw new ToolInputError(`Missing required parameter "${name}"`, name);
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ToolInputError(`Parameter "${name}" must be an array`, name);
  }

  return value.map(item => {
    if (!isRecord(item)) {
      throw new ToolInputError(`Each entry of "${name}" must be an object`, name);
    }
    const spec: AggregateSpec = { function: toAggregateFunction(item.function, name) };
    const field = optionalFieldPath(item, 'field');
    const alias = optionalString(item, 'alias');
    if (field !== undefined) spec.field = field;
    if (alias !== undefined) spec.alias = checkPattern(alias, OBJECT_NAME, 'alias', 'alias');
    return spec;
  });
}
