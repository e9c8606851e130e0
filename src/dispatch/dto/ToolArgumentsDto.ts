// src/dispatch/dto/ToolArgumentsDto.ts

/**
 * Tool arguments parser/validator
 *
 * Boundary validator for the argument map a host sends with a tool call.
 *
 * - Every missing required argument is reported at once (MissingParameterError).
 * - Values are coerced to the declared type where the intent is clear
 *   ("2024" → 2024 for integers, 7 → "7" for strings).
 * - enum / range violations are reported as InvalidParameterError.
 * - Defaults are applied to absent optional arguments.
 * - Arguments the tool does not declare are ignored.
 */

import type {
  ParamSpec,
  ParamValue,
  ResolvedArguments,
  ToolSpec,
} from '../domain/ToolSpec';
import { paramLocation } from '../domain/ToolSpec';
import { InvalidParameterError, MissingParameterError } from '../domain/errors';

export type ParsedToolArguments = {
  /**
   * Every resolved argument, regardless of location.
   */
  all: ResolvedArguments;
  path: Record<string, ParamValue>;
  query: Record<string, ParamValue>;
};

export function parseToolArguments(spec: ToolSpec, args: unknown): ParsedToolArguments {
  const input = isRecord(args) ? args : {};

  const missing: string[] = [];
  const issues: string[] = [];

  const all: Record<string, ParamValue> = {};
  const path: Record<string, ParamValue> = {};
  const query: Record<string, ParamValue> = {};

  for (const param of spec.params) {
    const raw = input[param.name];

    let value: ParamValue | undefined;
    if (isAbsent(raw)) {
      if (param.required) {
        missing.push(param.name);
        continue;
      }
      value = resolveDefault(param);
    } else {
      value = coerce(param, raw, issues);
    }

    if (value === undefined) {
      continue;
    }

    all[param.name] = value;

    const location = paramLocation(spec, param);
    if (location === 'path') {
      path[param.name] = param.pad ? String(value).padStart(param.pad, '0') : value;
    } else if (location === 'query') {
      query[param.queryName ?? param.name] = value;
    }
  }

  // Missing takes precedence: the caller has to fix those first
  if (missing.length > 0) {
    throw new MissingParameterError(missing);
  }

  if (issues.length > 0) {
    throw new InvalidParameterError(issues);
  }

  return { all: Object.freeze(all), path, query };
}

/**
 * JSON Schema fragment advertised for one param.
 */
export function paramJsonSchema(param: ParamSpec): Record<string, unknown> {
  const schema: Record<string, unknown> = {
    type: param.type,
    description: param.description,
  };

  if (param.enum) {
    schema.enum = [...param.enum];
  }
  if (param.pattern !== undefined) {
    schema.pattern = `^(?:${param.pattern})$`;
  }
  if (param.min !== undefined) {
    schema.minimum = param.min;
  }
  if (param.max !== undefined) {
    schema.maximum = param.max;
  }
  if (param.default !== undefined && typeof param.default !== 'function') {
    schema.default = param.default;
  }

  return schema;
}

/**
 * JSON Schema object describing a tool's arguments, as advertised in
 * tools/list and GET /v1/tools.
 */
export function toolInputSchema(spec: ToolSpec): {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
} {
  const properties: Record<string, Record<string, unknown>> = {};
  for (const param of spec.params) {
    properties[param.name] = paramJsonSchema(param);
  }

  const required = spec.params.filter((p) => p.required).map((p) => p.name);

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

/* ------------------------- small internal helpers ------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * undefined, null and blank strings all count as "not given".
 */
function isAbsent(raw: unknown): boolean {
  return raw === undefined || raw === null || (typeof raw === 'string' && raw.trim().length === 0);
}

function resolveDefault(param: ParamSpec): ParamValue | undefined {
  if (param.default === undefined) {
    return undefined;
  }
  return typeof param.default === 'function' ? param.default() : param.default;
}

function coerce(param: ParamSpec, raw: unknown, issues: string[]): ParamValue | undefined {
  switch (param.type) {
    case 'integer':
      return readInteger(param, raw, issues);
    case 'number':
      return readNumber(param, raw, issues);
    case 'string':
      return readString(param, raw, issues);
  }
}

function readNumeric(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return raw;
  }
  if (typeof raw === 'string' && raw.trim().length > 0) {
    const n = Number(raw.trim());
    return Number.isNaN(n) ? undefined : n;
  }
  return undefined;
}

function readInteger(param: ParamSpec, raw: unknown, issues: string[]): number | undefined {
  const n = readNumeric(raw);
  if (n === undefined || !Number.isInteger(n)) {
    issues.push(`"${param.name}" must be an integer.`);
    return undefined;
  }
  return checkRange(param, n, issues);
}

function readNumber(param: ParamSpec, raw: unknown, issues: string[]): number | undefined {
  const n = readNumeric(raw);
  if (n === undefined || !Number.isFinite(n)) {
    issues.push(`"${param.name}" must be a number.`);
    return undefined;
  }
  return checkRange(param, n, issues);
}

function checkRange(param: ParamSpec, n: number, issues: string[]): number | undefined {
  if (param.min !== undefined && n < param.min) {
    issues.push(`"${param.name}" must be >= ${param.min}.`);
    return undefined;
  }
  if (param.max !== undefined && n > param.max) {
    issues.push(`"${param.name}" must be <= ${param.max}.`);
    return undefined;
  }
  return n;
}

function readString(param: ParamSpec, raw: unknown, issues: string[]): string | undefined {
  let value: string;
  if (typeof raw === 'string') {
    value = raw.trim();
  } else if (typeof raw === 'number' && Number.isFinite(raw)) {
    value = String(raw);
  } else {
    issues.push(`"${param.name}" must be a string.`);
    return undefined;
  }

  if (param.normalize === 'upper') {
    value = value.toUpperCase();
  } else if (param.normalize === 'lower') {
    value = value.toLowerCase();
  }

  if (param.enum && !param.enum.includes(value)) {
    issues.push(`"${param.name}" must be one of: ${param.enum.join(', ')}.`);
    return undefined;
  }

  if (param.pattern !== undefined && !new RegExp(`^(?:${param.pattern})$`).test(value)) {
    issues.push(`"${param.name}" must match ${param.pattern}.`);
    return undefined;
  }

  return value;
}
