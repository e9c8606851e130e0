/**
 * Tool definition domain models.
 *
 * A ToolSpec is the static description of one advertised tool: which
 * provider it calls, the path template, and the arguments it accepts.
 * Specs are defined as data, validated once when the registry is built
 * and never mutated afterwards.
 */

import type { ProviderId } from './Provider';

export type ParamType = 'string' | 'integer' | 'number';

export type ParamValue = string | number;

/**
 * Where a resolved argument goes:
 * - "path"  → substituted into a {placeholder} of the path template
 * - "query" → appended to the query string
 * - "local" → only read by the tool's shape step, never sent upstream
 */
export type ParamLocation = 'path' | 'query' | 'local';

export interface ParamSpec {
  name: string;
  type: ParamType;
  description: string;
  required: boolean;

  /**
   * Default for an optional param. A function is evaluated per
   * invocation (e.g. "current season").
   */
  default?: ParamValue | (() => ParamValue);

  /**
   * Allowed values for string params. Matching is case-sensitive after
   * the optional `normalize` step below.
   */
  enum?: readonly string[];

  /**
   * Regular expression (source text) a string value must match in full.
   */
  pattern?: string;

  /**
   * Case folding applied to string values before enum checks.
   */
  normalize?: 'upper' | 'lower';

  /**
   * Inclusive bounds for integer and number params.
   */
  min?: number;
  max?: number;

  /**
   * Zero-pad an integer to this width when it is substituted into the
   * path ("9" → "09" with pad 2). The resolved argument keeps the number.
   */
  pad?: number;

  /**
   * Inferred when omitted: "path" for template placeholders,
   * "query" otherwise.
   */
  location?: ParamLocation;

  /**
   * Query key sent upstream when it differs from the argument name,
   * e.g. "date>=" for OpenF1 range filters.
   */
  queryName?: string;
}

export type ResolvedArguments = Readonly<Record<string, ParamValue>>;

/**
 * Post-parse shaping step for a tool (filtering, regrouping). Receives
 * the parsed upstream JSON and the resolved arguments.
 */
export type PayloadShaper = (payload: unknown, args: ResolvedArguments) => unknown;

export interface ToolSpec {
  /**
   * Unique tool name advertised to the host.
   * Example: "get_daily_schedule".
   */
  name: string;

  /**
   * Natural-language description shown to the assistant.
   */
  description: string;

  provider: ProviderId;

  /**
   * Path relative to the provider base URL, with {name} placeholders.
   * Example: "/{locale}/games/{year}/{month}/{day}/schedule.json".
   */
  pathTemplate: string;

  params: readonly ParamSpec[];

  /**
   * Upstream returns an array of row records that should be
   * presented as columns.
   */
  tabular?: boolean;

  shape?: PayloadShaper;
}

/**
 * One incoming call, as received from the host.
 */
export interface ToolInvocation {
  toolName: string;
  arguments: Record<string, unknown>;
}

const PLACEHOLDER_PATTERN = /\{([A-Za-z0-9_]+)\}/g;

/**
 * Names of all {placeholders} in a path template, in order of appearance.
 */
export function extractPlaceholders(pathTemplate: string): string[] {
  const names: string[] = [];
  for (const match of pathTemplate.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Location of a param within a spec, applying the inference rule.
 */
export function paramLocation(spec: ToolSpec, param: ParamSpec): ParamLocation {
  if (param.location) {
    return param.location;
  }
  return extractPlaceholders(spec.pathTemplate).includes(param.name) ? 'path' : 'query';
}
