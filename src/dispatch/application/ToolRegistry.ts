// src/dispatch/application/ToolRegistry.ts

/**
 * ToolRegistry
 *
 * Immutable, validated table of ToolSpecs for one server. Built once at
 * startup; a malformed spec is a programming error and fails construction.
 *
 * Checks:
 * - tool names are unique and non-empty
 * - param names are unique within a tool
 * - every {placeholder} of the path template is a declared param
 * - a param declared with location "path" appears in the template
 * - a path param is required or carries a default
 * - every tool's provider is one the server resolves credentials for
 * - queryName is only set on query params
 */

import type { ProviderId } from '../domain/Provider';
import type { ToolSpec } from '../domain/ToolSpec';
import { extractPlaceholders } from '../domain/ToolSpec';

export class InvalidToolSpecError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'InvalidToolSpecError';
    this.issues = issues;
  }
}

export interface IToolRegistry {
  get(name: string): ToolSpec | undefined;
  list(): readonly ToolSpec[];
}

export class ToolRegistry implements IToolRegistry {
  private readonly byName: ReadonlyMap<string, ToolSpec>;
  private readonly specs: readonly ToolSpec[];

  /**
   * @param specs     Tool table for the server.
   * @param providers Providers the server resolves configs for. When
   *                  given, every spec must target one of them.
   */
  public constructor(specs: readonly ToolSpec[], providers?: readonly ProviderId[]) {
    const issues = validateToolSpecs(specs, providers);
    if (issues.length > 0) {
      throw new InvalidToolSpecError('Invalid tool table', issues);
    }

    this.specs = Object.freeze(specs.map((spec) => freezeSpec(spec)));
    this.byName = new Map(this.specs.map((spec) => [spec.name, spec]));
  }

  public get(name: string): ToolSpec | undefined {
    return this.byName.get(name);
  }

  public list(): readonly ToolSpec[] {
    return this.specs;
  }
}

export function validateToolSpecs(
  specs: readonly ToolSpec[],
  providers?: readonly ProviderId[],
): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  for (const spec of specs) {
    if (spec.name.trim().length === 0) {
      issues.push('Tool name must be non-empty.');
      continue;
    }

    if (seen.has(spec.name)) {
      issues.push(`Duplicate tool name "${spec.name}".`);
    }
    seen.add(spec.name);

    if (providers && !providers.includes(spec.provider)) {
      issues.push(`${spec.name}: provider "${spec.provider}" is not served here.`);
    }

    const placeholders = extractPlaceholders(spec.pathTemplate);
    const paramNames = spec.params.map((p) => p.name);

    const dupParams = paramNames.filter((name, i) => paramNames.indexOf(name) !== i);
    for (const name of new Set(dupParams)) {
      issues.push(`${spec.name}: param "${name}" is declared more than once.`);
    }

    for (const placeholder of placeholders) {
      if (!paramNames.includes(placeholder)) {
        issues.push(`${spec.name}: placeholder {${placeholder}} has no declared param.`);
      }
    }

    for (const param of spec.params) {
      const inTemplate = placeholders.includes(param.name);

      if (param.location === 'path' && !inTemplate) {
        issues.push(`${spec.name}: path param "${param.name}" is not in the template.`);
      }
      if (inTemplate && param.location !== undefined && param.location !== 'path') {
        issues.push(`${spec.name}: placeholder param "${param.name}" must be a path param.`);
      }
      if (inTemplate && !param.required && param.default === undefined) {
        issues.push(`${spec.name}: optional path param "${param.name}" needs a default.`);
      }
      if ((param.enum || param.pattern !== undefined) && param.type !== 'string') {
        issues.push(`${spec.name}: enum or pattern on non-string param "${param.name}".`);
      }
      const sentAsQuery = !inTemplate && (param.location === undefined || param.location === 'query');
      if (param.queryName !== undefined && !sentAsQuery) {
        issues.push(`${spec.name}: queryName on non-query param "${param.name}".`);
      }
    }
  }

  return issues;
}

function freezeSpec(spec: ToolSpec): ToolSpec {
  return Object.freeze({
    ...spec,
    params: Object.freeze(spec.params.map((p) => Object.freeze({ ...p }))),
  });
}
