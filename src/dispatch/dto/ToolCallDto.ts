// src/dispatch/dto/ToolCallDto.ts

/**
 * Body validator for POST /v1/tools/:name.
 *
 * Accepted shape: { "arguments"?: { ... } }. Argument values are
 * checked later against the tool's own params.
 */

export class ToolCallDtoValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'ToolCallDtoValidationError';
    this.issues = issues;
  }
}

export function parseToolCallDto(payload: unknown): Record<string, unknown> {
  if (payload === undefined || payload === null) {
    return {};
  }

  if (!isRecord(payload)) {
    throw new ToolCallDtoValidationError('Invalid tool call payload', [
      'Payload must be a JSON object.',
    ]);
  }

  const args = payload.arguments;
  if (args === undefined) {
    return {};
  }

  if (!isRecord(args)) {
    throw new ToolCallDtoValidationError('Invalid tool call payload', [
      '"arguments" must be an object.',
    ]);
  }

  return args;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
