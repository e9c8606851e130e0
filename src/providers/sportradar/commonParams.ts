/**
 * Param specs shared by the SportRadar-backed tool tables.
 */

import type { ParamSpec } from '../../dispatch/domain/ToolSpec';

export const MIN_SEASON_YEAR = 1900;
export const MAX_SEASON_YEAR = 2100;

export function currentYear(): number {
  return new Date().getFullYear();
}

export const localeParam: ParamSpec = {
  name: 'locale',
  type: 'string',
  description: 'Response language code (e.g. "en", "es").',
  required: false,
  default: 'en',
  normalize: 'lower',
};

export function idParam(name: string, description: string): ParamSpec {
  return { name, type: 'string', description, required: true };
}

/**
 * Season year, required or defaulting to the current calendar year.
 */
export function yearParam(required: boolean): ParamSpec {
  return {
    name: 'year',
    type: 'integer',
    description: required ? 'Season year (e.g. 2024).' : 'Season year; defaults to the current year.',
    required,
    ...(required ? {} : { default: currentYear }),
    min: MIN_SEASON_YEAR,
    max: MAX_SEASON_YEAR,
  };
}

/**
 * year / month / day triple for the dated endpoints.
 */
export const dateParams: readonly ParamSpec[] = [
  yearParam(true),
  {
    name: 'month',
    type: 'integer',
    description: 'Month, 1-12.',
    required: true,
    min: 1,
    max: 12,
    pad: 2,
  },
  {
    name: 'day',
    type: 'integer',
    description: 'Day of month, 1-31.',
    required: true,
    min: 1,
    max: 31,
    pad: 2,
  },
];

export const seasonTypeParam: ParamSpec = {
  name: 'season_type',
  type: 'string',
  description: 'Season type: REG (regular), PST (postseason) or PRE (preseason).',
  required: false,
  default: 'REG',
  enum: ['REG', 'PST', 'PRE'],
  normalize: 'upper',
};
