// src/providers/f1/f1Tools.ts

/**
 * Formula One tool table.
 *
 * Calendar, results and standings come from Jolpica (the maintained
 * Ergast-compatible API); session, driver, lap and car telemetry data
 * come from OpenF1. Both are keyless.
 */

import type { ParamSpec, ToolSpec } from '../../dispatch/domain/ToolSpec';
import type { ServerDefinition } from '../ServerDefinition';
import {
  shapeConstructorStandings,
  shapeDriverStandings,
  shapeEventInfo,
  shapeEventSchedule,
  shapeSessionResults,
} from './ergastFormatters';

const FIRST_F1_SEASON = 1950;
const FIRST_OPENF1_SEASON = 2023;

function seasonParam(min: number): ParamSpec {
  return {
    name: 'year',
    type: 'integer',
    description: 'Season year (e.g. 2024).',
    required: true,
    min,
    max: 2100,
  };
}

const roundParam: ParamSpec = {
  name: 'round',
  type: 'integer',
  description: 'Round number within the season (1 = first Grand Prix).',
  required: true,
  min: 1,
  max: 30,
};

const standingsRoundParam: ParamSpec = {
  name: 'round',
  type: 'string',
  description: 'Round number, or "last" for the latest standings of the season.',
  required: false,
  default: 'last',
  normalize: 'lower',
  pattern: '[0-9]{1,2}|last',
};

const sessionKeyParam: ParamSpec = {
  name: 'session_key',
  type: 'string',
  description: 'OpenF1 session key (see get_sessions), or "latest".',
  required: true,
  normalize: 'lower',
  pattern: '[0-9]+|latest',
};

function driverNumberParam(required: boolean): ParamSpec {
  return {
    name: 'driver_number',
    type: 'integer',
    description: 'Car number of the driver (e.g. 44).',
    required,
    min: 1,
    max: 99,
  };
}

// ISO 8601 date with optional time and offset, as OpenF1 reports them
const OPENF1_DATE_PATTERN =
  '[0-9]{4}-[0-9]{2}-[0-9]{2}(T[0-9]{2}:[0-9]{2}(:[0-9]{2}(\\.[0-9]+)?)?(Z|[+-][0-9]{2}:[0-9]{2})?)?';

function dateBoundParam(name: string, queryName: string, description: string): ParamSpec {
  return {
    name,
    type: 'string',
    description,
    required: false,
    pattern: OPENF1_DATE_PATTERN,
    queryName,
  };
}

const lapNumberParam: ParamSpec = {
  name: 'lap_number',
  type: 'integer',
  description: 'Only this lap (1 = first lap of the session).',
  required: false,
  min: 1,
  max: 200,
};

export const f1Tools: readonly ToolSpec[] = [
  {
    name: 'get_event_schedule',
    description: 'Get the Formula One race calendar for a season.',
    provider: 'ergast',
    pathTemplate: '/{year}.json',
    params: [seasonParam(FIRST_F1_SEASON)],
    shape: shapeEventSchedule,
  },
  {
    name: 'get_event_info',
    description: 'Get circuit and session times for one Grand Prix of a season.',
    provider: 'ergast',
    pathTemplate: '/{year}/{round}.json',
    params: [seasonParam(FIRST_F1_SEASON), roundParam],
    shape: shapeEventInfo,
  },
  {
    name: 'get_session_results',
    description: 'Get the classification of a race, qualifying or sprint session.',
    provider: 'ergast',
    pathTemplate: '/{year}/{round}/{session}.json',
    params: [
      seasonParam(FIRST_F1_SEASON),
      roundParam,
      {
        name: 'session',
        type: 'string',
        description: 'Session: results (race), qualifying or sprint.',
        required: false,
        default: 'results',
        enum: ['results', 'qualifying', 'sprint'],
        normalize: 'lower',
      },
    ],
    shape: shapeSessionResults,
  },
  {
    name: 'get_driver_standings',
    description: "Get the drivers' championship standings after a round.",
    provider: 'ergast',
    pathTemplate: '/{year}/{round}/driverStandings.json',
    params: [seasonParam(FIRST_F1_SEASON), standingsRoundParam],
    shape: shapeDriverStandings,
  },
  {
    name: 'get_constructor_standings',
    description: "Get the constructors' championship standings after a round.",
    provider: 'ergast',
    pathTemplate: '/{year}/{round}/constructorStandings.json',
    params: [seasonParam(FIRST_F1_SEASON), standingsRoundParam],
    shape: shapeConstructorStandings,
  },
  {
    name: 'get_sessions',
    description: 'List practice, qualifying and race sessions with their OpenF1 session keys.',
    provider: 'openf1',
    pathTemplate: '/sessions',
    params: [
      seasonParam(FIRST_OPENF1_SEASON),
      {
        name: 'country_name',
        type: 'string',
        description: 'Country of the event (e.g. "Monaco").',
        required: false,
      },
      {
        name: 'session_name',
        type: 'string',
        description: 'Session name (e.g. "Race", "Qualifying", "Practice 1").',
        required: false,
      },
    ],
  },
  {
    name: 'get_drivers',
    description: 'Get the drivers (name, team, number) taking part in a session.',
    provider: 'openf1',
    pathTemplate: '/drivers',
    params: [sessionKeyParam, driverNumberParam(false)],
  },
  {
    name: 'get_session_laps',
    description:
      'Get lap times and sector times for a session, column-wise. Each lap carries its date_start, ' +
      'usable as a get_car_telemetry time bound.',
    provider: 'openf1',
    pathTemplate: '/laps',
    params: [sessionKeyParam, driverNumberParam(false), lapNumberParam],
    tabular: true,
  },
  {
    name: 'get_car_telemetry',
    description:
      "Get a driver's car telemetry (speed, throttle, brake, gear, rpm, DRS), column-wise. " +
      'Bound it with date_from / date_to (e.g. one lap) to keep the response small.',
    provider: 'openf1',
    pathTemplate: '/car_data',
    params: [
      sessionKeyParam,
      driverNumberParam(true),
      dateBoundParam('date_from', 'date>=', 'Only samples at or after this time (ISO 8601).'),
      dateBoundParam('date_to', 'date<=', 'Only samples at or before this time (ISO 8601).'),
    ],
    tabular: true,
  },
];

export const f1ServerDefinition: ServerDefinition = {
  name: 'f1-data',
  version: '0.1.0',
  providers: ['ergast', 'openf1'],
  tools: f1Tools,
};
