/**
 * Shape steps for Jolpica (Ergast-compatible) payloads.
 *
 * Every Ergast document is wrapped in MRData → <Table> → <List>. These
 * steps unwrap it and flatten the driver / constructor sub-objects.
 */

import type { ResolvedArguments } from '../../dispatch/domain/ToolSpec';
import {
  asArray,
  asRecord,
  isRecord,
  readOr,
  readString,
  readText,
  type JsonRecord,
} from '../shape';

const SESSION_KEYS: Readonly<Record<string, string>> = {
  FirstPractice: 'first_practice',
  SecondPractice: 'second_practice',
  ThirdPractice: 'third_practice',
  SprintQualifying: 'sprint_qualifying',
  SprintShootout: 'sprint_qualifying',
  Sprint: 'sprint',
  Qualifying: 'qualifying',
};

/**
 * Ergast serializes every scalar as a string; numeric ones are turned
 * back into numbers here.
 */
function readInt(obj: JsonRecord, key: string): number | null {
  const raw = readText(obj, key);
  if (raw.length === 0) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

function dateTime(obj: JsonRecord): JsonRecord {
  return {
    date: readString(obj, 'date'),
    ...(obj.time !== undefined ? { time: readString(obj, 'time') } : {}),
  };
}

function raceTable(payload: unknown): JsonRecord {
  return asRecord(asRecord(asRecord(payload).MRData).RaceTable);
}

function driverName(driver: JsonRecord): string {
  return `${readText(driver, 'givenName')} ${readText(driver, 'familyName')}`.trim();
}

function formatDriver(value: unknown): JsonRecord {
  const driver = asRecord(value);
  return {
    id: readString(driver, 'driverId'),
    name: driverName(driver),
    code: readString(driver, 'code'),
    number: readInt(driver, 'permanentNumber'),
    nationality: readString(driver, 'nationality'),
  };
}

function formatRace(race: JsonRecord): JsonRecord {
  const circuit = asRecord(race.Circuit);
  const location = asRecord(circuit.Location);

  const sessions: JsonRecord = {};
  for (const [key, name] of Object.entries(SESSION_KEYS)) {
    const session = race[key];
    if (isRecord(session)) {
      sessions[name] = dateTime(session);
    }
  }
  sessions.race = dateTime(race);

  return {
    season: readInt(race, 'season'),
    round: readInt(race, 'round'),
    race_name: readString(race, 'raceName'),
    circuit: {
      id: readString(circuit, 'circuitId'),
      name: readString(circuit, 'circuitName'),
      locality: readString(location, 'locality'),
      country: readString(location, 'country'),
    },
    sessions,
  };
}

export function shapeEventSchedule(payload: unknown): JsonRecord {
  const table = raceTable(payload);
  const races = asArray(table.Races).filter(isRecord).map(formatRace);
  return { season: readInt(table, 'season'), total: races.length, races };
}

export function shapeEventInfo(payload: unknown): JsonRecord {
  const race = asArray(raceTable(payload).Races).find(isRecord);
  return race ? formatRace(race) : {};
}

const RESULT_LISTS: Readonly<Record<string, string>> = {
  results: 'Results',
  qualifying: 'QualifyingResults',
  sprint: 'SprintResults',
};

function formatResultRow(row: JsonRecord): JsonRecord {
  const team = asRecord(row.Constructor);
  const formatted: JsonRecord = {
    position: readInt(row, 'position'),
    driver: formatDriver(row.Driver),
    constructor: readString(team, 'name'),
  };

  for (const key of ['Q1', 'Q2', 'Q3']) {
    if (row[key] !== undefined) formatted[key.toLowerCase()] = readString(row, key);
  }
  if (row.grid !== undefined) formatted.grid = readInt(row, 'grid');
  if (row.laps !== undefined) formatted.laps = readInt(row, 'laps');
  if (row.points !== undefined) formatted.points = readInt(row, 'points');
  if (row.status !== undefined) formatted.status = readString(row, 'status');
  if (isRecord(row.Time)) formatted.time = readString(row.Time, 'time');
  if (isRecord(row.FastestLap)) {
    formatted.fastest_lap = readString(asRecord(row.FastestLap.Time), 'time');
  }

  return formatted;
}

/**
 * Results of one session (race, qualifying or sprint) of one round.
 */
export function shapeSessionResults(payload: unknown, args: ResolvedArguments): JsonRecord {
  const session = typeof args.session === 'string' ? args.session : 'results';
  const race = asArray(raceTable(payload).Races).find(isRecord);
  if (!race) {
    return { session, results: [] };
  }

  const listKey = RESULT_LISTS[session] ?? 'Results';

  return {
    season: readInt(race, 'season'),
    round: readInt(race, 'round'),
    race_name: readString(race, 'raceName'),
    session,
    results: asArray(race[listKey]).filter(isRecord).map(formatResultRow),
  };
}

function standingsList(payload: unknown): JsonRecord | undefined {
  const table = asRecord(asRecord(asRecord(payload).MRData).StandingsTable);
  return asArray(table.StandingsLists).find(isRecord);
}

export function shapeDriverStandings(payload: unknown): JsonRecord {
  const list = standingsList(payload);
  if (!list) {
    return { standings: [] };
  }

  return {
    season: readInt(list, 'season'),
    round: readInt(list, 'round'),
    standings: asArray(list.DriverStandings)
      .filter(isRecord)
      .map((row) => ({
        position: readInt(row, 'position'),
        points: readInt(row, 'points'),
        wins: readInt(row, 'wins'),
        driver: formatDriver(row.Driver),
        constructors: asArray(row.Constructors)
          .filter(isRecord)
          .map((c) => readText(c, 'name')),
      })),
  };
}

export function shapeConstructorStandings(payload: unknown): JsonRecord {
  const list = standingsList(payload);
  if (!list) {
    return { standings: [] };
  }

  return {
    season: readInt(list, 'season'),
    round: readInt(list, 'round'),
    standings: asArray(list.ConstructorStandings)
      .filter(isRecord)
      .map((row) => {
        const team = asRecord(row.Constructor);
        return {
          position: readInt(row, 'position'),
          points: readInt(row, 'points'),
          wins: readInt(row, 'wins'),
          constructor: {
            id: readString(team, 'constructorId'),
            name: readString(team, 'name'),
            nationality: readOr(team, 'nationality', ''),
          },
        };
      }),
  };
}
