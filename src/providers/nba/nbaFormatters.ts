/**
 * Shape steps for NBA payloads.
 */

import type { ResolvedArguments } from '../../dispatch/domain/ToolSpec';
import {
  asArray,
  asRecord,
  fullName,
  isEmpty,
  isRecord,
  pickKeysContaining,
  readNumber,
  readOr,
  readString,
  readText,
  type JsonRecord,
  winLoss,
} from '../shape';

function formatTeamScore(team: JsonRecord): JsonRecord {
  return {
    id: readString(team, 'id'),
    name: readString(team, 'name'),
    market: readString(team, 'market'),
    alias: readString(team, 'alias'),
    points: readNumber(team, 'points'),
    ...(team.scoring !== undefined ? { scoring: team.scoring } : {}),
  };
}

export function formatGameSummary(payload: unknown): JsonRecord {
  const game = asRecord(payload);
  if (isEmpty(game)) {
    return {};
  }

  return {
    game_id: readString(game, 'id'),
    status: readString(game, 'status'),
    scheduled: readString(game, 'scheduled'),
    home_team: isRecord(game.home) ? formatTeamScore(game.home) : {},
    away_team: isRecord(game.away) ? formatTeamScore(game.away) : {},
    venue: readOr(game, 'venue', {}),
    broadcast: readOr(game, 'broadcast', {}),
  };
}

function formatRecord(value: unknown): string | null {
  const record = asRecord(value);
  return winLoss(readNumber(record, 'wins'), readNumber(record, 'losses'));
}

function formatStandingTeam(team: JsonRecord): JsonRecord {
  return {
    id: readString(team, 'id'),
    name: readString(team, 'name'),
    market: readString(team, 'market'),
    alias: readString(team, 'alias'),
    wins: readNumber(team, 'wins'),
    losses: readNumber(team, 'losses'),
    win_pct: readNumber(team, 'win_pct'),
    games_behind: readNumber(asRecord(team.games_behind), 'division'),
    streak: readOr(team, 'streak', ''),
    home: formatRecord(team.home_record),
    away: formatRecord(team.away_record),
  };
}

export function formatStandings(payload: unknown): unknown {
  const root = asRecord(payload);
  if (!isRecord(root.standings)) {
    return payload;
  }

  const conferences = asArray(root.standings.conferences)
    .filter(isRecord)
    .map((conference) => ({
      id: readString(conference, 'id'),
      name: readString(conference, 'name'),
      alias: readString(conference, 'alias'),
      divisions: asArray(conference.divisions)
        .filter(isRecord)
        .map((division) => ({
          id: readString(division, 'id'),
          name: readString(division, 'name'),
          alias: readString(division, 'alias'),
          teams: asArray(division.teams).filter(isRecord).map(formatStandingTeam),
        })),
    }));

  return { season: readOr(root, 'season', {}), conferences };
}

/**
 * Standings restricted to the Eastern or Western conference, matched on
 * the conference name.
 */
export function shapeStandings(payload: unknown, args: ResolvedArguments): unknown {
  const formatted = formatStandings(payload);
  const conference = args.conference;

  if (typeof conference !== 'string' || !isRecord(formatted)) {
    return formatted;
  }

  const needle = conference.toUpperCase().startsWith('EAST') ? 'EAST' : 'WEST';
  const matching = asArray(formatted.conferences)
    .filter(isRecord)
    .filter((c) => readText(c, 'name').toUpperCase().includes(needle));

  return matching.length > 0 ? { ...formatted, conferences: matching } : formatted;
}

export function formatPlayerProfile(payload: unknown): JsonRecord {
  const player = asRecord(payload);
  if (isEmpty(player)) {
    return {};
  }

  const team = isRecord(player.team) ? player.team : undefined;

  return {
    id: readString(player, 'id'),
    first_name: readString(player, 'first_name'),
    last_name: readString(player, 'last_name'),
    full_name: fullName(player),
    position: readString(player, 'position'),
    primary_position: readString(player, 'primary_position'),
    jersey_number: readString(player, 'jersey_number'),
    status: readString(player, 'status'),
    birth_date: readString(player, 'birth_date'),
    height: readOr(player, 'height', ''),
    weight: readOr(player, 'weight', ''),
    college: readString(player, 'college'),
    high_school: readString(player, 'high_school'),
    draft: readOr(player, 'draft', {}),
    team: team
      ? {
          id: readString(team, 'id'),
          name: readString(team, 'name'),
          market: readString(team, 'market'),
          alias: readString(team, 'alias'),
        }
      : {},
    ...(player.seasons !== undefined ? { seasons: player.seasons } : {}),
  };
}

type NbaRosterGroup = 'guards' | 'forwards' | 'centers' | 'two_way' | 'others';

export function nbaRosterGroup(primaryPosition: string, status: string): NbaRosterGroup {
  switch (primaryPosition.toUpperCase()) {
    case 'G':
    case 'PG':
    case 'SG':
    case 'G-F':
      return 'guards';
    case 'F':
    case 'SF':
    case 'PF':
    case 'F-G':
    case 'F-C':
      return 'forwards';
    case 'C':
    case 'C-F':
      return 'centers';
  }
  return status === 'TWO-WAY' || status === 'TEN-DAY' ? 'two_way' : 'others';
}

/**
 * Team profile → team header plus players grouped by position.
 */
export function formatTeamRoster(payload: unknown): JsonRecord {
  const root = asRecord(payload);
  if (isEmpty(root)) {
    return {};
  }

  const players: Record<NbaRosterGroup, JsonRecord[]> = {
    guards: [],
    forwards: [],
    centers: [],
    two_way: [],
    others: [],
  };

  for (const player of asArray(root.players).filter(isRecord)) {
    const primaryPosition = readString(player, 'primary_position');
    const status = readString(player, 'status');
    players[nbaRosterGroup(primaryPosition ?? '', status ?? '')].push({
      id: readString(player, 'id'),
      first_name: readString(player, 'first_name'),
      last_name: readString(player, 'last_name'),
      full_name: fullName(player),
      jersey_number: readString(player, 'jersey_number'),
      position: readString(player, 'position'),
      primary_position: primaryPosition,
      status,
    });
  }

  return {
    team: {
      id: readString(root, 'id'),
      name: readString(root, 'name'),
      market: readString(root, 'market'),
      alias: readString(root, 'alias'),
    },
    players,
  };
}

/**
 * Keep the leader categories that mention the requested one. Categories
 * arrive either keyed by name or as an array of { name, ... } entries.
 */
export function shapeLeaders(payload: unknown, args: ResolvedArguments): unknown {
  const category = args.category;
  const root = asRecord(payload);

  if (typeof category !== 'string') {
    return payload;
  }

  if (Array.isArray(root.categories)) {
    const needle = category.toLowerCase();
    const matching = root.categories
      .filter(isRecord)
      .filter((c) => readText(c, 'name').toLowerCase().includes(needle));
    return matching.length > 0 ? { categories: matching, category } : payload;
  }

  if (!isRecord(root.categories)) {
    return payload;
  }

  const categories = pickKeysContaining(root.categories, category);
  return isEmpty(categories) ? payload : { categories, category };
}
