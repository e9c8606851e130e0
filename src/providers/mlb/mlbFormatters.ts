/**
 * Shape steps for MLB payloads: flatten the nested SportRadar documents
 * into the fields an assistant usually needs.
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

function formatTeamLine(team: JsonRecord): JsonRecord {
  return {
    id: readString(team, 'id'),
    name: readString(team, 'name'),
    market: readString(team, 'market'),
    abbr: readString(team, 'abbr'),
    runs: readNumber(team, 'runs'),
    hits: readNumber(team, 'hits'),
    errors: readNumber(team, 'errors'),
  };
}

/**
 * summary.json → id, status, schedule and the line score of each side.
 */
export function formatGameSummary(payload: unknown): JsonRecord {
  const root = asRecord(payload);
  const game = isRecord(root.game) ? root.game : root;
  if (isEmpty(game)) {
    return {};
  }

  return {
    game_id: readString(game, 'id'),
    status: readString(game, 'status'),
    scheduled: readString(game, 'scheduled'),
    home_team: isRecord(game.home) ? formatTeamLine(game.home) : {},
    away_team: isRecord(game.away) ? formatTeamLine(game.away) : {},
    venue: readOr(game, 'venue', {}),
    broadcast: readOr(game, 'broadcast', {}),
  };
}

function formatStandingTeam(team: JsonRecord): JsonRecord {
  return {
    id: readString(team, 'id'),
    name: readString(team, 'name'),
    market: readString(team, 'market'),
    abbr: readString(team, 'abbr'),
    win: readNumber(team, 'win'),
    loss: readNumber(team, 'loss'),
    pct: readNumber(team, 'win_p'),
    gb: readNumber(team, 'games_back'),
    streak: readString(team, 'streak'),
    home: winLoss(readNumber(team, 'home_win'), readNumber(team, 'home_loss')),
    away: winLoss(readNumber(team, 'away_win'), readNumber(team, 'away_loss')),
  };
}

/**
 * standings.json → leagues → divisions → team records.
 * Payloads without a "standings" key pass through unchanged.
 */
export function formatStandings(payload: unknown): unknown {
  const root = asRecord(payload);
  if (!isRecord(root.standings)) {
    return payload;
  }

  const leagues = asArray(root.standings.leagues)
    .filter(isRecord)
    .map((league) => ({
      id: readString(league, 'id'),
      name: readString(league, 'name'),
      alias: readString(league, 'alias'),
      divisions: asArray(league.divisions)
        .filter(isRecord)
        .map((division) => ({
          id: readString(division, 'id'),
          name: readString(division, 'name'),
          alias: readString(division, 'alias'),
          teams: asArray(division.teams).filter(isRecord).map(formatStandingTeam),
        })),
    }));

  return { season: readOr(root, 'season', {}), leagues };
}

/**
 * Standings restricted to one league (AL / NL). An alias that matches
 * nothing leaves every league in place.
 */
export function shapeStandings(payload: unknown, args: ResolvedArguments): unknown {
  const formatted = formatStandings(payload);
  const league = args.league;

  if (typeof league !== 'string' || !isRecord(formatted)) {
    return formatted;
  }

  const matching = asArray(formatted.leagues)
    .filter(isRecord)
    .filter((l) => readText(l, 'alias').toUpperCase() === league.toUpperCase());

  return matching.length > 0 ? { ...formatted, leagues: matching } : formatted;
}

export function formatPlayerProfile(payload: unknown): JsonRecord {
  const root = asRecord(payload);
  const player = isRecord(root.player) ? root.player : root;
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
    throw_hand: readString(player, 'throw_hand'),
    bat_hand: readString(player, 'bat_hand'),
    high_school: readString(player, 'high_school'),
    college: readString(player, 'college'),
    draft: readOr(player, 'draft', {}),
    team: team
      ? {
          id: readString(team, 'id'),
          name: readString(team, 'name'),
          market: readString(team, 'market'),
          abbr: readString(team, 'abbr'),
        }
      : {},
    ...(player.seasons !== undefined ? { seasons: player.seasons } : {}),
  };
}

type MlbRosterGroup =
  | 'pitchers'
  | 'catchers'
  | 'infielders'
  | 'outfielders'
  | 'designated_hitters'
  | 'others';

export function mlbRosterGroup(primaryPosition: string): MlbRosterGroup {
  switch (primaryPosition.toUpperCase()) {
    case 'P':
    case 'SP':
    case 'RP':
    case 'CL':
      return 'pitchers';
    case 'C':
      return 'catchers';
    case '1B':
    case '2B':
    case '3B':
    case 'SS':
    case 'IF':
      return 'infielders';
    case 'LF':
    case 'CF':
    case 'RF':
    case 'OF':
      return 'outfielders';
    case 'DH':
      return 'designated_hitters';
    default:
      return 'others';
  }
}

/**
 * roster.json → team header plus players grouped by primary position.
 */
export function formatTeamRoster(payload: unknown): JsonRecord {
  const root = asRecord(payload);
  if (isEmpty(root)) {
    return {};
  }

  const players: Record<MlbRosterGroup, JsonRecord[]> = {
    pitchers: [],
    catchers: [],
    infielders: [],
    outfielders: [],
    designated_hitters: [],
    others: [],
  };

  for (const player of asArray(root.players).filter(isRecord)) {
    const primaryPosition = readString(player, 'primary_position');
    players[mlbRosterGroup(primaryPosition ?? '')].push({
      id: readString(player, 'id'),
      first_name: readString(player, 'first_name'),
      last_name: readString(player, 'last_name'),
      full_name: fullName(player),
      jersey_number: readString(player, 'jersey_number'),
      position: readString(player, 'position'),
      primary_position: primaryPosition,
      status: readString(player, 'status'),
    });
  }

  return {
    team: {
      id: readString(root, 'id'),
      name: readString(root, 'name'),
      market: readString(root, 'market'),
      abbr: readString(root, 'abbr'),
    },
    players,
  };
}

/**
 * Keep only the leader boards whose key mentions the requested category.
 * Falls back to the full payload when nothing matches.
 */
export function shapeLeaders(payload: unknown, args: ResolvedArguments): unknown {
  const category = args.category;
  const root = asRecord(payload);

  if (typeof category !== 'string' || !isRecord(root.leaders)) {
    return payload;
  }

  const leaders = pickKeysContaining(root.leaders, category);
  if (isEmpty(leaders)) {
    return payload;
  }

  return {
    leaders,
    category,
    ...(args.year !== undefined ? { year: args.year } : {}),
  };
}
