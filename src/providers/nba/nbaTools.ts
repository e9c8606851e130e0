// src/providers/nba/nbaTools.ts

/**
 * NBA tool table (SportRadar NBA v8).
 */

import type { ToolSpec } from '../../dispatch/domain/ToolSpec';
import type { ServerDefinition } from '../ServerDefinition';
import {
  dateParams,
  idParam,
  localeParam,
  seasonTypeParam,
  yearParam,
} from '../sportradar/commonParams';
import {
  formatGameSummary,
  formatPlayerProfile,
  formatTeamRoster,
  shapeLeaders,
  shapeStandings,
} from './nbaFormatters';

const gameId = idParam('game_id', 'SportRadar game id (GUID).');
const playerId = idParam('player_id', 'SportRadar player id (GUID).');
const teamId = idParam('team_id', 'SportRadar team id (GUID).');

export const NBA_LEADER_CATEGORIES = [
  'points',
  'rebounds',
  'assists',
  'steals',
  'blocks',
  'efficiency',
  'three_points_made',
  'field_goals_pct',
  'free_throws_pct',
] as const;

export const nbaTools: readonly ToolSpec[] = [
  {
    name: 'get_daily_schedule',
    description: 'Get the NBA schedule for a specific date.',
    provider: 'nba',
    pathTemplate: '/{locale}/games/{year}/{month}/{day}/schedule.json',
    params: [...dateParams, localeParam],
  },
  {
    name: 'get_game_summary',
    description: 'Get summary information (status, teams, score by period) for an NBA game.',
    provider: 'nba',
    pathTemplate: '/{locale}/games/{game_id}/summary.json',
    params: [gameId, localeParam],
    shape: formatGameSummary,
  },
  {
    name: 'get_game_boxscore',
    description: 'Get the detailed boxscore for an NBA game.',
    provider: 'nba',
    pathTemplate: '/{locale}/games/{game_id}/boxscore.json',
    params: [gameId, localeParam],
  },
  {
    name: 'get_game_play_by_play',
    description: 'Get play-by-play data for an NBA game.',
    provider: 'nba',
    pathTemplate: '/{locale}/games/{game_id}/pbp.json',
    params: [gameId, localeParam],
  },
  {
    name: 'get_standings',
    description: 'Get NBA standings for a season, optionally one conference (East/West).',
    provider: 'nba',
    pathTemplate: '/{locale}/seasons/{year}/standings.json',
    params: [
      yearParam(true),
      {
        name: 'conference',
        type: 'string',
        description: 'Conference to keep: EAST or WEST.',
        required: false,
        enum: ['EAST', 'WEST', 'EASTERN', 'WESTERN'],
        normalize: 'upper',
        location: 'local',
      },
      localeParam,
    ],
    shape: shapeStandings,
  },
  {
    name: 'get_player_profile',
    description: 'Get biographical and career information for an NBA player.',
    provider: 'nba',
    pathTemplate: '/{locale}/players/{player_id}/profile.json',
    params: [playerId, localeParam],
    shape: formatPlayerProfile,
  },
  {
    name: 'get_player_seasonal_stats',
    description: 'Get regular-season statistics for an NBA player.',
    provider: 'nba',
    pathTemplate: '/{locale}/seasons/{year}/REG/players/{player_id}/statistics.json',
    params: [playerId, yearParam(false), localeParam],
  },
  {
    name: 'get_team_profile',
    description: 'Get profile information for an NBA team.',
    provider: 'nba',
    pathTemplate: '/{locale}/teams/{team_id}/profile.json',
    params: [teamId, localeParam],
  },
  {
    name: 'get_team_roster',
    description: 'Get the current roster of an NBA team, grouped by position.',
    provider: 'nba',
    pathTemplate: '/{locale}/teams/{team_id}/profile.json',
    params: [teamId, localeParam],
    shape: formatTeamRoster,
  },
  {
    name: 'get_seasonal_statistics',
    description: 'Get seasonal statistics for an NBA team.',
    provider: 'nba',
    pathTemplate: '/{locale}/seasons/{year}/{season_type}/teams/{team_id}/statistics.json',
    params: [teamId, yearParam(false), seasonTypeParam, localeParam],
  },
  {
    name: 'get_league_leaders',
    description: 'Get NBA league leaders for a season, optionally one statistical category.',
    provider: 'nba',
    pathTemplate: '/{locale}/seasons/{year}/leaders.json',
    params: [
      yearParam(false),
      {
        name: 'category',
        type: 'string',
        description: `Leader category: ${NBA_LEADER_CATEGORIES.join(', ')}.`,
        required: false,
        default: 'points',
        enum: NBA_LEADER_CATEGORIES,
        normalize: 'lower',
        location: 'local',
      },
      localeParam,
    ],
    shape: shapeLeaders,
  },
  {
    name: 'get_rankings',
    description: 'Get NBA conference and division rankings for a regular season.',
    provider: 'nba',
    pathTemplate: '/{locale}/seasons/{year}/REG/rankings.json',
    params: [yearParam(false), localeParam],
  },
  {
    name: 'get_injuries',
    description: 'Get the current NBA injury report.',
    provider: 'nba',
    pathTemplate: '/{locale}/league/injuries.json',
    params: [localeParam],
  },
  {
    name: 'get_team_hierarchy',
    description: 'Get the NBA hierarchy (conferences, divisions, teams).',
    provider: 'nba',
    pathTemplate: '/{locale}/league/hierarchy.json',
    params: [localeParam],
  },
  {
    name: 'get_team_depth_chart',
    description: 'Get the depth chart of an NBA team.',
    provider: 'nba',
    pathTemplate: '/{locale}/teams/{team_id}/depth_chart.json',
    params: [teamId, localeParam],
  },
];

export const nbaServerDefinition: ServerDefinition = {
  name: 'nba-sportradar',
  version: '0.1.0',
  providers: ['nba'],
  tools: nbaTools,
};
