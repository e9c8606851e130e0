// src/providers/mlb/mlbTools.ts

/**
 * MLB tool table (SportRadar MLB v8).
 *
 * Every path is relative to the provider base URL
 * (https://api.sportradar.com/mlb/{access_level}/v8).
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
} from './mlbFormatters';

const gameId = idParam('game_id', 'SportRadar game id (GUID).');
const playerId = idParam('player_id', 'SportRadar player id (GUID).');
const teamId = idParam('team_id', 'SportRadar team id (GUID).');

export const mlbTools: readonly ToolSpec[] = [
  {
    name: 'get_daily_schedule',
    description: 'Get the MLB schedule for a specific date.',
    provider: 'mlb',
    pathTemplate: '/{locale}/games/{year}/{month}/{day}/schedule.json',
    params: [...dateParams, localeParam],
  },
  {
    name: 'get_game_summary',
    description: 'Get summary information (status, teams, line score, venue) for an MLB game.',
    provider: 'mlb',
    pathTemplate: '/{locale}/games/{game_id}/summary.json',
    params: [gameId, localeParam],
    shape: formatGameSummary,
  },
  {
    name: 'get_game_boxscore',
    description: 'Get the detailed boxscore for an MLB game.',
    provider: 'mlb',
    pathTemplate: '/{locale}/games/{game_id}/boxscore.json',
    params: [gameId, localeParam],
  },
  {
    name: 'get_game_play_by_play',
    description: 'Get play-by-play data for an MLB game.',
    provider: 'mlb',
    pathTemplate: '/{locale}/games/{game_id}/pbp.json',
    params: [gameId, localeParam],
  },
  {
    name: 'get_game_pitch_metrics',
    description: 'Get pitch-level metrics and Statcast data for an MLB game.',
    provider: 'mlb',
    pathTemplate: '/{locale}/games/{game_id}/pitch_metrics.json',
    params: [gameId, localeParam],
  },
  {
    name: 'get_standings',
    description: 'Get MLB standings for a season, optionally restricted to one league (AL/NL).',
    provider: 'mlb',
    pathTemplate: '/{locale}/seasons/{year}/standings.json',
    params: [
      yearParam(true),
      {
        name: 'league',
        type: 'string',
        description: 'League alias to keep: AL or NL.',
        required: false,
        enum: ['AL', 'NL'],
        normalize: 'upper',
        location: 'local',
      },
      localeParam,
    ],
    shape: shapeStandings,
  },
  {
    name: 'get_player_profile',
    description: 'Get biographical and career information for an MLB player.',
    provider: 'mlb',
    pathTemplate: '/{locale}/players/{player_id}/profile.json',
    params: [playerId, localeParam],
    shape: formatPlayerProfile,
  },
  {
    name: 'get_player_seasonal_stats',
    description: 'Get seasonal statistics for an MLB player.',
    provider: 'mlb',
    pathTemplate: '/{locale}/players/{player_id}/seasons/{year}/statistics.json',
    params: [playerId, yearParam(false), localeParam],
  },
  {
    name: 'get_seasonal_splits',
    description: 'Get seasonal splits for an MLB player (home/away, vs left/right, ...).',
    provider: 'mlb',
    pathTemplate: '/{locale}/players/{player_id}/seasons/{year}/splits.json',
    params: [playerId, yearParam(false), localeParam],
  },
  {
    name: 'get_seasonal_pitch_metrics',
    description: "Get Statcast pitch metrics for an MLB player's season.",
    provider: 'mlb',
    pathTemplate: '/{locale}/players/{player_id}/seasons/{year}/pitch_metrics.json',
    params: [playerId, yearParam(false), localeParam],
  },
  {
    name: 'get_team_profile',
    description: 'Get profile information for an MLB team.',
    provider: 'mlb',
    pathTemplate: '/{locale}/teams/{team_id}/profile.json',
    params: [teamId, localeParam],
  },
  {
    name: 'get_team_roster',
    description: 'Get the current roster of an MLB team, grouped by position.',
    provider: 'mlb',
    pathTemplate: '/{locale}/teams/{team_id}/roster.json',
    params: [teamId, localeParam],
    shape: formatTeamRoster,
  },
  {
    name: 'get_seasonal_statistics',
    description: 'Get seasonal statistics for an MLB team.',
    provider: 'mlb',
    pathTemplate: '/{locale}/seasons/{year}/{season_type}/teams/{team_id}/statistics.json',
    params: [teamId, yearParam(false), seasonTypeParam, localeParam],
  },
  {
    name: 'get_league_leaders',
    description: 'Get MLB league leaders for a season, optionally one category (hitting/pitching).',
    provider: 'mlb',
    pathTemplate: '/{locale}/seasons/{year}/leaders.json',
    params: [
      yearParam(false),
      {
        name: 'category',
        type: 'string',
        description: 'Leader category: hitting or pitching.',
        required: false,
        default: 'hitting',
        enum: ['hitting', 'pitching'],
        normalize: 'lower',
        location: 'local',
      },
      localeParam,
    ],
    shape: shapeLeaders,
  },
  {
    name: 'get_statcast_leaders',
    description: 'Get Statcast leaderboards (exit_velocity, launch_angle, barrel_rate, ...).',
    provider: 'mlb',
    pathTemplate: '/{locale}/seasons/{year}/statcast_leaders.json',
    params: [
      yearParam(false),
      {
        name: 'category',
        type: 'string',
        description: 'Leaderboard keyword, e.g. exit_velocity.',
        required: false,
        default: 'exit_velocity',
        normalize: 'lower',
        location: 'local',
      },
      localeParam,
    ],
    shape: shapeLeaders,
  },
  {
    name: 'get_injuries',
    description: 'Get the current MLB injury report.',
    provider: 'mlb',
    pathTemplate: '/{locale}/injuries.json',
    params: [localeParam],
  },
  {
    name: 'get_daily_transactions',
    description: 'Get MLB transactions for a specific date.',
    provider: 'mlb',
    pathTemplate: '/{locale}/league/{year}/{month}/{day}/transactions.json',
    params: [...dateParams, localeParam],
  },
  {
    name: 'get_recent_transactions',
    description: 'Get recent MLB transactions.',
    provider: 'mlb',
    pathTemplate: '/{locale}/league/transactions.json',
    params: [localeParam],
  },
  {
    name: 'get_draft_summary',
    description: 'Get the MLB draft summary for a year.',
    provider: 'mlb',
    pathTemplate: '/{locale}/league/drafts/{year}/summary.json',
    params: [yearParam(true), localeParam],
  },
  {
    name: 'get_team_hierarchy',
    description: 'Get the MLB league hierarchy (leagues, divisions, teams).',
    provider: 'mlb',
    pathTemplate: '/{locale}/league/hierarchy.json',
    params: [localeParam],
  },
];

export const mlbServerDefinition: ServerDefinition = {
  name: 'mlb-sportradar',
  version: '0.1.0',
  providers: ['mlb'],
  tools: mlbTools,
};
