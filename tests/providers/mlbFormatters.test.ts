import {
  formatGameSummary,
  formatPlayerProfile,
  formatTeamRoster,
  mlbRosterGroup,
  shapeLeaders,
  shapeStandings,
} from '../../src/providers/mlb/mlbFormatters';

const standingsPayload = {
  season: { year: 2024, type: 'REG' },
  standings: {
    leagues: [
      {
        id: 'l-al',
        name: 'American League',
        alias: 'AL',
        divisions: [
          {
            id: 'd-ale',
            name: 'East',
            alias: 'ALE',
            teams: [
              {
                id: 't-nyy',
                name: 'Yankees',
                market: 'New York',
                abbr: 'NYY',
                win: 94,
                loss: 68,
                win_p: 0.58,
                games_back: 0,
                streak: 'W2',
                home_win: 44,
                home_loss: 37,
                away_win: 50,
                away_loss: 31,
              },
            ],
          },
        ],
      },
      { id: 'l-nl', name: 'National League', alias: 'NL', divisions: [] },
    ],
  },
};

describe('MLB formatters', () => {
  it('flattens standings into league → division → team records', () => {
    const shaped = shapeStandings(standingsPayload, {});

    expect(shaped).toEqual({
      season: { year: 2024, type: 'REG' },
      leagues: [
        {
          id: 'l-al',
          name: 'American League',
          alias: 'AL',
          divisions: [
            {
              id: 'd-ale',
              name: 'East',
              alias: 'ALE',
              teams: [
                {
                  id: 't-nyy',
                  name: 'Yankees',
                  market: 'New York',
                  abbr: 'NYY',
                  win: 94,
                  loss: 68,
                  pct: 0.58,
                  gb: 0,
                  streak: 'W2',
                  home: '44-37',
                  away: '50-31',
                },
              ],
            },
          ],
        },
        { id: 'l-nl', name: 'National League', alias: 'NL', divisions: [] },
      ],
    });
  });

  it('keeps only the requested league', () => {
    const shaped = shapeStandings(standingsPayload, { league: 'NL' });

    expect(shaped).toEqual({
      season: { year: 2024, type: 'REG' },
      leagues: [{ id: 'l-nl', name: 'National League', alias: 'NL', divisions: [] }],
    });
  });

  it('keeps unknown figures as null instead of inventing zeros', () => {
    const shaped = shapeStandings(
      {
        standings: {
          leagues: [
            {
              id: 'l-al',
              alias: 'AL',
              divisions: [
                {
                  id: 'd-alc',
                  teams: [{ id: 't-cle', win: 92, loss: 69, win_p: null, games_back: null, home_win: 50 }],
                },
              ],
            },
          ],
        },
      },
      {},
    );

    expect(shaped).toEqual({
      season: {},
      leagues: [
        {
          id: 'l-al',
          name: null,
          alias: 'AL',
          divisions: [
            {
              id: 'd-alc',
              name: null,
              alias: null,
              teams: [
                {
                  id: 't-cle',
                  name: null,
                  market: null,
                  abbr: null,
                  win: 92,
                  loss: 69,
                  pct: null,
                  gb: null,
                  streak: null,
                  home: null,
                  away: null,
                },
              ],
            },
          ],
        },
      ],
    });
  });

  it('passes through payloads without standings', () => {
    const payload = { message: 'no data' };
    expect(shapeStandings(payload, { league: 'AL' })).toBe(payload);
  });

  it('summarizes a game from the summary document', () => {
    const shaped = formatGameSummary({
      game: {
        id: 'g1',
        status: 'closed',
        scheduled: '2024-09-10T23:05:00+00:00',
        home: { id: 'h', name: 'Red Sox', market: 'Boston', abbr: 'BOS', runs: 3, hits: 8, errors: 1 },
        away: { id: 'a', name: 'Orioles', market: 'Baltimore', abbr: 'BAL', runs: 5 },
        venue: { name: 'Fenway Park' },
      },
    });

    expect(shaped).toEqual({
      game_id: 'g1',
      status: 'closed',
      scheduled: '2024-09-10T23:05:00+00:00',
      home_team: { id: 'h', name: 'Red Sox', market: 'Boston', abbr: 'BOS', runs: 3, hits: 8, errors: 1 },
      away_team: { id: 'a', name: 'Orioles', market: 'Baltimore', abbr: 'BAL', runs: 5, hits: null, errors: null },
      venue: { name: 'Fenway Park' },
      broadcast: {},
    });
    expect(formatGameSummary({})).toEqual({});
  });

  it('builds a player profile with full name and team', () => {
    const shaped = formatPlayerProfile({
      player: {
        id: 'p1',
        first_name: 'Aaron',
        last_name: 'Judge',
        primary_position: 'RF',
        team: { id: 't-nyy', name: 'Yankees', market: 'New York', abbr: 'NYY', venue: {} },
        seasons: [{ year: 2024 }],
      },
    });

    expect(shaped).toMatchObject({
      id: 'p1',
      full_name: 'Aaron Judge',
      primary_position: 'RF',
      team: { id: 't-nyy', name: 'Yankees', market: 'New York', abbr: 'NYY' },
      seasons: [{ year: 2024 }],
    });
  });

  it('groups the roster by primary position', () => {
    expect(mlbRosterGroup('sp')).toBe('pitchers');
    expect(mlbRosterGroup('SS')).toBe('infielders');
    expect(mlbRosterGroup('CF')).toBe('outfielders');
    expect(mlbRosterGroup('')).toBe('others');

    const shaped = formatTeamRoster({
      id: 't1',
      name: 'Yankees',
      market: 'New York',
      abbr: 'NYY',
      players: [
        { id: 'p1', first_name: 'Gerrit', last_name: 'Cole', primary_position: 'SP', status: 'A' },
        { id: 'p2', first_name: 'Austin', last_name: 'Wells', primary_position: 'C', status: 'A' },
      ],
    });

    expect(shaped).toMatchObject({
      team: { id: 't1', name: 'Yankees', market: 'New York', abbr: 'NYY' },
      players: {
        pitchers: [{ id: 'p1', full_name: 'Gerrit Cole', primary_position: 'SP' }],
        catchers: [{ id: 'p2', full_name: 'Austin Wells' }],
        infielders: [],
        outfielders: [],
        designated_hitters: [],
        others: [],
      },
    });
  });

  it('filters leader boards by category keyword', () => {
    const payload = {
      leaders: {
        hitting_avg: [{ rank: 1 }],
        pitching_era: [{ rank: 1 }],
      },
    };

    expect(shapeLeaders(payload, { category: 'pitching', year: 2024 })).toEqual({
      leaders: { pitching_era: [{ rank: 1 }] },
      category: 'pitching',
      year: 2024,
    });
    expect(shapeLeaders(payload, { category: 'fielding' })).toBe(payload);
  });
});
