import { ToolRegistry } from '../../src/dispatch/application/ToolRegistry';
import { parseToolArguments } from '../../src/dispatch/dto/ToolArgumentsDto';
import { f1ServerDefinition } from '../../src/providers/f1/f1Tools';
import { mlbServerDefinition } from '../../src/providers/mlb/mlbTools';
import { nbaServerDefinition } from '../../src/providers/nba/nbaTools';

describe('tool catalogues', () => {
  it.each([mlbServerDefinition, nbaServerDefinition, f1ServerDefinition])(
    '$name builds a valid registry',
    (definition) => {
      const registry = new ToolRegistry(definition.tools, definition.providers);
      expect(registry.list()).toHaveLength(definition.tools.length);
    },
  );

  it('exposes the expected MLB tools', () => {
    const names = mlbServerDefinition.tools.map((t) => t.name);
    expect(names).toHaveLength(20);
    expect(names).toEqual(
      expect.arrayContaining(['get_daily_schedule', 'get_standings', 'get_league_leaders', 'get_injuries']),
    );
  });

  it('exposes the expected NBA tools', () => {
    const names = nbaServerDefinition.tools.map((t) => t.name);
    expect(names).toHaveLength(15);
    expect(names).toEqual(expect.arrayContaining(['get_rankings', 'get_team_depth_chart']));
  });

  it('serves Ergast and OpenF1 tools from one F1 server', () => {
    expect(f1ServerDefinition.providers).toEqual(['ergast', 'openf1']);
    expect(new Set(f1ServerDefinition.tools.map((t) => t.provider))).toEqual(
      new Set(['ergast', 'openf1']),
    );
  });

  it('zero-pads month and day of the dated MLB endpoints', () => {
    const spec = new ToolRegistry(mlbServerDefinition.tools).get('get_daily_schedule');
    if (!spec) throw new Error('get_daily_schedule missing');

    const parsed = parseToolArguments(spec, { year: 2024, month: 9, day: 1 });

    expect(parsed.path).toEqual({ year: 2024, month: '09', day: '01', locale: 'en' });
  });

  it('defaults the standings round to "last" and rejects other words', () => {
    const spec = new ToolRegistry(f1ServerDefinition.tools).get('get_driver_standings');
    if (!spec) throw new Error('get_driver_standings missing');

    expect(parseToolArguments(spec, { year: 2024 }).path).toEqual({ year: 2024, round: 'last' });
    expect(parseToolArguments(spec, { year: 2024, round: 5 }).path).toEqual({ year: 2024, round: '5' });
    expect(() => parseToolArguments(spec, { year: 2024, round: 'first' })).toThrow();
  });

  it('filters OpenF1 laps by lap number', () => {
    const spec = new ToolRegistry(f1ServerDefinition.tools).get('get_session_laps');
    if (!spec) throw new Error('get_session_laps missing');

    const parsed = parseToolArguments(spec, { session_key: '9161', driver_number: 16, lap_number: '12' });

    expect(parsed.query).toEqual({ session_key: '9161', driver_number: 16, lap_number: 12 });
    expect(() => parseToolArguments(spec, { session_key: '9161', lap_number: 0 })).toThrow(
      'Invalid parameter(s): "lap_number" must be >= 1.',
    );
  });

  it('sends car telemetry time bounds under the OpenF1 range keys', () => {
    const spec = new ToolRegistry(f1ServerDefinition.tools).get('get_car_telemetry');
    if (!spec) throw new Error('get_car_telemetry missing');

    const parsed = parseToolArguments(spec, {
      session_key: 'latest',
      driver_number: 1,
      date_from: '2024-09-01T13:03:35.200+00:00',
      date_to: '2024-09-01T13:05:01Z',
    });

    expect(parsed.query).toEqual({
      session_key: 'latest',
      driver_number: 1,
      'date>=': '2024-09-01T13:03:35.200+00:00',
      'date<=': '2024-09-01T13:05:01Z',
    });
    expect(parsed.all).toMatchObject({ date_from: '2024-09-01T13:03:35.200+00:00' });
    expect(() =>
      parseToolArguments(spec, { session_key: 'latest', driver_number: 1, date_from: 'lap 12' }),
    ).toThrow(/"date_from" must match/);
  });
});
