import {
  InvalidToolSpecError,
  ToolRegistry,
  validateToolSpecs,
} from '../../src/dispatch/application/ToolRegistry';
import type { ToolSpec } from '../../src/dispatch/domain/ToolSpec';

const summary: ToolSpec = {
  name: 'get_game_summary',
  description: 'Game summary.',
  provider: 'mlb',
  pathTemplate: '/{locale}/games/{game_id}/summary.json',
  params: [
    { name: 'game_id', type: 'string', description: 'Game.', required: true },
    { name: 'locale', type: 'string', description: 'Language.', required: false, default: 'en' },
  ],
};

describe('ToolRegistry', () => {
  it('looks tools up by name and lists them in order', () => {
    const injuries: ToolSpec = {
      name: 'get_injuries',
      description: 'Injuries.',
      provider: 'mlb',
      pathTemplate: '/en/injuries.json',
      params: [],
    };
    const registry = new ToolRegistry([summary, injuries], ['mlb']);

    expect(registry.get('get_injuries')?.pathTemplate).toBe('/en/injuries.json');
    expect(registry.get('nope')).toBeUndefined();
    expect(registry.list().map((t) => t.name)).toEqual(['get_game_summary', 'get_injuries']);
  });

  it('freezes the table', () => {
    const registry = new ToolRegistry([summary]);

    expect(Object.isFrozen(registry.list())).toBe(true);
    expect(Object.isFrozen(registry.get('get_game_summary'))).toBe(true);
  });

  it('rejects a placeholder without a declared param', () => {
    const broken: ToolSpec = { ...summary, pathTemplate: '/{locale}/games/{gameId}/summary.json' };

    expect(() => new ToolRegistry([broken])).toThrow(InvalidToolSpecError);
    expect(validateToolSpecs([broken])).toEqual([
      'get_game_summary: placeholder {gameId} has no declared param.',
    ]);
  });

  it('rejects duplicate names and providers the server does not serve', () => {
    expect(validateToolSpecs([summary, summary], ['nba'])).toEqual([
      'get_game_summary: provider "mlb" is not served here.',
      'Duplicate tool name "get_game_summary".',
      'get_game_summary: provider "mlb" is not served here.',
    ]);
  });

  it('rejects optional path params without a default', () => {
    const broken: ToolSpec = {
      ...summary,
      params: [
        { name: 'game_id', type: 'string', description: 'Game.', required: true },
        { name: 'locale', type: 'string', description: 'Language.', required: false },
      ],
    };

    expect(validateToolSpecs([broken])).toEqual([
      'get_game_summary: optional path param "locale" needs a default.',
    ]);
  });

  it('only accepts a queryName on params sent as query values', () => {
    const broken: ToolSpec = {
      ...summary,
      params: [
        { name: 'game_id', type: 'string', description: 'Game.', required: true, queryName: 'id' },
        { name: 'locale', type: 'string', description: 'Language.', required: false, default: 'en' },
        { name: 'since', type: 'string', description: 'Since.', required: false, queryName: 'date>=' },
      ],
    };

    expect(validateToolSpecs([broken])).toEqual([
      'get_game_summary: queryName on non-query param "game_id".',
    ]);
  });
});
