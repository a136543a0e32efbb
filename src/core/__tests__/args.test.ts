import { describe, it, expect } from 'vitest';
import { parseArgs } from '../args.js';

describe('parseArgs', () => {
  it('splits positionals from long, inline and short flags', () => {
    expect(parseArgs(['g.json', 'bfs', '--start', '2', '--top-k=3', '-f', 'json', '-'])).toEqual({
      ok: true,
      value: { positionals: ['g.json', 'bfs', '-'], flags: { start: '2', topK: '3', format: 'json' } },
    });
  });

  it('takes a negative number as a value', () => {
    const parsed = parseArgs(['--gravity', '-0.5']);
    expect(parsed).toEqual({ ok: true, value: { positionals: [], flags: { gravity: '-0.5' } } });
  });

  it('rejects a flag at the end with no value', () => {
    expect(parseArgs(['g.json', 'bfs', '--start'])).toEqual({
      ok: false,
      code: 'INVALID_INPUT',
      message: 'Option --start needs a value',
    });
  });

  it('rejects a flag followed by another flag', () => {
    expect(parseArgs(['--target', '--start', '1'])).toMatchObject({ ok: false, message: 'Option --target needs a value' });
    expect(parseArgs(['-o', '-f', 'json'])).toMatchObject({ ok: false, message: 'Option -o needs a value' });
  });

  it('rejects an empty inline value', () => {
    expect(parseArgs(['--start='])).toMatchObject({ ok: false, message: 'Option --start needs a value' });
  });
});
