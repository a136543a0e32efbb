import { describe, it, expect } from 'vitest';
import { MinFrontier } from '../frontier.js';

describe('MinFrontier', () => {
  it('pops the smallest key first', () => {
    const frontier = new MinFrontier<string>();
    frontier.push('c', 3);
    frontier.push('a', 1);
    frontier.push('d', 4);
    frontier.push('b', 2);
    const out: string[] = [];
    for (let next = frontier.pop(); next; next = frontier.pop()) out.push(next.item);
    expect(out).toEqual(['a', 'b', 'c', 'd']);
    expect(frontier.size).toBe(0);
  });

  it('keeps insertion order among equal keys', () => {
    const frontier = new MinFrontier<number>();
    for (const id of [5, 3, 9, 1]) frontier.push(id, 2);
    frontier.push(7, 1);
    const out: number[] = [];
    for (let next = frontier.pop(); next; next = frontier.pop()) out.push(next.item);
    expect(out).toEqual([7, 5, 3, 9, 1]);
  });

  it('returns undefined when empty', () => {
    expect(new MinFrontier<number>().pop()).toBeUndefined();
  });
});
