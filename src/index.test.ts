import { describe, test, expect } from 'vitest';
import { createGridHash, aabbOverlap, vec2, vec2Add } from './index';

describe('package entry', () => {
  test('broad phase then exact filter, end to end', () => {
    const player = { id: 1, x: 0, y: 0, w: 8, h: 8 };
    const coin = { id: 2, x: 6, y: 6, w: 4, h: 4 };
    const wall = { id: 3, x: 40, y: 0, w: 8, h: 40 };
    const entities = [player, coin, wall];
    const hash = createGridHash<number>({ spacing: 16, maxEntries: 16 });
    const byId = new Map(entities.map(e => [e.id, e]));

    hash.populateWith(entities, e => e.id);

    const hits: number[] = [];
    hash.queryUnique(player, id => {
      const other = byId.get(id);
      if (other && other !== player && aabbOverlap(player, other)) hits.push(id);
    });

    expect(hits).toEqual([2]);
    expect(vec2Add(vec2(player.x, player.y), vec2(1, 1))).toEqual({ x: 1, y: 1 });
  });
});
