/**
 * @fileoverview Tests for index remapping
 */

import { describe, it, expect } from 'vitest';
import { remapIndexes, retargetIndexes } from '../index-remapper.js';
import { createIndex } from '../../model/table-index.js';

describe('remapIndexes', () => {
  const byName = createIndex('by_name', 'people', { columns: ['last', 'first'], where: 'last IS NOT NULL' });
  const byEmail = createIndex('by_email', 'people', { columns: ['email'], unique: true });

  it('should rewrite columns through the rename map', () => {
    const result = remapIndexes(
      [byName, byEmail],
      new Map([
        ['last', 'surname'],
        ['first', 'given'],
        ['email', 'email'],
      ])
    );

    expect(result.indexes.map((index) => index.columns)).toEqual([['surname', 'given'], ['email']]);
    expect(result.dropped).toEqual([]);
  });

  it('should keep where clauses verbatim', () => {
    const [remapped] = remapIndexes(
      [byName],
      new Map([
        ['last', 'surname'],
        ['first', 'first'],
      ])
    ).indexes;
    expect(remapped?.where).toBe('last IS NOT NULL');
  });

  it('should drop an index when any of its columns is gone', () => {
    const result = remapIndexes([byName, byEmail], new Map([['last', 'last'], ['email', 'email']]));

    expect(result.indexes).toEqual([byEmail]);
    expect(result.dropped).toEqual(['by_name']);
  });
});

describe('retargetIndexes', () => {
  it('should point indexes at the renamed table', () => {
    const index = createIndex('by_email', 'people', { columns: ['email'] });
    expect(retargetIndexes([index], 'persons')).toEqual([{ ...index, tableName: 'persons' }]);
    expect(index.tableName).toBe('people');
  });
});
