import { describe, it, expect } from 'vitest';
import { hasCriteria, parseQuery, parseCalendarDate, tokenize } from './queryParser';

describe('tokenize', () => {
  it('splits on any whitespace and drops empty tokens', () => {
    expect(tokenize('  #work \t budget\nmeeting  ')).toEqual(['#work', 'budget', 'meeting']);
  });

  it('returns nothing for a blank string', () => {
    expect(tokenize('   ')).toEqual([]);
  });
});

describe('parseCalendarDate', () => {
  it('parses to local midnight', () => {
    const date = parseCalendarDate('2024-03-05');
    expect(date?.getFullYear()).toBe(2024);
    expect(date?.getMonth()).toBe(2);
    expect(date?.getDate()).toBe(5);
    expect(date?.getHours()).toBe(0);
  });

  it('accepts single-digit month and day', () => {
    expect(parseCalendarDate('2024-3-5')?.getTime()).toBe(new Date(2024, 2, 5).getTime());
  });

  it('rejects out-of-range months and days instead of rolling over', () => {
    expect(parseCalendarDate('2024-13-40')).toBeUndefined();
    expect(parseCalendarDate('2023-02-29')).toBeUndefined();
    expect(parseCalendarDate('2024-02-29')).toBeDefined();
  });

  it('rejects other shapes', () => {
    expect(parseCalendarDate('not-a-date')).toBeUndefined();
    expect(parseCalendarDate('05/03/2024')).toBeUndefined();
    expect(parseCalendarDate('')).toBeUndefined();
  });
});

describe('parseQuery', () => {
  it('returns an empty filter for a blank query', () => {
    const { filter, discarded } = parseQuery('');
    expect(filter).toEqual({
      requiredTags: [],
      tagMatchMode: 'all',
      requireFavorite: false,
      requireHasTask: false,
      requireOverdue: false,
      textTerms: [],
      semanticTerms: [],
    });
    expect(discarded).toEqual([]);
  });

  it('classifies every operator', () => {
    const { filter, discarded } = parseQuery(
      '#Work ~plan is:FAV has:tasks is:overdue priority:HIGH progress:>50 due:2024-03-05 tag:any hello World',
    );

    expect(filter.requiredTags).toEqual(['work']);
    expect(filter.semanticTerms).toEqual(['plan']);
    expect(filter.requireFavorite).toBe(true);
    expect(filter.requireHasTask).toBe(true);
    expect(filter.requireOverdue).toBe(true);
    expect(filter.priority).toBe('high');
    expect(filter.minProgress).toBe(0.5);
    expect(filter.dueBefore?.getTime()).toBe(new Date(2024, 2, 5).getTime());
    expect(filter.tagMatchMode).toBe('any');
    expect(filter.textTerms).toEqual(['hello', 'World']);
    expect(discarded).toEqual([]);
  });

  it('accepts both spellings of the favorite and task operators', () => {
    expect(parseQuery('is:favorite').filter.requireFavorite).toBe(true);
    expect(parseQuery('has:task').filter.requireHasTask).toBe(true);
  });

  it('keeps free-text terms verbatim and in order', () => {
    expect(parseQuery('Budget Q3 budget').filter.textTerms).toEqual(['Budget', 'Q3', 'budget']);
  });

  it('keeps the semantic term case as typed', () => {
    expect(parseQuery('~Travel ~plans').filter.semanticTerms).toEqual(['Travel', 'plans']);
  });

  it('drops operators with invalid content instead of treating them as text', () => {
    const { filter, discarded } = parseQuery(
      '# ~ priority:extreme progress:>abc progress:> due:2024-13-40 due:not-a-date notes',
    );

    expect(filter.textTerms).toEqual(['notes']);
    expect(filter.requiredTags).toEqual([]);
    expect(filter.semanticTerms).toEqual([]);
    expect(filter.priority).toBeUndefined();
    expect(filter.minProgress).toBeUndefined();
    expect(filter.dueBefore).toBeUndefined();
    expect(discarded).toEqual([
      '#', '~', 'priority:extreme', 'progress:>abc', 'progress:>', 'due:2024-13-40', 'due:not-a-date',
    ]);
  });

  it('treats near-miss operators without a known prefix as free text', () => {
    const { filter, discarded } = parseQuery('is:favorites progress:50 tag:all has:taskz');
    expect(filter.textTerms).toEqual(['is:favorites', 'progress:50', 'tag:all', 'has:taskz']);
    expect(filter.requireFavorite).toBe(false);
    expect(discarded).toEqual([]);
  });

  it('lets the last priority, progress and due operator win', () => {
    const { filter } = parseQuery('priority:low priority:urgent progress:>10 progress:>75.5');
    expect(filter.priority).toBe('urgent');
    expect(filter.minProgress).toBeCloseTo(0.755);
  });

  it('checks the tag prefix before operator keywords', () => {
    expect(parseQuery('#is:fav').filter.requiredTags).toEqual(['is:fav']);
    expect(parseQuery('#is:fav').filter.requireFavorite).toBe(false);
  });

  it('is idempotent for operator-only queries', () => {
    const query = '#home #Errands tag:any is:fav has:task priority:normal progress:>20 due:2025-01-31 is:overdue';
    expect(parseQuery(query)).toEqual(parseQuery(query));
  });
});

describe('hasCriteria', () => {
  it('is false when only the tag mode was set', () => {
    expect(hasCriteria(parseQuery('').filter)).toBe(false);
    expect(hasCriteria(parseQuery('tag:any due:2024-13-40 #').filter)).toBe(false);
  });

  it('is true for any narrowing token', () => {
    for (const query of ['#work', '~trip', 'is:fav', 'has:task', 'is:overdue', 'priority:low', 'progress:>0', 'due:2024-06-30', 'budget']) {
      expect(hasCriteria(parseQuery(query).filter)).toBe(true);
    }
  });
});
