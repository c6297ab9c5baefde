import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { chunk, compareTerms, lookupVocabulary } from '../subject-lookup';
import type { FetchLike } from '../wanikani-client';
import { BASE_URL, clientWith, fakeFetch, page, subject } from './fake-wanikani';

function idsOf(url: string): number[] {
  const query = new URL(url).searchParams.get('ids') ?? '';
  return query.split(',').map(Number);
}

const emptySubjects = () => vi.fn<FetchLike>(async () => new Response(JSON.stringify(page([]))));

describe('chunk', () => {
  it('splits into fixed-size batches with a short tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no batches for no items', () => {
    expect(chunk([], 1000)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
  });
});

describe('compareTerms', () => {
  it('orders case-insensitively with uppercase first on ties', () => {
    expect(['banana', 'apple', 'Cherry', 'Apple'].sort(compareTerms)).toEqual(['Apple', 'apple', 'banana', 'Cherry']);
  });
});

describe('lookupVocabulary', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('issues ceil(K / B) batches with every id in exactly one', async () => {
    const fetch = emptySubjects();
    const ids = new Set(Array.from({ length: 2500 }, (_, i) => 2500 - i));

    await lookupVocabulary(clientWith(fetch), ids);

    expect(fetch).toHaveBeenCalledTimes(3);
    const batches = fetch.mock.calls.map(([url]) => idsOf(url));
    expect(batches.map((b) => b.length)).toEqual([1000, 1000, 500]);
    const all = batches.flat();
    expect(all).toHaveLength(2500);
    expect(new Set(all)).toEqual(ids);
  });

  it('batches ids in ascending order', async () => {
    const fetch = emptySubjects();

    await lookupVocabulary(clientWith(fetch), new Set([5, 3, 1, 4, 2]), { batchSize: 2 });

    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      `${BASE_URL}/subjects?ids=1,2`,
      `${BASE_URL}/subjects?ids=3,4`,
      `${BASE_URL}/subjects?ids=5`,
    ]);
  });

  it('keeps vocabulary only, dedupes case-sensitively and sorts case-insensitively', async () => {
    const next = `${BASE_URL}/subjects?ids=1,2,3,4,5,6,7&page_after_id=4`;
    const fetch = fakeFetch({
      [`${BASE_URL}/subjects?ids=1,2,3,4,5,6,7`]: {
        body: page([
          subject(1, 'vocabulary', 'banana'),
          subject(2, 'vocabulary', 'Apple'),
          subject(3, 'kanji', '木'),
          subject(4, 'vocabulary', 'apple'),
        ], next),
      },
      [next]: {
        body: page([
          subject(5, 'vocabulary', 'Cherry'),
          subject(6, 'radical', 'tree'),
          subject(7, 'vocabulary', 'banana'),
        ]),
      },
    });

    const vocab = await lookupVocabulary(clientWith(fetch), new Set([7, 6, 5, 4, 3, 2, 1]));

    expect(vocab).toEqual(['Apple', 'apple', 'banana', 'Cherry']);
  });

  it('ignores kana-only vocabulary objects', async () => {
    const fetch = fakeFetch({
      [`${BASE_URL}/subjects?ids=9`]: { body: page([subject(9, 'kana_vocabulary', 'ソフト')]) },
    });

    expect(await lookupVocabulary(clientWith(fetch), new Set([9]))).toEqual([]);
  });

  it('fails as a whole when any batch fails', async () => {
    const fetch = fakeFetch({
      [`${BASE_URL}/subjects?ids=1`]: { body: page([subject(1, 'vocabulary', '一')]) },
      [`${BASE_URL}/subjects?ids=2`]: { status: 500, body: 'Internal Server Error' },
    });

    await expect(lookupVocabulary(clientWith(fetch), new Set([1, 2]), { batchSize: 1 }))
      .rejects.toMatchObject({ kind: 'endpoint-down' });
  });
});
