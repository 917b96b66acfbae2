import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CommentTreeCrawler } from './comment-tree.js';
import { ItemFetcher } from './fetcher.js';
import { ScriptedTransport, comment } from './testing.js';
import type { CommentTreeResult, FetchResult } from './types.js';

const ids = (result: CommentTreeResult): string[] => result.comments.map((c) => c.id);

type TreeShape = 'chain' | 'wide' | 'random';

interface GeneratedTree {
  transport: ScriptedTransport;
  roots: number[];
  parentOf: Map<number, number | null>;
  depthOf: Map<number, number>;
  deleted: Set<number>;
  size: number;
}

/** Small seeded PRNG so generated shapes are repeatable */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

function generateTree(shape: TreeShape, seed: number): GeneratedTree {
  const random = seededRandom(seed);
  const parentOf = new Map<number, number | null>();
  const depthOf = new Map<number, number>();
  const kidsOf = new Map<number, number[]>();
  const roots: number[] = [];
  let nextId = 1;

  const add = (parent: number | null): number => {
    const id = nextId++;
    parentOf.set(id, parent);
    depthOf.set(id, parent === null ? 0 : (depthOf.get(parent) ?? 0) + 1);
    kidsOf.set(id, []);
    if (parent === null) roots.push(id);
    else kidsOf.get(parent)?.push(id);
    return id;
  };

  if (shape === 'chain') {
    for (let r = 0; r < 3; r++) {
      let tip = add(null);
      for (let i = 0; i < 40; i++) tip = add(tip);
    }
  } else if (shape === 'wide') {
    for (let r = 0; r < 3; r++) {
      const root = add(null);
      for (let i = 0; i < 30; i++) {
        const child = add(root);
        add(child);
        add(child);
      }
    }
  } else {
    add(null);
    for (let i = 1; i < 150; i++) {
      add(random() < 0.1 ? null : 1 + Math.floor(random() * (nextId - 1)));
    }
  }

  // Interior nodes are deleted too, so their replies hang off a missing parent
  const deleted = new Set<number>();
  for (const id of parentOf.keys()) {
    if (random() < 0.2) deleted.add(id);
  }

  const transport = new ScriptedTransport();
  for (const [id, kids] of kidsOf) {
    transport.items(comment(id, kids, deleted.has(id) ? { deleted: true } : {}));
  }

  return { transport, roots, parentOf, depthOf, deleted, size: parentOf.size };
}

describe('CommentTreeCrawler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should emit a depth-first, depth- and breadth-capped comment list', async () => {
    const transport = new ScriptedTransport().items(
      comment(1, [4, 5, 6]),
      { id: 2, type: 'comment', deleted: true, time: 1700000002 },
      comment(3),
      comment(4),
      comment(5),
      comment(6)
    );
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport), {
      maxDepth: 1,
      maxChildrenPerNode: 2,
      maxTotalComments: 10,
    });

    const result = await crawler.crawl('100', [1, 2, 3]);

    expect(ids(result)).toEqual(['1', '4', '5', '3']);
    expect(result.comments.map((c) => [c.parentId, c.depth])).toEqual([
      [null, 0],
      ['1', 1],
      ['1', 1],
      [null, 0],
    ]);
    expect(result.comments.every((c) => c.articleId === '100')).toBe(true);
    expect(result.stats).toEqual({
      fetched: 4,
      skipped: 1,
      failed: 0,
      breadthPruned: 1,
      capReached: false,
      cancelled: false,
    });
    expect(transport.requestCount('/item/6.json')).toBe(0);
  });

  it('should never fetch below maxDepth', async () => {
    const transport = new ScriptedTransport().items(
      comment(1, [2]),
      comment(2, [3]),
      comment(3, [4]),
      comment(4, [5]),
      comment(5)
    );
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport), { maxDepth: 2 });

    const result = await crawler.crawl('100', [1]);

    expect(result.comments.map((c) => [c.id, c.parentId, c.depth])).toEqual([
      ['1', null, 0],
      ['2', '1', 1],
      ['3', '2', 2],
    ]);
    expect(transport.requestCount('/item/4.json')).toBe(0);
  });

  it('should only fetch top-level comments with maxDepth 0', async () => {
    const transport = new ScriptedTransport().items(comment(1, [3]), comment(2), comment(3));
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport), { maxDepth: 0 });

    const result = await crawler.crawl('100', [1, 2]);

    expect(ids(result)).toEqual(['1', '2']);
    expect(transport.requests).toEqual(['/item/1.json', '/item/2.json']);
  });

  it('should stop at maxTotalComments without further fetches', async () => {
    const transport = new ScriptedTransport().items(comment(1), comment(2), comment(3), comment(4), comment(5));
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport), { maxTotalComments: 3 });

    const result = await crawler.crawl('100', [1, 2, 3, 4, 5]);

    expect(ids(result)).toEqual(['1', '2', '3']);
    expect(result.stats.capReached).toBe(true);
    expect(transport.requests).toEqual(['/item/1.json', '/item/2.json', '/item/3.json']);
  });

  it('should not flag the cap when the tree ends exactly at it', async () => {
    const transport = new ScriptedTransport().items(comment(1), comment(2));
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport), { maxTotalComments: 2 });

    const result = await crawler.crawl('100', [1, 2]);

    expect(ids(result)).toEqual(['1', '2']);
    expect(result.stats.capReached).toBe(false);
  });

  it('should descend into at most maxChildrenPerNode children', async () => {
    const children = [10, 11, 12, 13, 14, 15, 16, 17];
    const transport = new ScriptedTransport().items(comment(1, children), ...children.map((id) => comment(id)));
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport), { maxChildrenPerNode: 3 });

    const result = await crawler.crawl('100', [1]);

    expect(ids(result)).toEqual(['1', '10', '11', '12']);
    expect(result.stats.breadthPruned).toBe(5);
  });

  it('should keep crawling siblings and cousins when one comment fails', async () => {
    const transport = new ScriptedTransport()
      .items(comment(1, [4, 5]), comment(2, [6]), comment(3), comment(5), comment(6))
      .failAlways('/item/4.json', new Error('boom'));
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport));

    const result = await crawler.crawl('100', [1, 2, 3]);

    expect(ids(result)).toEqual(['1', '5', '2', '6', '3']);
    expect(result.stats.failed).toBe(1);
    expect(result.failures).toEqual([
      {
        itemId: 4,
        message: 'Fetch of /item/4.json failed after 1 attempt(s): boom',
        timestamp: expect.any(String),
      },
    ]);
  });

  it('should walk the replies of deleted and textless comments', async () => {
    const transport = new ScriptedTransport().items(
      { id: 1, type: 'comment', deleted: true, kids: [2, 3] },
      comment(2),
      comment(3, [4], { text: '' }),
      comment(4)
    );
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport));

    const result = await crawler.crawl('100', [1]);

    expect(result.comments.map((c) => [c.id, c.parentId, c.depth])).toEqual([
      ['2', '1', 1],
      ['4', '3', 2],
    ]);
    expect(result.stats.skipped).toBe(2);
    expect(result.stats.fetched).toBe(3);
  });

  it('should return nothing for an article without comments', async () => {
    const transport = new ScriptedTransport();
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport));

    const result = await crawler.crawl('100', []);

    expect(result.comments).toEqual([]);
    expect(result.stats.capReached).toBe(false);
    expect(transport.requests).toEqual([]);
  });

  it('should fetch nothing with a zero comment cap', async () => {
    const transport = new ScriptedTransport().items(comment(1));
    const crawler = new CommentTreeCrawler(new ItemFetcher(transport), { maxTotalComments: 0 });

    const result = await crawler.crawl('100', [1]);

    expect(result.comments).toEqual([]);
    expect(result.stats.capReached).toBe(true);
    expect(transport.requests).toEqual([]);
  });

  describe('with fan-out', () => {
    const tree = () =>
      new ScriptedTransport().items(
        comment(1, [5, 6]),
        comment(2),
        comment(3, [7]),
        comment(4),
        comment(5),
        comment(6),
        comment(7)
      );

    it('should emit the same comments as a sequential walk', async () => {
      const sequential = await new CommentTreeCrawler(new ItemFetcher(tree()), { fanOut: 1 }).crawl(
        '100',
        [1, 2, 3, 4]
      );
      const concurrent = await new CommentTreeCrawler(new ItemFetcher(tree()), { fanOut: 3 }).crawl(
        '100',
        [1, 2, 3, 4]
      );

      expect(ids(sequential)).toEqual(['1', '5', '6', '2', '3', '7', '4']);
      expect(concurrent.comments).toEqual(sequential.comments);
    });

    it('should apply the total cap in root order', async () => {
      const sequential = await new CommentTreeCrawler(new ItemFetcher(tree()), {
        fanOut: 1,
        maxTotalComments: 4,
      }).crawl('100', [1, 2, 3, 4]);
      const concurrent = await new CommentTreeCrawler(new ItemFetcher(tree()), {
        fanOut: 3,
        maxTotalComments: 4,
      }).crawl('100', [1, 2, 3, 4]);

      expect(ids(sequential)).toEqual(['1', '5', '6', '2']);
      expect(concurrent.comments).toEqual(sequential.comments);
      expect(sequential.stats.capReached).toBe(true);
      expect(concurrent.stats.capReached).toBe(true);
    });

    it('should stop later subtrees once earlier ones fill the cap', async () => {
      const twoThreads = () =>
        new ScriptedTransport().items(
          comment(1, [11, 12, 13, 14]),
          comment(11),
          comment(12),
          comment(13),
          comment(14),
          comment(2, [21, 22, 23]),
          comment(21),
          comment(22),
          comment(23)
        );

      const sequentialTransport = twoThreads();
      const sequential = await new CommentTreeCrawler(new ItemFetcher(sequentialTransport), {
        fanOut: 1,
        maxTotalComments: 3,
      }).crawl('100', [1, 2]);

      // Thread 2 only arrives once thread 1 has two comments in
      const transport = twoThreads();
      const inner = new ItemFetcher(transport);
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const fetcher = {
        async fetchItem(id: number): Promise<FetchResult> {
          if (id === 2) await gate;
          const result = await inner.fetchItem(id);
          if (id === 12) release();
          return result;
        },
      };

      const concurrent = await new CommentTreeCrawler(fetcher, { fanOut: 2, maxTotalComments: 3 }).crawl(
        '100',
        [1, 2]
      );

      expect(sequentialTransport.requests).toEqual(['/item/1.json', '/item/11.json', '/item/12.json']);
      expect(ids(concurrent)).toEqual(['1', '11', '12']);
      expect(concurrent.comments).toEqual(sequential.comments);
      expect(concurrent.stats.capReached).toBe(true);
      expect([...transport.requests].sort()).toEqual([
        '/item/1.json',
        '/item/11.json',
        '/item/12.json',
        '/item/2.json',
      ]);
    });
  });

  describe('on generated trees', () => {
    const maxDepth = 3;
    const maxTotalComments = 5;

    const shapes: Array<[string, TreeShape, number]> = [
      ['a few long chains', 'chain', 7],
      ['wide fan-out', 'wide', 11],
      ['random attachment', 'random', 23],
    ];

    it.each(shapes)('should respect the caps and parent depths on %s', async (_label, shape, seed) => {
      for (const fanOut of [1, 3]) {
        const tree = generateTree(shape, seed);
        const crawler = new CommentTreeCrawler(new ItemFetcher(tree.transport), {
          maxDepth,
          maxChildrenPerNode: 4,
          maxTotalComments,
          fanOut,
        });

        const result = await crawler.crawl('100', tree.roots);

        expect(tree.size).toBeGreaterThan(10 * maxTotalComments);
        expect(result.comments.length).toBeLessThanOrEqual(maxTotalComments);
        expect(result.comments.length).toBeGreaterThan(0);

        const emitted = new Map(result.comments.map((c) => [c.id, c]));
        for (const c of result.comments) {
          const id = Number(c.id);
          const parent = tree.parentOf.get(id) ?? null;
          expect(c.parentId).toBe(parent === null ? null : String(parent));
          expect(c.depth).toBe(tree.depthOf.get(id));
          expect(c.depth).toBeLessThanOrEqual(maxDepth);

          if (parent === null) {
            expect(c.depth).toBe(0);
            continue;
          }
          const emittedParent = emitted.get(String(parent));
          if (emittedParent) {
            expect(c.depth).toBe(emittedParent.depth + 1);
          } else {
            expect(tree.deleted.has(parent)).toBe(true);
            expect(c.depth).toBe((tree.depthOf.get(parent) ?? -2) + 1);
          }
        }

        const fetchedTooDeep = tree.transport.requests.filter((path) => {
          const id = Number(path.replace('/item/', '').replace('.json', ''));
          return (tree.depthOf.get(id) ?? 0) > maxDepth;
        });
        expect(fetchedTooDeep).toEqual([]);
      }
    });
  });

  describe('cancellation', () => {
    it('should not fetch anything once aborted', async () => {
      const transport = new ScriptedTransport().items(comment(1));
      const controller = new AbortController();
      controller.abort();

      const result = await new CommentTreeCrawler(new ItemFetcher(transport)).crawl('100', [1], controller.signal);

      expect(result.comments).toEqual([]);
      expect(result.stats.cancelled).toBe(true);
      expect(transport.requests).toEqual([]);
    });

    it('should stop between nodes when aborted mid-walk', async () => {
      const inner = new ItemFetcher(new ScriptedTransport().items(comment(1), comment(2), comment(3)));
      const controller = new AbortController();
      const fetcher = {
        async fetchItem(id: number): Promise<FetchResult> {
          if (id === 2) controller.abort();
          return inner.fetchItem(id);
        },
      };

      const result = await new CommentTreeCrawler(fetcher).crawl('100', [1, 2, 3], controller.signal);

      expect(ids(result)).toEqual(['1', '2']);
      expect(result.stats.cancelled).toBe(true);
    });
  });
});
