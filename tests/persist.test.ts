import * as fs from 'node:fs/promises';
import path from 'node:path';
import { RunStore, fileStamp } from '../src/persist.js';
import { StoreError } from '../src/errors.js';
import type { DiscoveryRecord, OptimizationResult, PolicyState } from '../src/types.js';

const ROOT = path.join(process.cwd(), 'runs-test', path.basename(__filename).replace(/\.[^.]+$/, ''));

function record(id: string, createdAt: string, category = 'sorting', selectedAlgorithm = 'quicksort'): DiscoveryRecord {
  return {
    id,
    category,
    inputSize: 100,
    state: `${category}:d3`,
    selectedAlgorithm,
    timeComplexity: 'O(n log n)',
    spaceComplexity: 'O(log n)',
    quality: null,
    createdAt
  };
}

function optimization(id: string, algorithm: string, finishedAt: string): OptimizationResult {
  return {
    id,
    algorithm,
    bestGenome: { id: `${id}-g`, genes: { x: 1 }, fitness: -0.5, generation: 3, parentIds: [] },
    bestFitness: -0.5,
    history: [{ generation: 0, bestFitness: -0.5, meanFitness: -1, worstFitness: -2 }],
    generations: 1,
    evaluations: 10,
    startedAt: finishedAt,
    finishedAt
  };
}

describe('RunStore', () => {
  test('file stamps are filesystem safe', () => {
    expect(fileStamp('2024-01-02T03:04:05.678Z')).toBe('2024-01-02T03-04-05-678Z');
  });

  test('policy is absent until saved', async () => {
    const store = new RunStore(path.join(ROOT, 'policy'));
    expect(await store.loadPolicy()).toBeNull();
    const state: PolicyState = {
      version: 1,
      entries: [{ state: 'sorting:d3', action: 'heapsort', value: 0.25, updates: 2 }],
      visits: [['sorting:d3', 4]]
    };
    await store.savePolicy(state);
    expect(await store.loadPolicy()).toEqual(state);
  });

  test('corrupt policy files are reported', async () => {
    const root = path.join(ROOT, 'corrupt');
    await fs.mkdir(root, { recursive: true });
    const store = new RunStore(root);
    await fs.writeFile(path.join(root, 'policy.json'), '{ not json', 'utf8');
    await expect(store.loadPolicy()).rejects.toMatchObject({ code: 'STORE_CORRUPT' });
    await fs.writeFile(path.join(root, 'policy.json'), JSON.stringify({ version: 2 }), 'utf8');
    await expect(store.loadPolicy()).rejects.toBeInstanceOf(StoreError);
  });

  test('discoveries are listed newest first and filtered', async () => {
    const root = path.join(ROOT, 'discoveries');
    const store = new RunStore(root);
    await store.recordDiscovery(record('r1', '2024-01-01T00:00:00.000Z'));
    await store.recordDiscovery(record('r3', '2024-01-03T00:00:00.000Z', 'searching', 'binary_search'));
    await store.recordDiscovery(record('r2', '2024-01-02T00:00:00.000Z', 'sorting', 'heapsort'));

    expect((await store.listDiscoveries()).map(r => r.id)).toEqual(['r3', 'r2', 'r1']);
    expect((await store.listDiscoveries({ limit: 2 })).map(r => r.id)).toEqual(['r3', 'r2']);
    expect((await store.listDiscoveries({ limit: 0 })).map(r => r.id)).toEqual([]);
    expect((await store.listDiscoveries({ category: 'sorting' })).map(r => r.id)).toEqual(['r2', 'r1']);
    expect((await store.listDiscoveries({ algorithm: 'heapsort' })).map(r => r.id)).toEqual(['r2']);
    expect(await store.listDiscoveries({ category: 'graph' })).toEqual([]);

    const names = await fs.readdir(path.join(root, 'discoveries'));
    expect(names.sort()).toEqual([
      '2024-01-01T00-00-00-000Z-r1.json',
      '2024-01-02T00-00-00-000Z-r2.json',
      '2024-01-03T00-00-00-000Z-r3.json'
    ]);
  });

  test('an empty store lists nothing', async () => {
    const store = new RunStore(path.join(ROOT, 'empty'));
    expect(await store.listDiscoveries()).toEqual([]);
    expect(await store.listOptimizations()).toEqual([]);
  });

  test('optimizations round-trip and filter by algorithm', async () => {
    const store = new RunStore(path.join(ROOT, 'optimizations'));
    const a = optimization('o1', 'quicksort', '2024-02-01T00:00:00.000Z');
    const b = optimization('o2', 'heapsort', '2024-02-02T00:00:00.000Z');
    await store.recordOptimization(a);
    await store.recordOptimization(b);
    expect(await store.listOptimizations()).toEqual([b, a]);
    expect(await store.listOptimizations({ algorithm: 'quicksort' })).toEqual([a]);
  });

  test('unrecognized documents are corrupt', async () => {
    const root = path.join(ROOT, 'stray');
    await fs.mkdir(path.join(root, 'discoveries'), { recursive: true });
    await fs.writeFile(path.join(root, 'discoveries', 'x.json'), JSON.stringify({ hello: 'world' }), 'utf8');
    await expect(new RunStore(root).listDiscoveries()).rejects.toMatchObject({ code: 'STORE_CORRUPT' });
  });

  test('the lock is exclusive until released', async () => {
    const store = new RunStore(path.join(ROOT, 'lock'));
    const release = await store.lock();
    await expect(store.lock()).rejects.toMatchObject({ code: 'STORE_LOCKED' });
    await release();
    const again = await store.lock();
    await again();
  });
});
