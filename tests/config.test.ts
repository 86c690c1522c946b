import * as fs from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_CONFIG, configFromEnv, loadConfig, resolveConfig } from '../src/config.js';
import { InvalidConfigError } from '../src/errors.js';

const ROOT = path.join(process.cwd(), 'runs-test', path.basename(__filename).replace(/\.[^.]+$/, ''));

async function writeFile(name: string, content: string): Promise<string> {
  await fs.mkdir(ROOT, { recursive: true });
  const file = path.join(ROOT, name);
  await fs.writeFile(file, content, 'utf8');
  return file;
}

describe('resolveConfig', () => {
  test('defaults', () => {
    expect(resolveConfig({})).toEqual({
      learningRate: 0.1,
      discountFactor: 0.95,
      epsilon: 0.1,
      populationSize: 50,
      generations: 100,
      mutationRate: 0.1,
      crossoverRate: 0.8,
      tournamentSize: 3
    });
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });

  test('numeric strings are accepted and unknown keys ignored', () => {
    const cfg = resolveConfig({ epsilon: '0.3', generations: '12', seed: '7', colour: 'blue' });
    expect(cfg.epsilon).toBe(0.3);
    expect(cfg.generations).toBe(12);
    expect(cfg.seed).toBe(7);
    expect(cfg).not.toHaveProperty('colour');
  });

  test('rejects out-of-range and non-numeric values', () => {
    expect(() => resolveConfig({ epsilon: 2 })).toThrow(InvalidConfigError);
    expect(() => resolveConfig({ populationSize: 0 })).toThrow(InvalidConfigError);
    expect(() => resolveConfig({ generations: 1.5 })).toThrow(InvalidConfigError);
    expect(() => resolveConfig({ tournamentSize: 'three' })).toThrow('Invalid "tournamentSize": expected a number, got "three"');
    expect(() => resolveConfig({ seed: -1 })).toThrow(InvalidConfigError);
  });

  test('layers over a base', () => {
    const base = resolveConfig({ epsilon: 0.5, generations: 3 });
    expect(resolveConfig({ generations: 4 }, base)).toMatchObject({ epsilon: 0.5, generations: 4 });
  });
});

describe('configFromEnv', () => {
  test('reads ALGO_* variables and skips empty ones', () => {
    expect(configFromEnv({ ALGO_EPSILON: '0.2', ALGO_SEED: '7', ALGO_GENERATIONS: '', HOME: '/home/test' })).toEqual({ epsilon: '0.2', seed: '7' });
  });
});

describe('loadConfig', () => {
  test('environment overrides the file', async () => {
    const file = await writeFile('layered.json', JSON.stringify({ epsilon: 0.3, generations: 5 }));
    const cfg = await loadConfig({ file, env: { ALGO_EPSILON: '0.4' } });
    expect(cfg.epsilon).toBe(0.4);
    expect(cfg.generations).toBe(5);
    expect(cfg.populationSize).toBe(50);
  });

  test('defaults without file or env', async () => {
    const cfg = await loadConfig({ env: {} });
    expect(cfg).toEqual({ ...DEFAULT_CONFIG });
    expect(cfg.seed).toBeUndefined();
  });

  test('malformed files are config errors', async () => {
    const broken = await writeFile('broken.json', '{ "epsilon": ');
    await expect(loadConfig({ file: broken, env: {} })).rejects.toBeInstanceOf(InvalidConfigError);
    const list = await writeFile('list.json', '[1, 2]');
    await expect(loadConfig({ file: list, env: {} })).rejects.toThrow('Invalid "config": must be a JSON object');
  });

  test('invalid values in the file are reported', async () => {
    const file = await writeFile('bad.json', JSON.stringify({ mutationRate: 3 }));
    await expect(loadConfig({ file, env: {} })).rejects.toThrow('Invalid "mutationRate": must be within [0, 1], got 3');
  });
});
