import * as fs from 'node:fs/promises';
import path from 'node:path';
import type { DiscoveryQuery, DiscoveryRecord, DiscoverySink, OptimizationResult, PolicyState } from './types.js';
import { ErrorCodes, StoreError, toError } from './errors.js';

export const fileStamp = (iso: string): string => iso.replace(/[:.]/g, '-');

async function ensureDir(p: string): Promise<void> { await fs.mkdir(p, { recursive: true }); }

const isErrno = (e: unknown, code: string): boolean =>
  e instanceof Error && 'code' in e && e.code === code;

async function atomicWrite(file: string, data: string): Promise<void> {
  const dir = path.dirname(file);
  await ensureDir(dir);
  const tmp = path.join(dir, `.${path.basename(file)}.tmp-${Math.random().toString(36).slice(2)}`);
  await fs.writeFile(tmp, data, 'utf8');
  let lastErr: unknown = null;
  for (let attempt = 0; attempt < 5; attempt++) {
    try {
      await fs.rename(tmp, file); // atomic replace on same filesystem (POSIX rename)
      return;
    } catch (e) {
      lastErr = e;
      if (!isErrno(e, 'ENOENT')) throw e;
      await new Promise(r => setTimeout(r, 5));
    }
  }
  throw toError(lastErr);
}

export async function writeJsonAtomic<T>(file: string, obj: T): Promise<void> {
  await atomicWrite(file, JSON.stringify(obj, null, 2));
}

/** Parsed JSON, or null when the file does not exist. Corrupt files throw. */
export async function readJson(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (e) {
    if (isErrno(e, 'ENOENT')) return null;
    throw e;
  }
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new StoreError(`Corrupt JSON in ${file}`, ErrorCodes.STORE_CORRUPT, toError(e));
  }
}

/** Exclusive `.lock` in `dir`; resolves to the release function. */
export async function acquireLock(dir: string): Promise<() => Promise<void>> {
  await ensureDir(dir);
  const lock = path.join(dir, '.lock');
  const h = await fs.open(lock, 'wx').catch((e: unknown) => {
    throw new StoreError(`Lock exists at ${dir}. Another process running? (${toError(e).message})`, ErrorCodes.STORE_LOCKED, toError(e));
  });
  await h.write(String(process.pid));
  await h.close();
  return async () => { await fs.rm(lock, { force: true }); };
}

/**
 * JSON-file sink for discoveries, optimization results and the learned policy.
 *
 *   <root>/policy.json
 *   <root>/discoveries/<createdAt>-<id>.json
 *   <root>/optimizations/<finishedAt>-<id>.json
 *
 * File names sort chronologically, so listings are newest first by name.
 */
export class RunStore implements DiscoverySink {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  private get discoveriesDir(): string { return path.join(this.root, 'discoveries'); }
  private get optimizationsDir(): string { return path.join(this.root, 'optimizations'); }
  private get policyFile(): string { return path.join(this.root, 'policy.json'); }

  lock(): Promise<() => Promise<void>> {
    return acquireLock(this.root);
  }

  async recordDiscovery(record: Readonly<DiscoveryRecord>): Promise<void> {
    await writeJsonAtomic(path.join(this.discoveriesDir, `${fileStamp(record.createdAt)}-${record.id}.json`), record);
  }

  async recordOptimization(result: Readonly<OptimizationResult>): Promise<void> {
    await writeJsonAtomic(path.join(this.optimizationsDir, `${fileStamp(result.finishedAt)}-${result.id}.json`), result);
  }

  async listDiscoveries(query: DiscoveryQuery = {}): Promise<DiscoveryRecord[]> {
    const all = await this.readAll(this.discoveriesDir, isDiscoveryRecord);
    const matches = all.filter(r =>
      (query.category === undefined || r.category === query.category) &&
      (query.algorithm === undefined || r.selectedAlgorithm === query.algorithm));
    return query.limit === undefined ? matches : matches.slice(0, Math.max(0, query.limit));
  }

  async listOptimizations(query: Omit<DiscoveryQuery, 'category'> = {}): Promise<OptimizationResult[]> {
    const all = await this.readAll(this.optimizationsDir, isOptimizationResult);
    const matches = all.filter(r => query.algorithm === undefined || r.algorithm === query.algorithm);
    return query.limit === undefined ? matches : matches.slice(0, Math.max(0, query.limit));
  }

  async loadPolicy(): Promise<PolicyState | null> {
    const raw = await readJson(this.policyFile);
    if (raw === null) return null;
    if (!isPolicyState(raw)) throw new StoreError(`Unrecognized policy state in ${this.policyFile}`, ErrorCodes.STORE_CORRUPT);
    return raw;
  }

  async savePolicy(state: PolicyState): Promise<void> {
    await writeJsonAtomic(this.policyFile, state);
  }

  /** Documents in `dir`, newest first */
  private async readAll<T>(dir: string, guard: (x: unknown) => x is T): Promise<T[]> {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (e) {
      if (isErrno(e, 'ENOENT')) return [];
      throw e;
    }
    const files = names.filter(n => n.endsWith('.json') && !n.startsWith('.')).sort().reverse();
    const out: T[] = [];
    for (const name of files) {
      const doc = await readJson(path.join(dir, name));
      if (!guard(doc)) throw new StoreError(`Unrecognized document ${path.join(dir, name)}`, ErrorCodes.STORE_CORRUPT);
      out.push(doc);
    }
    return out;
  }
}

const isRecord = (x: unknown): x is Record<string, unknown> => typeof x === 'object' && x !== null;

function isDiscoveryRecord(x: unknown): x is DiscoveryRecord {
  return isRecord(x) && typeof x.id === 'string' && typeof x.category === 'string' &&
    typeof x.selectedAlgorithm === 'string' && typeof x.createdAt === 'string';
}

function isOptimizationResult(x: unknown): x is OptimizationResult {
  return isRecord(x) && typeof x.id === 'string' && typeof x.algorithm === 'string' &&
    isRecord(x.bestGenome) && Array.isArray(x.history);
}

function isPolicyState(x: unknown): x is PolicyState {
  return isRecord(x) && x.version === 1 && Array.isArray(x.entries) && Array.isArray(x.visits);
}
