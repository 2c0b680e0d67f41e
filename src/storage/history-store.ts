import { link, mkdir, open, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

// ─── Run Records ─────────────────────────────────────────────────────────────

const notificationReasons = [
  'test',
  'startup',
  'startup_disabled',
  'significant_change',
  'below_threshold',
  'no_change',
  'no_change_quiet',
  'fetch_failed',
] as const;

export const runRecordSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  observed: z.number().int().nonnegative().nullable(),
  previous: z.number().int().nonnegative().nullable(),
  delta: z.number().int().nullable(),
  notified: z.boolean(),
  reason: z.enum(notificationReasons),
  error: z.enum(['fetch_failed', 'notify_failed', 'notify_config_missing']).optional(),
  errorMessage: z.string().optional(),
  sourceUrl: z.string().optional(),
});

export type RunRecord = z.infer<typeof runRecordSchema>;

const historySchema = z.array(runRecordSchema);

export interface HistoryStore {
  readAll(): Promise<RunRecord[]>;
  latest(): Promise<RunRecord | null>;
  append(record: RunRecord): Promise<void>;
}

export class HistoryStoreError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'HistoryStoreError';
  }
}

// ─── File Lock ───────────────────────────────────────────────────────────────

const LOCK_STALE_MS = 30_000;
const LOCK_RETRY_MS = 100;
const LOCK_MAX_WAIT_MS = 10_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Removes the lock at `lockPath` if it is older than `staleMs`. The lock is
 * first moved aside and checked again there, so a run that saw the old lock
 * as stale cannot delete a lock another run has just taken. Resolves true
 * when the path is free to retry.
 */
export async function reclaimStaleLock(lockPath: string, staleMs: number = LOCK_STALE_MS): Promise<boolean> {
  const aside = `${lockPath}.${process.pid}.${Date.now()}.stale`;
  try {
    await rename(lockPath, aside);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return true;
    throw err;
  }

  const info = await stat(aside);
  if (Date.now() - info.mtimeMs > staleMs) {
    await unlink(aside);
    return true;
  }

  // Fresh lock taken by another run: put it back unless a third run holds the path.
  try {
    await link(aside, lockPath);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
  }
  await unlink(aside);
  return false;
}

async function acquireLock(lockPath: string): Promise<() => Promise<void>> {
  const start = Date.now();

  for (;;) {
    try {
      const handle = await open(lockPath, 'wx');
      await handle.writeFile(`${process.pid}\n`);
      await handle.close();
      return () => unlink(lockPath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
    }

    // A lock left behind by a killed run is reclaimed once it is stale.
    try {
      const info = await stat(lockPath);
      if (Date.now() - info.mtimeMs > LOCK_STALE_MS && (await reclaimStaleLock(lockPath))) {
        continue;
      }
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
      continue;
    }

    if (Date.now() - start > LOCK_MAX_WAIT_MS) {
      throw new Error(`Timed out waiting for history lock ${lockPath}`);
    }
    await sleep(LOCK_RETRY_MS);
  }
}

// ─── JSON File Store ─────────────────────────────────────────────────────────

export function serializeHistory(records: RunRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}

/**
 * History kept as a JSON array on disk. Appends re-read the file under an
 * exclusive lock, so a record written by an overlapping run is kept.
 */
export function createJsonHistoryStore(path: string): HistoryStore {
  const lockPath = `${path}.lock`;

  async function readRecords(): Promise<RunRecord[]> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw new HistoryStoreError(`Cannot read history file ${path}`, path, err);
    }

    if (text.trim() === '') return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new HistoryStoreError(`History file ${path} is not valid JSON`, path, err);
    }

    const result = historySchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? issue.path.join('.') : '';
      throw new HistoryStoreError(
        `History file ${path} has an invalid record at ${where || 'root'}: ${issue?.message ?? 'unknown'}`,
        path,
        result.error,
      );
    }

    return result.data;
  }

  return {
    readAll: readRecords,

    async latest(): Promise<RunRecord | null> {
      const records = await readRecords();
      return records.at(-1) ?? null;
    },

    async append(record: RunRecord): Promise<void> {
      const valid = runRecordSchema.parse(record);

      await mkdir(dirname(path), { recursive: true });
      const release = await acquireLock(lockPath);

      try {
        const records = await readRecords();
        records.push(valid);

        const tempPath = `${path}.${process.pid}.tmp`;
        await writeFile(tempPath, serializeHistory(records), 'utf8');
        await rename(tempPath, path);
      } finally {
        await release();
      }
    },
  };
}
