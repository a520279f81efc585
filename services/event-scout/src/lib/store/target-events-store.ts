import { mkdir, open, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import Papa from 'papaparse';
import { z } from 'zod';
import type { Event, PaginationParams, ProfileJson, StoredEvent, StoredEventFilters } from '../../types/events.js';
import { toProfileJson } from '../results/assembler.js';
import { RetryExhaustedError, RetryManager } from '../scraping/retry.js';
import { canonicalizeEventUrl } from '../scraping/url.js';
import type { SearchSettings } from '../config.js';
import { StoreWriteConflict, errorMessage } from '../errors.js';

export const CORE_COLUMNS = [
  'url',
  'title',
  'date',
  'location',
  'description',
  'speakers',
  'sponsors',
  'relevance_score',
  'updated_at'
] as const;

type CoreColumn = typeof CORE_COLUMNS[number];
type Row = Record<string, string>;

interface Table {
  columns: string[];
  rows: Row[];
}

export type TargetEventsStoreOptions = SearchSettings['store'] & {
  now?: () => Date;
};

export interface UpsertResult {
  inserted: number;
  updated: number;
  total: number;
}

export interface StoredEventPage {
  events: StoredEvent[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

const storedProfilesSchema = z.array(z.object({
  name: z.string().min(1),
  title: z.string().nullish(),
  company: z.string().nullish(),
  bio: z.string().nullish(),
  image: z.string().nullish(),
  website: z.string().nullish()
}));

class LockBusyError extends Error {
  constructor(lockPath: string) {
    super(`Lock file ${lockPath} is held by another writer`);
    this.name = 'LockBusyError';
  }
}

/**
 * CSV-backed store of target events keyed by canonical URL. Writes are
 * serialized per file within the process and guarded by a lock file across
 * processes; columns other than the core set are carried through untouched.
 */
export class TargetEventsStore {
  private static queues = new Map<string, Promise<void>>();

  readonly path: string;
  private readonly lockPath: string;

  constructor(private readonly options: TargetEventsStoreOptions) {
    this.path = resolve(options.csvPath);
    this.lockPath = `${this.path}.lock`;
  }

  async upsert(events: readonly Event[]): Promise<UpsertResult> {
    if (events.length === 0) {
      return { inserted: 0, updated: 0, total: (await this.read()).rows.length };
    }
    return await this.serialize(() => this.withFileLock(() => this.applyUpsert(events)));
  }

  async list(filters: StoredEventFilters = {}, pagination: PaginationParams = {}): Promise<StoredEventPage> {
    const page = Math.max(1, pagination.page ?? 1);
    const limit = Math.max(1, pagination.limit ?? 20);
    const location = filters.location?.trim().toLowerCase();
    const query = filters.q?.trim().toLowerCase();

    const events = (await this.read()).rows.map(toStoredEvent).filter(event => {
      if (location && !(event.location ?? '').toLowerCase().includes(location)) {
        return false;
      }
      if (query) {
        const haystack = [
          event.title,
          event.description ?? '',
          ...event.speakers.map(profile => profile.name),
          ...event.sponsors.map(profile => profile.name)
        ].join(' ').toLowerCase();
        return haystack.includes(query);
      }
      return true;
    });

    const offset = (page - 1) * limit;
    return {
      events: events.slice(offset, offset + limit),
      pagination: {
        page,
        limit,
        total: events.length,
        totalPages: Math.ceil(events.length / limit)
      }
    };
  }

  async get(url: string): Promise<StoredEvent | null> {
    const key = canonicalizeEventUrl(url) ?? url;
    const row = (await this.read()).rows.find(candidate => rowKey(candidate) === key);
    return row ? toStoredEvent(row) : null;
  }

  private async applyUpsert(events: readonly Event[]): Promise<UpsertResult> {
    const table = await this.read();
    const columns = [...table.columns];
    for (const column of CORE_COLUMNS) {
      if (!columns.includes(column)) columns.push(column);
    }

    const index = new Map<string, number>();
    table.rows.forEach((row, position) => index.set(rowKey(row), position));

    const updatedAt = (this.options.now ?? (() => new Date()))().toISOString();
    let inserted = 0;
    let updated = 0;

    for (const event of events) {
      const key = canonicalizeEventUrl(event.url) ?? event.url;
      const values = coreValues(event, updatedAt);
      const position = index.get(key);

      if (position === undefined) {
        const row: Row = {};
        for (const column of columns) row[column] = '';
        index.set(key, table.rows.length);
        table.rows.push({ ...row, ...values });
        inserted++;
      } else {
        const existing = table.rows[position];
        // A search that skipped scoring leaves the stored score alone
        if (values.relevance_score === '') {
          values.relevance_score = existing.relevance_score ?? '';
        }
        table.rows[position] = { ...existing, ...values };
        updated++;
      }
    }

    await this.write({ columns, rows: table.rows });
    console.log(`[TargetEventsStore] Upserted ${events.length} event(s) into ${this.path} (${inserted} new, ${updated} updated)`);
    return { inserted, updated, total: table.rows.length };
  }

  private async read(): Promise<Table> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { columns: [...CORE_COLUMNS], rows: [] };
      }
      throw error;
    }

    const parsed = Papa.parse<Row>(content, { header: true, skipEmptyLines: true });
    if (parsed.errors.length > 0) {
      console.warn(`[TargetEventsStore] ${parsed.errors.length} malformed row(s) in ${this.path}: ${parsed.errors[0].message}`);
    }

    const columns = parsed.meta.fields ?? [...CORE_COLUMNS];
    const rows = parsed.data.map(raw => {
      const row: Row = {};
      for (const column of columns) row[column] = raw[column] ?? '';
      return row;
    });
    return { columns, rows };
  }

  private async write(table: Table): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    const csv = Papa.unparse({
      fields: table.columns,
      data: table.rows.map(row => table.columns.map(column => row[column] ?? ''))
    }, { newline: '\n' });

    const tempPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(tempPath, `${csv}\n`, 'utf8');
      await rename(tempPath, this.path);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        console.warn(`[TargetEventsStore] Could not remove ${tempPath}:`, errorMessage(cleanupError));
      });
      throw error;
    }
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const queues = TargetEventsStore.queues;
    const previous = queues.get(this.path) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      (error: unknown) => {
        console.error(`[TargetEventsStore] Write to ${this.path} failed:`, errorMessage(error));
      }
    );

    queues.set(this.path, tail);
    void tail.then(() => {
      if (queues.get(this.path) === tail) queues.delete(this.path);
    });
    return run;
  }

  private async withFileLock<T>(task: () => Promise<T>): Promise<T> {
    await mkdir(dirname(this.path), { recursive: true });

    try {
      await RetryManager.withRetry(() => this.acquireLock(), {
        maxAttempts: this.options.lockRetries + 1,
        initialDelay: this.options.lockRetryDelayMs,
        maxDelay: this.options.lockRetryDelayMs * 8,
        shouldRetry: error => error instanceof LockBusyError,
        onRetry: (_error, attempt, delay) => {
          console.warn(`[TargetEventsStore] ${this.lockPath} is busy (attempt ${attempt}), retrying in ${delay}ms`);
        }
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new StoreWriteConflict(`Could not lock ${this.path} after ${error.attempts} attempt(s)`, { cause: error.lastError });
      }
      throw error;
    }

    try {
      return await task();
    } finally {
      await unlink(this.lockPath).catch((error: unknown) => {
        console.warn(`[TargetEventsStore] Could not remove ${this.lockPath}:`, errorMessage(error));
      });
    }
  }

  private async acquireLock(): Promise<void> {
    try {
      const handle = await open(this.lockPath, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n`, 'utf8');
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
      if (await this.removeStaleLock()) {
        return await this.acquireLock();
      }
      throw new LockBusyError(this.lockPath);
    }
  }

  private async removeStaleLock(): Promise<boolean> {
    try {
      const info = await stat(this.lockPath);
      if (Date.now() - info.mtimeMs < this.options.staleLockMs) {
        return false;
      }
      console.warn(`[TargetEventsStore] Removing stale lock ${this.lockPath}`);
      await unlink(this.lockPath);
      return true;
    } catch (error) {
      // Released between our open and stat
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return true;
      }
      throw error;
    }
  }
}

function coreValues(event: Event, updatedAt: string): Record<CoreColumn, string> {
  return {
    url: canonicalizeEventUrl(event.url) ?? event.url,
    title: event.title,
    date: event.date,
    location: event.location ?? '',
    description: event.description ?? '',
    speakers: JSON.stringify(event.speakers.map(toProfileJson)),
    sponsors: JSON.stringify(event.sponsors.map(toProfileJson)),
    relevance_score: event.relevanceScore === undefined ? '' : String(event.relevanceScore),
    updated_at: updatedAt
  };
}

function rowKey(row: Row): string {
  const url = row.url ?? '';
  return canonicalizeEventUrl(url) ?? url;
}

function toStoredEvent(row: Row): StoredEvent {
  const coreColumns: readonly string[] = CORE_COLUMNS;
  const insights: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    if (!coreColumns.includes(column)) insights[column] = value;
  }

  const score = row.relevance_score ? Number(row.relevance_score) : NaN;
  return {
    title: row.title ?? '',
    url: row.url ?? '',
    date: row.date ?? '',
    location: row.location || null,
    description: row.description || null,
    speakers: parseProfiles(row.speakers),
    sponsors: parseProfiles(row.sponsors),
    relevance_score: Number.isFinite(score) ? score : null,
    highlight: null,
    updated_at: row.updated_at || null,
    insights
  };
}

function parseProfiles(value: string | undefined): ProfileJson[] {
  if (!value) {
    return [];
  }
  let data: unknown;
  try {
    data = JSON.parse(value);
  } catch {
    return [];
  }
  const parsed = storedProfilesSchema.safeParse(data);
  if (!parsed.success) {
    return [];
  }
  return parsed.data.map(profile => ({
    name: profile.name,
    title: profile.title ?? null,
    company: profile.company ?? null,
    bio: profile.bio ?? null,
    image: profile.image ?? null,
    website: profile.website ?? null
  }));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
