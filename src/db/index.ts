import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../errors';
import type { JobOffer, OfferLookup } from '../scrapers/types';
import { initializeSchema, openDatabase } from './schema';

export type InsertOutcome = 'inserted' | 'duplicate' | 'failed';
export type ScrapeRunStatus = 'running' | 'completed' | 'blocked' | 'failed';

export interface StoredJobOffer extends JobOffer {
  id: number;
}

export interface JobOfferStats {
  total: number;
  bySource: Record<string, number>;
  avgOfferRating: number;
  avgCandidateRating: number;
  lastRun: string | null;
}

export interface ScrapeRun {
  id: string;
  source: string;
  startedAt: string;
  completedAt: string | null;
  status: ScrapeRunStatus;
  offersFound: number;
  offersNew: number;
  error: string | null;
}

interface JobOfferRow {
  id: number;
  source: string;
  name: string;
  url: string;
  description: string | null;
  analysis: string | null;
  offer_rating: number | null;
  candidate_rating: number | null;
  added_date: string;
}

/** `YYYY-MM-DD HH:MM:SS` in UTC, the format of SQLite's CURRENT_TIMESTAMP. */
export function toSqliteTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function fromSqliteTimestamp(value: string): Date {
  return new Date(`${value.replace(' ', 'T')}Z`);
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toOffer(row: JobOfferRow): StoredJobOffer {
  return {
    id: row.id,
    source: row.source,
    name: row.name,
    url: row.url,
    description: row.description ?? '',
    analysis: row.analysis ?? '',
    offerRating: row.offer_rating ?? 0,
    candidateRating: row.candidate_rating ?? 0,
    added: fromSqliteTimestamp(row.added_date),
  };
}

/**
 * URL-keyed store of job offers. Rows are append-only: the only removal is a
 * confirmed drop of the whole table.
 */
export class JobOfferStore implements OfferLookup {
  readonly db: Database.Database;
  readonly tableName: string;

  constructor(db: Database.Database, tableName = 'job_offers') {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(tableName)) {
      throw new Error(`Invalid table name: ${tableName}`);
    }
    this.db = db;
    this.tableName = tableName;
    initializeSchema(db, tableName);
  }

  static open(dbPath: string, tableName?: string): JobOfferStore {
    const store = new JobOfferStore(openDatabase(dbPath), tableName);
    console.log(`[Store] Connected to ${dbPath} (table ${store.tableName})`);
    return store;
  }

  close(): void {
    this.db.close();
  }

  /** Never throws: a duplicate URL or any SQLite failure is logged and reported. */
  insert(offer: JobOffer): InsertOutcome {
    try {
      this.db.prepare(`
        INSERT INTO ${this.tableName}
          (source, name, url, description, analysis, offer_rating, candidate_rating)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        offer.source, offer.name, offer.url, offer.description,
        offer.analysis, offer.offerRating, offer.candidateRating
      );
      console.log(`[Store] Inserted ${offer.url}`);
      return 'inserted';
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT')) {
        console.warn(`[Store] Offer already stored, not inserting again: ${offer.url}`);
        return 'duplicate';
      }
      console.error(`[Store] Failed to insert ${offer.url}: ${errorMessage(error)}`);
      return 'failed';
    }
  }

  /** Exact match, or a stored URL containing this one. */
  exists(url: string): boolean {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS c FROM ${this.tableName}
      WHERE url = ? OR url LIKE ? ESCAPE '\\'
    `).get(url, `%${escapeLike(url)}%`) as { c: number };
    return row.c > 0;
  }

  /** Offers added in [start, end), best candidate match first. */
  selectByDateRange(start: Date, end: Date): StoredJobOffer[] {
    const rows = this.db.prepare(`
      SELECT id, source, name, url, description, analysis, offer_rating,
             candidate_rating, added_date
      FROM ${this.tableName}
      WHERE added_date >= ? AND added_date < ?
      ORDER BY candidate_rating DESC, id ASC
    `).all(toSqliteTimestamp(start), toSqliteTimestamp(end)) as JobOfferRow[];
    return rows.map(toOffer);
  }

  count(): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS c FROM ${this.tableName}`).get() as { c: number };
    return row.c;
  }

  /**
   * Drops every stored offer once `confirm` agrees. The table is recreated
   * empty so the store stays usable.
   */
  async dropAll(confirm: () => Promise<boolean>): Promise<boolean> {
    if (!(await confirm())) {
      console.warn('[Store] Deletion cancelled.');
      return false;
    }
    this.db.exec(`DROP TABLE IF EXISTS ${this.tableName}`);
    initializeSchema(this.db, this.tableName);
    console.log(`[Store] Table ${this.tableName} wiped.`);
    return true;
  }

  stats(): JobOfferStats {
    const totals = this.db.prepare(`
      SELECT COUNT(*) AS total,
             AVG(offer_rating) AS avgOffer,
             AVG(candidate_rating) AS avgCandidate
      FROM ${this.tableName}
    `).get() as { total: number; avgOffer: number | null; avgCandidate: number | null };

    const sources = this.db.prepare(
      `SELECT source, COUNT(*) AS c FROM ${this.tableName} GROUP BY source ORDER BY source`
    ).all() as { source: string; c: number }[];
    const bySource: Record<string, number> = {};
    for (const s of sources) bySource[s.source] = s.c;

    const lastRun = this.db.prepare(
      'SELECT completed_at FROM scrape_runs WHERE completed_at IS NOT NULL ORDER BY completed_at DESC LIMIT 1'
    ).get() as { completed_at: string } | undefined;

    return {
      total: totals.total,
      bySource,
      avgOfferRating: Math.round(totals.avgOffer ?? 0),
      avgCandidateRating: Math.round(totals.avgCandidate ?? 0),
      lastRun: lastRun?.completed_at ?? null,
    };
  }

  // --- Scrape Runs ---

  startScrapeRun(source: string): string {
    const id = uuidv4();
    this.db.prepare(
      'INSERT INTO scrape_runs (id, source, started_at) VALUES (?, ?, ?)'
    ).run(id, source, new Date().toISOString());
    return id;
  }

  completeScrapeRun(
    id: string,
    status: Exclude<ScrapeRunStatus, 'running'>,
    offersFound: number,
    offersNew: number,
    error?: string
  ): void {
    this.db.prepare(`
      UPDATE scrape_runs SET completed_at = ?, status = ?, offers_found = ?, offers_new = ?, error = ?
      WHERE id = ?
    `).run(new Date().toISOString(), status, offersFound, offersNew, error ?? null, id);
  }

  listScrapeRuns(limit = 20): ScrapeRun[] {
    return this.db.prepare(`
      SELECT id, source, started_at AS startedAt, completed_at AS completedAt,
             status, offers_found AS offersFound, offers_new AS offersNew, error
      FROM scrape_runs ORDER BY started_at DESC, rowid DESC LIMIT ?
    `).all(limit) as ScrapeRun[];
  }
}
