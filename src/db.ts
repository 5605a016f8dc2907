import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { parseScoreSet } from './gating/engine.js';
import type { EventRecord } from './types.js';

type EventRow = {
  id: number;
  event_id: string;
  ts: number;
  scores: string;
  clip_reference: string | null;
};

export type StoredEvent = EventRecord & { id: number };

export interface ListEventsOptions {
  limit?: number;
  offset?: number;
  since?: number;
  until?: number;
}

export interface PaginatedEvents {
  items: StoredEvent[];
  total: number;
}

export interface EventStore {
  readonly path: string;
  storeEvent(event: EventRecord): number;
  listEvents(options?: ListEventsOptions): PaginatedEvents;
  getEvent(eventId: string): StoredEvent | null;
  clearEvents(): void;
  close(): void;
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

function clampLimit(limit: number | undefined) {
  if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_LIMIT;
  }
  return Math.min(Math.floor(limit), MAX_LIMIT);
}

function clampOffset(offset: number | undefined) {
  if (typeof offset !== 'number' || !Number.isFinite(offset) || offset < 0) {
    return 0;
  }
  return Math.floor(offset);
}

function mapRow(row: EventRow): StoredEvent {
  return {
    id: row.id,
    eventId: row.event_id,
    timestamp: row.ts,
    scores: parseScoreSet(JSON.parse(row.scores)),
    clipReference: row.clip_reference
  };
}

/** Opens (or creates) the SQLite event table at `dbPath`. `:memory:` keeps it in process. */
export function createEventStore(dbPath: string): EventStore {
  const inMemory = dbPath === ':memory:';
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_id TEXT NOT NULL UNIQUE,
      ts INTEGER NOT NULL,
      window_id INTEGER NOT NULL,
      baby_score REAL NOT NULL,
      cat_score REAL NOT NULL,
      scores TEXT NOT NULL,
      clip_reference TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_events_ts ON events (ts);
  `);

  const insertStatement = db.prepare<{
    eventId: string;
    ts: number;
    windowId: number;
    babyScore: number;
    catScore: number;
    scores: string;
    clipReference: string | null;
  }>(`
    INSERT INTO events (event_id, ts, window_id, baby_score, cat_score, scores, clip_reference)
    VALUES (@eventId, @ts, @windowId, @babyScore, @catScore, @scores, @clipReference)
  `);
  const selectById = db.prepare<[string], EventRow>(
    'SELECT id, event_id, ts, scores, clip_reference FROM events WHERE event_id = ?'
  );

  return {
    path: inMemory ? dbPath : path.resolve(dbPath),

    storeEvent(event) {
      const result = insertStatement.run({
        eventId: event.eventId,
        ts: event.timestamp,
        windowId: event.scores.windowId,
        babyScore: event.scores.babyScore,
        catScore: event.scores.catScore,
        scores: JSON.stringify(event.scores),
        clipReference: event.clipReference
      });
      return Number(result.lastInsertRowid);
    },

    listEvents(options = {}) {
      const filters: string[] = [];
      const params: Record<string, number> = {};
      if (typeof options.since === 'number') {
        filters.push('ts >= @since');
        params.since = options.since;
      }
      if (typeof options.until === 'number') {
        filters.push('ts <= @until');
        params.until = options.until;
      }
      const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
      const rows = db
        .prepare<Record<string, number>, EventRow>(
          `SELECT id, event_id, ts, scores, clip_reference FROM events ${whereClause}
           ORDER BY ts DESC, id DESC LIMIT @limit OFFSET @offset`
        )
        .all({ ...params, limit: clampLimit(options.limit), offset: clampOffset(options.offset) });
      const bind: Array<Record<string, number>> = filters.length > 0 ? [params] : [];
      const totalRow = db
        .prepare<Array<Record<string, number>>, { count: number }>(`SELECT COUNT(*) AS count FROM events ${whereClause}`)
        .get(...bind);
      return {
        items: rows.map(mapRow),
        total: totalRow?.count ?? 0
      };
    },

    getEvent(eventId) {
      const row = selectById.get(eventId);
      return row ? mapRow(row) : null;
    },

    clearEvents() {
      db.prepare('DELETE FROM events').run();
    },

    close() {
      db.close();
    }
  };
}
