/**
 * GasGuard Reading History
 *
 * SQLite store (better-sqlite3) for every metric sample and every alarm,
 * whether raised by the gateway on a transition or logged by the sensor node.
 * Timestamps are stored as epoch milliseconds.
 */

import Database from 'better-sqlite3';
import { isMetric, type Metric, type MetricSample } from '@gasguard/core';

export type AlarmSource = 'gateway' | 'device';

export interface AlarmEntry {
  type: string;
  message: string;
  metric?: Metric;
  value?: number;
  source: AlarmSource;
  observedAt: Date;
}

export interface StoredReading {
  id: number;
  metric: Metric;
  value: number;
  observedAt: Date;
}

export interface StoredAlarm extends AlarmEntry {
  id: number;
}

export interface RangeQuery {
  since?: Date;
  until?: Date;
}

export interface ReadingQuery extends RangeQuery {
  metric?: Metric;
  limit: number;
}

export interface AlarmQuery extends RangeQuery {
  type?: string;
  limit: number;
}

export interface MetricStats {
  count: number;
  avg: number | null;
  max: number | null;
  min: number | null;
}

export interface HistoryStats {
  metrics: Record<Metric, MetricStats>;
  alarms: Record<string, number>;
}

export interface SeriesPoint {
  metric: Metric;
  bucketStart: Date;
  count: number;
  avg: number;
  max: number;
  min: number;
}

interface ReadingRow {
  id: number;
  metric: string;
  value: number;
  observed_at: number;
}

interface AlarmRow {
  id: number;
  alarm_type: string;
  message: string;
  metric: string | null;
  value: number | null;
  source: string;
  observed_at: number;
}

interface StatsRow {
  metric: string;
  count: number;
  avg: number | null;
  max: number | null;
  min: number | null;
}

interface AlarmCountRow {
  alarm_type: string;
  count: number;
}

interface Range {
  since: number;
  until: number;
}

interface ReadingFilter extends Range {
  metric: string | null;
  limit: number;
}

interface AlarmFilter extends Range {
  type: string | null;
  limit: number;
}

type AlarmParams = [string, string, string | null, number | null, AlarmSource, number];

interface SeriesRow {
  metric: string;
  bucket: number;
  count: number;
  avg: number;
  max: number;
  min: number;
}

// Open-ended ranges are expressed with these bounds so one statement serves every query
const MIN_TS = 0;
const MAX_TS = Number.MAX_SAFE_INTEGER;

function rangeParams(query: RangeQuery): Range {
  return {
    since: query.since?.getTime() ?? MIN_TS,
    until: query.until?.getTime() ?? MAX_TS,
  };
}

function toReading(row: ReadingRow): StoredReading | null {
  if (!isMetric(row.metric)) return null;
  return { id: row.id, metric: row.metric, value: row.value, observedAt: new Date(row.observed_at) };
}

function toAlarm(row: AlarmRow): StoredAlarm {
  return {
    id: row.id,
    type: row.alarm_type,
    message: row.message,
    ...(row.metric !== null && isMetric(row.metric) ? { metric: row.metric } : {}),
    ...(row.value !== null ? { value: row.value } : {}),
    source: row.source === 'device' ? 'device' : 'gateway',
    observedAt: new Date(row.observed_at),
  };
}

export class ReadingHistory {
  private db: Database.Database;

  private stmtInsertReading: Database.Statement<[string, number, number]>;
  private stmtInsertAlarm: Database.Statement<AlarmParams>;
  private stmtReadings: Database.Statement<[ReadingFilter], ReadingRow>;
  private stmtAlarms: Database.Statement<[AlarmFilter], AlarmRow>;
  private stmtStats: Database.Statement<[Range], StatsRow>;
  private stmtAlarmCounts: Database.Statement<[Range], AlarmCountRow>;
  private stmtSeries: Database.Statement<[{ width: number; since: number }], SeriesRow>;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.ensureTables();

    this.stmtInsertReading = this.db.prepare<[string, number, number]>(`
      INSERT INTO readings (metric, value, observed_at) VALUES (?, ?, ?)
    `);

    this.stmtInsertAlarm = this.db.prepare<AlarmParams>(`
      INSERT INTO alarm_logs (alarm_type, message, metric, value, source, observed_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.stmtReadings = this.db.prepare<ReadingFilter, ReadingRow>(`
      SELECT id, metric, value, observed_at FROM readings
      WHERE (@metric IS NULL OR metric = @metric)
        AND observed_at >= @since AND observed_at <= @until
      ORDER BY observed_at DESC, id DESC
      LIMIT @limit
    `);

    this.stmtAlarms = this.db.prepare<AlarmFilter, AlarmRow>(`
      SELECT id, alarm_type, message, metric, value, source, observed_at FROM alarm_logs
      WHERE (@type IS NULL OR alarm_type = @type)
        AND observed_at >= @since AND observed_at <= @until
      ORDER BY observed_at DESC, id DESC
      LIMIT @limit
    `);

    this.stmtStats = this.db.prepare<Range, StatsRow>(`
      SELECT metric, COUNT(*) AS count, AVG(value) AS avg, MAX(value) AS max, MIN(value) AS min
      FROM readings
      WHERE observed_at >= @since AND observed_at <= @until
      GROUP BY metric
    `);

    this.stmtAlarmCounts = this.db.prepare<Range, AlarmCountRow>(`
      SELECT alarm_type, COUNT(*) AS count FROM alarm_logs
      WHERE observed_at >= @since AND observed_at <= @until
      GROUP BY alarm_type
    `);

    this.stmtSeries = this.db.prepare<{ width: number; since: number }, SeriesRow>(`
      SELECT metric, (observed_at / CAST(@width AS INTEGER)) * CAST(@width AS INTEGER) AS bucket,
             COUNT(*) AS count, AVG(value) AS avg, MAX(value) AS max, MIN(value) AS min
      FROM readings
      WHERE observed_at >= @since
      GROUP BY metric, bucket
      ORDER BY bucket ASC, metric ASC
    `);
  }

  private ensureTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS readings (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        metric TEXT NOT NULL CHECK (metric IN ('gas', 'temperature', 'humidity')),
        value REAL NOT NULL,
        observed_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_readings_metric_time ON readings(metric, observed_at);

      CREATE TABLE IF NOT EXISTS alarm_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        alarm_type TEXT NOT NULL,
        message TEXT NOT NULL,
        metric TEXT,
        value REAL,
        source TEXT NOT NULL CHECK (source IN ('gateway', 'device')),
        observed_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_alarm_logs_time ON alarm_logs(observed_at);
    `);
  }

  recordSample(sample: MetricSample): void {
    this.stmtInsertReading.run(sample.metric, sample.value, sample.observedAt.getTime());
  }

  recordAlarm(entry: AlarmEntry): number {
    const result = this.stmtInsertAlarm.run(
      entry.type,
      entry.message,
      entry.metric ?? null,
      entry.value ?? null,
      entry.source,
      entry.observedAt.getTime(),
    );
    return Number(result.lastInsertRowid);
  }

  /** Newest first */
  listReadings(query: ReadingQuery): StoredReading[] {
    const rows = this.stmtReadings.all({ metric: query.metric ?? null, ...rangeParams(query), limit: query.limit });
    return rows.flatMap((row) => toReading(row) ?? []);
  }

  /** Newest first */
  listAlarms(query: AlarmQuery): StoredAlarm[] {
    const rows = this.stmtAlarms.all({ type: query.type ?? null, ...rangeParams(query), limit: query.limit });
    return rows.map(toAlarm);
  }

  stats(query: RangeQuery = {}): HistoryStats {
    const params = rangeParams(query);

    const empty = (): MetricStats => ({ count: 0, avg: null, max: null, min: null });
    const metrics: Record<Metric, MetricStats> = { gas: empty(), temperature: empty(), humidity: empty() };
    for (const row of this.stmtStats.all(params)) {
      if (isMetric(row.metric)) {
        metrics[row.metric] = { count: row.count, avg: row.avg, max: row.max, min: row.min };
      }
    }

    const alarms: Record<string, number> = {};
    for (const row of this.stmtAlarmCounts.all(params)) {
      alarms[row.alarm_type] = row.count;
    }

    return { metrics, alarms };
  }

  /** Bucketed aggregates over the last `hours`, buckets aligned to `intervalMinutes` */
  series(hours: number, intervalMinutes: number, now: Date = new Date()): SeriesPoint[] {
    const width = intervalMinutes * 60_000;
    const since = now.getTime() - hours * 3_600_000;

    return this.stmtSeries.all({ width, since }).flatMap((row): SeriesPoint[] =>
      isMetric(row.metric)
        ? [
            {
              metric: row.metric,
              bucketStart: new Date(row.bucket),
              count: row.count,
              avg: row.avg,
              max: row.max,
              min: row.min,
            },
          ]
        : [],
    );
  }

  ping(): boolean {
    return this.db.prepare('SELECT 1 AS ok').get() !== undefined;
  }

  close(): void {
    this.db.close();
  }
}
