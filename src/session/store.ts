import Database from 'better-sqlite3';
import path from 'node:path';
import { mkdirSync } from 'node:fs';
import type { Severity } from '../plugins/types.js';
import type { ErrorSummary, ExecutionResult, FindingRecord, TargetRecord } from './types.js';

/**
 * Result Store — archive of sessions and their execution results (SQLite)
 *
 * Session ids are reused across shell runs (every run starts with a
 * `default` session), so results are keyed by an autoincrement id and
 * ordered by it. Targets and findings are keyed by name within a session
 * and accumulate across runs.
 */

export interface StoredResult extends ExecutionResult {
    id: number;
    archivedAt: string;
}

export interface StoredSession {
    id: string;
    createdAt: string;
    results: number;
    lastRunAt: string | null;
}

interface ResultRow {
    id: number;
    session_id: string;
    sequence: number;
    module: string;
    started_at: string;
    duration_ms: number;
    exit_code: number | null;
    success: number;
    stdout: string;
    stderr: string;
    payload: string;
    parsed: string | null;
    error: string | null;
    archived_at: string;
}

interface TargetRow {
    session_id: string;
    name: string;
    ip_address: string | null;
    hostname: string | null;
    os: string | null;
    status: string | null;
    module: string;
    first_seen_at: string;
    last_seen_at: string;
}

interface FindingRow {
    session_id: string;
    target: string;
    name: string;
    description: string;
    severity: string;
    module: string;
    sequence: number;
    details: string | null;
    created_at: string;
}

const SEVERITIES: readonly Severity[] = ['info', 'low', 'medium', 'high', 'critical'];

interface SessionRow {
    id: string;
    created_at: string;
    results: number;
    last_run_at: string | null;
}

export class ResultStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        if (dbPath !== ':memory:') {
            mkdirSync(path.dirname(dbPath), { recursive: true });
        }
        this.db = new Database(dbPath);
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }
        this.migrate();
    }

    /**
     * Open `<dir>/results.db`
     */
    static open(sessionsDir: string): ResultStore {
        return new ResultStore(path.join(sessionsDir, 'results.db'));
    }

    private migrate(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS sessions (
                id TEXT PRIMARY KEY,
                created_at TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS results (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                session_id TEXT NOT NULL REFERENCES sessions(id),
                sequence INTEGER NOT NULL,
                module TEXT NOT NULL,
                started_at TEXT NOT NULL,
                duration_ms INTEGER NOT NULL,
                exit_code INTEGER,
                success INTEGER NOT NULL CHECK(success IN (0, 1)),
                stdout TEXT NOT NULL DEFAULT '',
                stderr TEXT NOT NULL DEFAULT '',
                payload TEXT NOT NULL DEFAULT '{}',
                parsed TEXT,
                error TEXT,
                archived_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
            );

            CREATE INDEX IF NOT EXISTS idx_results_session ON results(session_id);

            CREATE TABLE IF NOT EXISTS targets (
                session_id TEXT NOT NULL REFERENCES sessions(id),
                name TEXT NOT NULL,
                ip_address TEXT,
                hostname TEXT,
                os TEXT,
                status TEXT,
                module TEXT NOT NULL,
                first_seen_at TEXT NOT NULL,
                last_seen_at TEXT NOT NULL,
                PRIMARY KEY (session_id, name)
            );

            CREATE TABLE IF NOT EXISTS findings (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                session_id TEXT NOT NULL REFERENCES sessions(id),
                target TEXT NOT NULL,
                name TEXT NOT NULL,
                description TEXT NOT NULL DEFAULT '',
                severity TEXT NOT NULL DEFAULT 'info',
                module TEXT NOT NULL,
                sequence INTEGER NOT NULL,
                details TEXT,
                created_at TEXT NOT NULL,
                UNIQUE (session_id, target, name)
            );
        `);
    }

    /**
     * Record a session; keeps the first creation time when the id was seen before
     */
    recordSession(id: string, createdAt: string): void {
        this.db
            .prepare('INSERT OR IGNORE INTO sessions (id, created_at) VALUES (?, ?)')
            .run(id, createdAt);
    }

    /**
     * Archive one execution result
     */
    append(result: ExecutionResult): number {
        this.recordSession(result.sessionId, result.startedAt);
        const info = this.db
            .prepare(`
                INSERT INTO results (session_id, sequence, module, started_at, duration_ms, exit_code,
                                     success, stdout, stderr, payload, parsed, error)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            `)
            .run(
                result.sessionId,
                result.sequence,
                result.module,
                result.startedAt,
                result.durationMs,
                result.exitCode,
                result.success ? 1 : 0,
                result.stdout,
                result.stderr,
                JSON.stringify(result.payload),
                result.parsed === null || result.parsed === undefined ? null : JSON.stringify(result.parsed),
                result.error ? JSON.stringify(result.error) : null
            );
        return Number(info.lastInsertRowid);
    }

    /**
     * Archived results, oldest first
     */
    results(sessionId?: string, limit = 100): StoredResult[] {
        const rows = sessionId === undefined
            ? this.db
                .prepare<[number], ResultRow>('SELECT * FROM (SELECT * FROM results ORDER BY id DESC LIMIT ?) ORDER BY id')
                .all(limit)
            : this.db
                .prepare<[string, number], ResultRow>(
                    'SELECT * FROM (SELECT * FROM results WHERE session_id = ? ORDER BY id DESC LIMIT ?) ORDER BY id'
                )
                .all(sessionId, limit);
        return rows.map(rowToResult);
    }

    /**
     * Insert or refresh a target; the first sighting time is kept
     */
    saveTarget(target: TargetRecord): void {
        this.recordSession(target.sessionId, target.firstSeenAt);
        this.db
            .prepare(`
                INSERT INTO targets (session_id, name, ip_address, hostname, os, status, module,
                                     first_seen_at, last_seen_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
                ON CONFLICT (session_id, name) DO UPDATE SET
                    ip_address = excluded.ip_address,
                    hostname = excluded.hostname,
                    os = excluded.os,
                    status = excluded.status,
                    module = excluded.module,
                    last_seen_at = excluded.last_seen_at
            `)
            .run(
                target.sessionId,
                target.name,
                target.ipAddress,
                target.hostname,
                target.os,
                target.status,
                target.module,
                target.firstSeenAt,
                target.lastSeenAt
            );
    }

    /**
     * Record a finding. Returns false when the session already has one with
     * the same target and name.
     */
    saveFinding(finding: FindingRecord): boolean {
        this.recordSession(finding.sessionId, finding.createdAt);
        const info = this.db
            .prepare(`
                INSERT OR IGNORE INTO findings (session_id, target, name, description, severity, module,
                                                sequence, details, created_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
            `)
            .run(
                finding.sessionId,
                finding.target,
                finding.name,
                finding.description,
                finding.severity,
                finding.module,
                finding.sequence,
                finding.details === undefined ? null : JSON.stringify(finding.details),
                finding.createdAt
            );
        return info.changes > 0;
    }

    targets(sessionId: string): TargetRecord[] {
        return this.db
            .prepare<[string], TargetRow>('SELECT * FROM targets WHERE session_id = ? ORDER BY first_seen_at, name')
            .all(sessionId)
            .map(row => ({
                sessionId: row.session_id,
                name: row.name,
                ipAddress: row.ip_address,
                hostname: row.hostname,
                os: row.os,
                status: row.status,
                module: row.module,
                firstSeenAt: row.first_seen_at,
                lastSeenAt: row.last_seen_at,
            }));
    }

    findings(sessionId: string): FindingRecord[] {
        return this.db
            .prepare<[string], FindingRow>('SELECT * FROM findings WHERE session_id = ? ORDER BY id')
            .all(sessionId)
            .map(rowToFinding);
    }

    sessions(): StoredSession[] {
        const rows = this.db
            .prepare<[], SessionRow>(`
                SELECT s.id, s.created_at, COUNT(r.id) AS results, MAX(r.started_at) AS last_run_at
                FROM sessions s
                LEFT JOIN results r ON r.session_id = s.id
                GROUP BY s.id
                ORDER BY s.created_at
            `)
            .all();
        return rows.map(row => ({
            id: row.id,
            createdAt: row.created_at,
            results: row.results,
            lastRunAt: row.last_run_at,
        }));
    }

    close(): void {
        this.db.close();
    }
}

function parseJson(text: string | null): unknown {
    if (text === null) return null;
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

function parseError(text: string | null): ErrorSummary | undefined {
    const value = parseJson(text);
    if (typeof value !== 'object' || value === null) return undefined;
    const name: unknown = Reflect.get(value, 'name');
    const code: unknown = Reflect.get(value, 'code');
    const message: unknown = Reflect.get(value, 'message');
    return {
        name: typeof name === 'string' ? name : 'Error',
        code: typeof code === 'string' ? code : 'UNKNOWN',
        message: typeof message === 'string' ? message : '',
    };
}

function parsePayload(text: string): Record<string, unknown> {
    const value = parseJson(text);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        return Object.fromEntries(Object.entries(value));
    }
    return { result: value };
}

function toSeverity(value: string): Severity {
    return SEVERITIES.find(severity => severity === value) ?? 'info';
}

function rowToFinding(row: FindingRow): FindingRecord {
    return {
        sessionId: row.session_id,
        target: row.target,
        name: row.name,
        description: row.description,
        severity: toSeverity(row.severity),
        module: row.module,
        sequence: row.sequence,
        createdAt: row.created_at,
        ...(row.details === null ? {} : { details: parseJson(row.details) }),
    };
}

function rowToResult(row: ResultRow): StoredResult {
    const error = parseError(row.error);
    return {
        id: row.id,
        sequence: row.sequence,
        sessionId: row.session_id,
        module: row.module,
        startedAt: row.started_at,
        durationMs: row.duration_ms,
        stdout: row.stdout,
        stderr: row.stderr,
        exitCode: row.exit_code,
        payload: parsePayload(row.payload),
        parsed: parseJson(row.parsed),
        success: row.success === 1,
        ...(error ? { error } : {}),
        archivedAt: row.archived_at,
    };
}
