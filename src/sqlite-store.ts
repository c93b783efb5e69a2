import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from './logger';
import { ReceiptEntry, ReceiptRegistry } from './receipts';
import { PublishedResult, ResultArchive, StoredVote, VoteStore, WriteTransaction } from './store';

const MIGRATIONS = [
    // Migration 000: votes, receipts and published results
    `
    CREATE TABLE IF NOT EXISTS votes (
        ballot_id TEXT NOT NULL,
        storage_key TEXT NOT NULL,
        vote TEXT NOT NULL,
        salt TEXT NOT NULL,
        hash TEXT NOT NULL,
        PRIMARY KEY (ballot_id, storage_key)
    );

    CREATE TABLE IF NOT EXISTS receipts (
        ballot_id TEXT NOT NULL,
        storage_key TEXT NOT NULL,
        assembly_id TEXT NOT NULL,
        digest TEXT NOT NULL UNIQUE,
        PRIMARY KEY (ballot_id, storage_key)
    );

    CREATE TABLE IF NOT EXISTS results (
        ballot_id TEXT PRIMARY KEY,
        record TEXT NOT NULL,
        hash TEXT NOT NULL,
        published_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_receipts_assembly ON receipts(assembly_id);
    `,
];

/** opens (or creates) a database and brings its schema up to date. `:memory:` works too */
export function openDatabase(dbPath: string): Database.Database {
    const log = getLogger().child({ module: 'sqlite-store' });

    if (dbPath !== ':memory:') {
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');

    db.exec(`
        CREATE TABLE IF NOT EXISTS _migrations (
            id INTEGER PRIMARY KEY,
            applied_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
    `);

    const applied = new Set(
        db.prepare<[], { id: number }>('SELECT id FROM _migrations').all().map(row => row.id),
    );

    MIGRATIONS.forEach((migration, i) => {
        if (applied.has(i)) return;
        log.info(`Running migration ${i}`);
        db.transaction(() => {
            db.exec(migration);
            db.prepare('INSERT INTO _migrations (id) VALUES (?)').run(i);
        })();
    });

    return db;
}

/** wraps writes in one SQLite transaction, so other processes see all of them or none */
export function createSqliteTransaction(db: Database.Database): WriteTransaction {
    return fn => db.transaction(fn)();
}

export function createSqliteVoteStore(db: Database.Database): VoteStore {
    const upsert = db.prepare<[string, string, string, string, string]>(`
        INSERT INTO votes (ballot_id, storage_key, vote, salt, hash)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(ballot_id, storage_key) DO UPDATE SET
            vote = excluded.vote,
            salt = excluded.salt,
            hash = excluded.hash
    `);
    const selectOne = db.prepare<[string, string], StoredVote>(
        'SELECT vote, salt, hash FROM votes WHERE ballot_id = ? AND storage_key = ?',
    );
    const selectAll = db.prepare<[string], StoredVote>(
        'SELECT vote, salt, hash FROM votes WHERE ballot_id = ?',
    );

    return {
        putVote(ballotId: string, storageKey: string, vote: StoredVote): void {
            upsert.run(ballotId, storageKey, vote.vote, vote.salt, vote.hash);
        },

        getVote(ballotId: string, storageKey: string): StoredVote | null {
            return selectOne.get(ballotId, storageKey) ?? null;
        },

        listVotes(ballotId: string): StoredVote[] {
            return selectAll.all(ballotId);
        },
    };
}

interface ReceiptRow {
    ballot_id: string;
    storage_key: string;
    assembly_id: string;
    digest: string;
}

export function createSqliteReceiptRegistry(db: Database.Database): ReceiptRegistry {
    const upsert = db.prepare<[string, string, string, string]>(`
        INSERT INTO receipts (ballot_id, storage_key, assembly_id, digest)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(ballot_id, storage_key) DO UPDATE SET
            assembly_id = excluded.assembly_id,
            digest = excluded.digest
    `);
    const selectByDigest = db.prepare<[string], ReceiptRow>(
        'SELECT ballot_id, storage_key, assembly_id, digest FROM receipts WHERE digest = ?',
    );
    const deleteAssembly = db.prepare<[string]>('DELETE FROM receipts WHERE assembly_id = ?');

    return {
        replace(entry: ReceiptEntry): void {
            upsert.run(entry.ballotId, entry.storageKey, entry.assemblyId, entry.digest);
        },

        lookup(digest: string): ReceiptEntry | null {
            const row = selectByDigest.get(digest);
            if (!row) return null;
            return {
                ballotId: row.ballot_id,
                storageKey: row.storage_key,
                assemblyId: row.assembly_id,
                digest: row.digest,
            };
        },

        purgeAssembly(assemblyId: string): number {
            return deleteAssembly.run(assemblyId).changes;
        },
    };
}

export function createSqliteResultArchive(db: Database.Database): ResultArchive {
    const insert = db.prepare<[string, string, string]>(`
        INSERT INTO results (ballot_id, record, hash)
        VALUES (?, ?, ?)
        ON CONFLICT(ballot_id) DO NOTHING
    `);
    const select = db.prepare<[string], PublishedResult>(
        'SELECT record, hash FROM results WHERE ballot_id = ?',
    );

    return {
        publish(ballotId: string, record: string, hash: string): boolean {
            return insert.run(ballotId, record, hash).changes > 0;
        },

        getResult(ballotId: string): PublishedResult | null {
            return select.get(ballotId) ?? null;
        },
    };
}
