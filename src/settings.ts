import path from 'node:path';
import dotenv from 'dotenv';

export interface Settings {
    // Logging
    logLevel: string;
    prettyLogs: boolean;

    // Storage
    dbPath: string;

    // Receipts
    /** server key that turns (ballot, voter) into an unlinkable storage key */
    voterKey: string;
    /** entropy of generated receipt secrets, in bytes */
    secretBytes: number;
}

let envLoaded = false;

function loadEnvFile(): void {
    if (envLoaded) return;
    envLoaded = true;
    // .env is optional
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
}

export function loadSettings(overrides: Partial<Settings> = {}): Settings {
    loadEnvFile();

    const env = (key: string, fallback = ''): string => process.env[key] || fallback;
    const num = (key: string, fallback: number): number => {
        const value = Number(process.env[key]);
        return Number.isInteger(value) && value > 0 ? value : fallback;
    };

    const dbPath = env('TALLY_DB_PATH', 'data/tally.db');

    return {
        logLevel: overrides.logLevel ?? env('TALLY_LOG_LEVEL', 'info'),
        prettyLogs: overrides.prettyLogs ?? env('TALLY_LOG_PRETTY') === 'true',
        dbPath: overrides.dbPath ?? (dbPath === ':memory:' ? dbPath : path.resolve(dbPath)),
        voterKey: overrides.voterKey ?? env('TALLY_VOTER_KEY'),
        secretBytes: overrides.secretBytes ?? num('TALLY_SECRET_BYTES', 12),
    };
}
