import { CodecStatus, encodeVote, VotePayload, VoteRejection } from './ballots';
import { BallotInfo, BallotPhase, resolveBallot } from './config';
import { ErrorCode, TallyError } from './errors';
import { getLogger } from './logger';
import { generateSecret, ReceiptRegistry, secretDigest, storageKey, voteHash } from './receipts';
import {
    buildResultRecord,
    parseResultRecord,
    ResultRecord,
    resultHash,
    serializeResultRecord,
} from './result';
import { Settings } from './settings';
import {
    createSqliteReceiptRegistry,
    createSqliteResultArchive,
    createSqliteTransaction,
    createSqliteVoteStore,
    openDatabase,
} from './sqlite-store';
import { PublishedResult, ResultArchive, runDirectly, VoteStore, WriteTransaction } from './store';

/** the surrounding system's view of ballots and assemblies */
export interface BallotDirectory {
    /** candidate set, mode and phase of a ballot, or null if there is no such ballot */
    getBallot(ballotId: string): Promise<BallotInfo | null>;
    isConcluded(assemblyId: string): Promise<boolean>;
}

export interface EngineOptions {
    directory: BallotDirectory;
    votes: VoteStore;
    receipts: ReceiptRegistry;
    archive: ResultArchive;
    /** groups the vote and receipt writes of one submission. needed once stores are shared between processes */
    transaction?: WriteTransaction;
    /** server key for storage keys. must stay the same for the lifetime of an assembly */
    voterKey: string;
    /** entropy of receipt secrets and salts, in bytes */
    secretBytes?: number;
}

export enum SubmitStatus {
    Accepted = 'accepted',
    Rejected = 'rejected',
}

export type SubmitResult = {
    status: SubmitStatus.Accepted;
    /** receipt secret; the only way to find this vote again */
    secret: string;
    /** the canonical vote as stored */
    vote: string;
} | {
    status: SubmitStatus.Rejected;
    reason: VoteRejection;
    candidates: string[];
};

export enum LookupStatus {
    Found = 'found',
    NotFound = 'not-found',
}

export type LookupResult = {
    status: LookupStatus.Found;
    ballotId: string;
    vote: string;
} | {
    status: LookupStatus.NotFound;
};

/**
 * Accepts votes, tallies closed ballots and answers receipt lookups.
 *
 * Store and registry writes are synchronous, and every write sequence below runs without an
 * `await` in between. The vote and receipt of a submission are written in one `transaction`,
 * which keeps them paired when several processes share the stores.
 */
export class TallyEngine {
    #directory: BallotDirectory;
    #votes: VoteStore;
    #receipts: ReceiptRegistry;
    #archive: ResultArchive;
    #transaction: WriteTransaction;
    #voterKey: string;
    #secretBytes: number;
    #log = getLogger().child({ module: 'engine' });

    constructor(options: EngineOptions) {
        if (!options.voterKey) {
            throw new TallyError('a voter key is required (TALLY_VOTER_KEY)', ErrorCode.Configuration);
        }
        this.#directory = options.directory;
        this.#votes = options.votes;
        this.#receipts = options.receipts;
        this.#archive = options.archive;
        this.#transaction = options.transaction ?? runDirectly;
        this.#voterKey = options.voterKey;
        this.#secretBytes = options.secretBytes ?? 12;
    }

    async #ballot(ballotId: string): Promise<BallotInfo> {
        const info = await this.#directory.getBallot(ballotId);
        if (!info) throw new TallyError(`ballot ${ballotId} not found`, ErrorCode.BallotNotFound, ballotId);
        return info;
    }

    /**
     * Records a voter's vote, replacing any earlier one, and returns a fresh receipt secret.
     *
     * A resubmission invalidates the previous secret.
     */
    async submitVote(ballotId: string, voterId: string, payload: VotePayload): Promise<SubmitResult> {
        const info = await this.#ballot(ballotId);
        if (info.phase !== BallotPhase.Voting) {
            throw new TallyError(`ballot ${ballotId} is not open for voting`, ErrorCode.BallotNotVoting, ballotId);
        }

        const encoded = encodeVote(payload, resolveBallot(info));
        if (encoded.status !== CodecStatus.Accepted) {
            this.#log.info({ ballotId, reason: encoded.reason }, 'vote rejected');
            return { status: SubmitStatus.Rejected, reason: encoded.reason, candidates: encoded.candidates };
        }

        const key = storageKey(this.#voterKey, ballotId, voterId);
        const secret = generateSecret(this.#secretBytes);
        const salt = generateSecret(this.#secretBytes);

        this.#transaction(() => {
            this.#votes.putVote(ballotId, key, { vote: encoded.vote, salt, hash: voteHash(salt, secret, encoded.vote) });
            this.#receipts.replace({ ballotId, assemblyId: info.assemblyId, storageKey: key, digest: secretDigest(secret) });
        });

        this.#log.debug({ ballotId }, 'vote accepted');
        return { status: SubmitStatus.Accepted, secret, vote: encoded.vote };
    }

    #assertMatches(ballotId: string, published: PublishedResult, serialized: string) {
        if (published.record === serialized && published.hash === resultHash(published.record)) return;

        this.#log.error(
            { ballotId, publishedHash: published.hash, recomputedHash: resultHash(serialized) },
            'recomputed result differs from published result',
        );
        throw new TallyError(
            `ballot ${ballotId}: recomputed result differs from published result`,
            ErrorCode.IntegrityFault,
            ballotId,
        );
    }

    /**
     * Tallies a closed ballot and publishes its result record.
     *
     * A ballot is published at most once; later calls return the published record.
     */
    async tally(ballotId: string): Promise<ResultRecord> {
        const info = await this.#ballot(ballotId);
        if (info.phase !== BallotPhase.Closed) {
            throw new TallyError(`ballot ${ballotId} is still open`, ErrorCode.BallotNotClosed, ballotId);
        }

        const existing = this.#archive.getResult(ballotId);
        if (existing) return parseResultRecord(existing.record);

        const record = buildResultRecord(info, this.#votes.listVotes(ballotId));
        const serialized = serializeResultRecord(record);
        const hash = resultHash(serialized);

        if (!this.#archive.publish(ballotId, serialized, hash)) {
            // someone else published in the meantime; theirs stands, but it has to agree with ours
            const published = this.#archive.getResult(ballotId);
            if (!published) {
                throw new TallyError(`ballot ${ballotId}: result vanished from archive`, ErrorCode.IntegrityFault, ballotId);
            }
            this.#assertMatches(ballotId, published, serialized);
            return record;
        }

        this.#log.info({ ballotId, result: record.result, votes: record.voteCount, hash }, 'ballot tallied');
        return record;
    }

    /** recomputes a published result from the stored votes without publishing anything */
    async audit(ballotId: string): Promise<ResultRecord> {
        const info = await this.#ballot(ballotId);
        const published = this.#archive.getResult(ballotId);
        if (!published) {
            throw new TallyError(`ballot ${ballotId} has no published result`, ErrorCode.ResultNotPublished, ballotId);
        }

        const record = buildResultRecord(info, this.#votes.listVotes(ballotId));
        this.#assertMatches(ballotId, published, serializeResultRecord(record));
        return record;
    }

    /**
     * Finds the vote belonging to a receipt secret.
     *
     * Wrong and purged secrets both give `NotFound`.
     */
    verify(secret: string): LookupResult {
        const entry = this.#receipts.lookup(secretDigest(secret));
        if (!entry) return { status: LookupStatus.NotFound };

        const stored = this.#votes.getVote(entry.ballotId, entry.storageKey);
        if (!stored || stored.hash !== voteHash(stored.salt, secret, stored.vote)) {
            return { status: LookupStatus.NotFound };
        }
        return { status: LookupStatus.Found, ballotId: entry.ballotId, vote: stored.vote };
    }

    /** deletes every receipt of a concluded assembly. this cannot be undone */
    async concludeAssembly(assemblyId: string): Promise<number> {
        if (!(await this.#directory.isConcluded(assemblyId))) {
            throw new TallyError(`assembly ${assemblyId} has not concluded`, ErrorCode.AssemblyNotConcluded);
        }
        const purged = this.#receipts.purgeAssembly(assemblyId);
        this.#log.info({ assemblyId, purged }, 'receipts purged');
        return purged;
    }
}

/** an engine backed by the SQLite database at `settings.dbPath` */
export function createEngine(directory: BallotDirectory, settings: Settings): TallyEngine {
    const db = openDatabase(settings.dbPath);
    return new TallyEngine({
        directory,
        votes: createSqliteVoteStore(db),
        receipts: createSqliteReceiptRegistry(db),
        archive: createSqliteResultArchive(db),
        transaction: createSqliteTransaction(db),
        voterKey: settings.voterKey,
        secretBytes: settings.secretBytes,
    });
}
