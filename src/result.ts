import crypto from 'node:crypto';
import { z } from 'zod';
import { CodecStatus, formatPartition, Partition, validateVoteString, VoteRejection } from './ballots';
import { Ballot, BallotInfo, resolveBallot, VoteMode } from './config';
import { ErrorCode, TallyError } from './errors';
import { pairwisePreference } from './pairwise';
import { voteHash } from './receipts';
import { schulze } from './schulze';
import { boundaryStatistics, countAbstentions, selectionCounts } from './statistics';
import { StoredVote } from './store';

const voteSchema = z.object({
    vote: z.string(),
    salt: z.string(),
    hash: z.string(),
});

const boundarySchema = z.object({
    upper: z.array(z.string()).min(1),
    lower: z.array(z.string()).min(1),
    pro: z.number().int().nonnegative(),
    contra: z.number().int().nonnegative(),
});

/**
 * The public result of a ballot.
 *
 * It holds everything needed to recompute the result from scratch: candidates, mode and every
 * accepted vote with its salt and hash.
 */
export const resultRecordSchema = z.object({
    assemblyId: z.string(),
    ballotId: z.string(),
    title: z.string().nullable(),
    mode: z.nativeEnum(VoteMode),
    /** N for classical ballots */
    numVotes: z.number().int().positive().nullable(),
    useBar: z.boolean(),
    /** in display order */
    candidates: z.array(z.object({
        token: z.string(),
        label: z.string().nullable(),
    })).min(1),
    /** the aggregate preference string */
    result: z.string(),
    boundaries: z.array(boundarySchema),
    /** selection counts of classical ballots, null otherwise */
    counts: z.array(z.object({
        candidate: z.string(),
        count: z.number().int().nonnegative(),
    })).nullable(),
    abstentions: z.number().int().nonnegative(),
    voteCount: z.number().int().nonnegative(),
    votes: z.array(voteSchema),
});

export type ResultRecord = z.infer<typeof resultRecordSchema>;

/** a ballot as needed for tallying */
export type TallyBallot = Omit<BallotInfo, 'phase'>;

/** the part of a result record computed from the votes */
export type Evaluation = Pick<ResultRecord, 'result' | 'boundaries' | 'counts' | 'abstentions' | 'voteCount'>;

/** tallies parsed votes. each must be a complete partition over `ballot.set.all()` */
export function evaluateVotes(ballot: Ballot, votes: Partition<string>[]): Evaluation {
    const d = pairwisePreference(votes, ballot.set.all());
    const { ranking } = schulze(d);

    let counts: Evaluation['counts'] = null;
    if (ballot.mode === VoteMode.Classical) {
        counts = [...selectionCounts(votes, ballot.set)].map(([candidate, count]) => ({ candidate, count }));
    }

    return {
        result: formatPartition(ranking, ballot.set),
        boundaries: boundaryStatistics(ranking, d),
        counts,
        abstentions: countAbstentions(votes),
        voteCount: votes.length,
    };
}

function compareVotes(a: StoredVote, b: StoredVote): number {
    const byVote = a.vote < b.vote ? -1 : a.vote > b.vote ? 1 : 0;
    if (byVote) return byVote;
    return a.salt < b.salt ? -1 : a.salt > b.salt ? 1 : 0;
}

export type ParsedVotes = {
    status: CodecStatus.Accepted;
    partitions: Partition<string>[];
} | {
    status: CodecStatus.Rejected;
    vote: string;
    reason: VoteRejection;
};

/** validates stored vote strings, stopping at the first invalid one */
export function parseVotes(votes: Pick<StoredVote, 'vote'>[], ballot: Ballot): ParsedVotes {
    const partitions: Partition<string>[] = [];
    for (const { vote } of votes) {
        const parsed = validateVoteString(vote, ballot);
        if (parsed.status !== CodecStatus.Accepted) {
            return { status: CodecStatus.Rejected, vote, reason: parsed.reason };
        }
        partitions.push(parsed.partition);
    }
    return { status: CodecStatus.Accepted, partitions };
}

/**
 * Tallies the stored votes of a closed ballot into its public record.
 *
 * Deterministic: the same ballot and votes, in any order, always give the same record.
 */
export function buildResultRecord(info: TallyBallot, votes: StoredVote[]): ResultRecord {
    const ballot = resolveBallot(info);
    const sorted = votes.map(vote => ({ vote: vote.vote, salt: vote.salt, hash: vote.hash })).sort(compareVotes);

    const parsed = parseVotes(sorted, ballot);
    if (parsed.status !== CodecStatus.Accepted) {
        throw new TallyError(
            `stored vote ${JSON.stringify(parsed.vote)} is invalid (${parsed.reason})`,
            ErrorCode.IntegrityFault,
            info.ballotId,
        );
    }

    return {
        assemblyId: info.assemblyId,
        ballotId: info.ballotId,
        title: info.title ?? null,
        mode: info.mode,
        numVotes: ballot.numVotes,
        useBar: info.useBar,
        candidates: info.candidates.map(c => ({ token: c.token, label: c.label ?? null })),
        ...evaluateVotes(ballot, parsed.partitions),
        votes: sorted,
    };
}

export function serializeResultRecord(record: ResultRecord): string {
    return JSON.stringify(record, null, 4) + '\n';
}

/** SHA-512 of a serialized record, hex encoded */
export function resultHash(serialized: string): string {
    return crypto.createHash('sha512').update(serialized).digest('hex');
}

export function parseResultRecord(text: string): ResultRecord {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new TallyError(`result record is not valid JSON: ${reason}`, ErrorCode.InvalidRecord);
    }

    const parsed = resultRecordSchema.safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new TallyError(
            `result record is malformed at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
            ErrorCode.InvalidRecord,
        );
    }
    return parsed.data;
}

export enum VerifyStatus {
    /** recomputing from the published votes gives the published result */
    Verified = 'verified',
    /** a published vote does not fit the ballot */
    InvalidVote = 'invalid-vote',
    /** the published result differs from the recomputed one */
    Mismatch = 'mismatch',
}

export type VerificationResult = {
    status: VerifyStatus.Verified;
} | {
    status: VerifyStatus.InvalidVote;
    vote: string;
    reason: VoteRejection;
} | {
    status: VerifyStatus.Mismatch;
    /** record fields that differ from the recomputation */
    fields: (keyof Evaluation)[];
    /** the recomputed aggregate preference string */
    expected: string;
};

/** the ballot a record was tallied for */
export function recordBallot(record: ResultRecord): Ballot {
    return resolveBallot({
        candidates: record.candidates.map(c => ({ token: c.token, label: c.label ?? undefined })),
        useBar: record.useBar,
        mode: record.mode,
        numVotes: record.numVotes ?? undefined,
    });
}

/** recomputes a published record from its own votes */
export function verifyResultRecord(record: ResultRecord): VerificationResult {
    const ballot = recordBallot(record);
    const parsed = parseVotes(record.votes, ballot);
    if (parsed.status !== CodecStatus.Accepted) {
        return { status: VerifyStatus.InvalidVote, vote: parsed.vote, reason: parsed.reason };
    }

    const recomputed = evaluateVotes(ballot, parsed.partitions);
    const keys: (keyof Evaluation)[] = ['result', 'boundaries', 'counts', 'abstentions', 'voteCount'];
    const fields = keys.filter(key => JSON.stringify(recomputed[key]) !== JSON.stringify(record[key]));

    if (fields.length) {
        return { status: VerifyStatus.Mismatch, fields, expected: recomputed.result };
    }
    return { status: VerifyStatus.Verified };
}

/** finds the vote cast with a receipt secret in a published record */
export function findOwnVote(record: ResultRecord, secret: string): StoredVote | null {
    return record.votes.find(v => v.hash === voteHash(v.salt, secret, v.vote)) ?? null;
}
