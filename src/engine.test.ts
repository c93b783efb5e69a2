import { beforeEach, describe, expect, it } from 'vitest';
import { VoteRejection } from './ballots';
import { BallotInfo, BallotPhase, VoteMode } from './config';
import { BallotDirectory, createEngine, LookupStatus, SubmitResult, SubmitStatus, TallyEngine } from './engine';
import { ErrorCode } from './errors';
import { MemoryReceiptRegistry } from './receipts';
import { serializeResultRecord } from './result';
import { loadSettings } from './settings';
import { MemoryResultArchive, MemoryVoteStore } from './store';

class FakeDirectory implements BallotDirectory {
    ballots = new Map<string, BallotInfo>();
    concluded = new Set<string>();

    async getBallot(ballotId: string): Promise<BallotInfo | null> {
        return this.ballots.get(ballotId) ?? null;
    }

    async isConcluded(assemblyId: string): Promise<boolean> {
        return this.concluded.has(assemblyId);
    }

    add(ballot: BallotInfo) {
        this.ballots.set(ballot.ballotId, ballot);
    }

    setPhase(ballotId: string, phase: BallotPhase) {
        const ballot = this.ballots.get(ballotId);
        if (!ballot) throw new Error(`no ballot ${ballotId}`);
        this.ballots.set(ballotId, { ...ballot, phase });
    }
}

const delegates: BallotInfo = {
    ballotId: 'delegates',
    assemblyId: 'assembly-1',
    title: 'Delegates',
    candidates: ['A', 'B', 'C', 'D', 'E', 'J'].map(token => ({ token })),
    useBar: false,
    mode: VoteMode.Preferential,
    phase: BallotPhase.Voting,
};

const board: BallotInfo = {
    ballotId: 'board',
    assemblyId: 'assembly-1',
    candidates: ['A', 'B', 'C', 'D'].map(token => ({ token })),
    useBar: true,
    mode: VoteMode.Classical,
    numVotes: 3,
    phase: BallotPhase.Voting,
};

let directory: FakeDirectory;
let votes: MemoryVoteStore;
let receipts: MemoryReceiptRegistry;
let archive: MemoryResultArchive;
let engine: TallyEngine;

beforeEach(() => {
    directory = new FakeDirectory();
    directory.add(delegates);
    directory.add(board);
    votes = new MemoryVoteStore();
    receipts = new MemoryReceiptRegistry();
    archive = new MemoryResultArchive();
    engine = new TallyEngine({ directory, votes, receipts, archive, voterKey: 'test-key' });
});

function secretOf(result: SubmitResult): string {
    if (result.status !== SubmitStatus.Accepted) throw new Error(`vote rejected: ${result.reason}`);
    return result.secret;
}

async function castDelegateVotes() {
    const cast = [
        ...new Array<string>(3).fill('C=D>A>B=E>J'),
        ...new Array<string>(2).fill('J>A>B=C=D=E'),
    ];
    const secrets: string[] = [];
    for (const [i, vote] of cast.entries()) {
        secrets.push(secretOf(await engine.submitVote('delegates', `voter-${i}`, { kind: 'preferential', vote })));
    }
    return secrets;
}

describe('TallyEngine', () => {
    it('needs a voter key', () => {
        let error: unknown;
        try {
            new TallyEngine({ directory, votes, receipts, archive, voterKey: '' });
        } catch (err) {
            error = err;
        }
        expect(error).toMatchObject({ code: ErrorCode.Configuration });
    });

    describe('submitVote', () => {
        it('stores the canonical vote and hands out a receipt', async () => {
            const result = await engine.submitVote('delegates', 'voter-1', { kind: 'preferential', vote: 'D=C>A>B=E>J' });
            expect(result).toMatchObject({ status: SubmitStatus.Accepted, vote: 'C=D>A>B=E>J' });

            expect(engine.verify(secretOf(result))).toEqual({
                status: LookupStatus.Found,
                ballotId: 'delegates',
                vote: 'C=D>A>B=E>J',
            });
        });

        it('returns rejections as values', async () => {
            const result = await engine.submitVote('delegates', 'voter-1', { kind: 'preferential', vote: 'A>B' });
            expect(result).toEqual({
                status: SubmitStatus.Rejected,
                reason: VoteRejection.IncompleteRanking,
                candidates: ['C', 'D', 'E', 'J'],
            });
            expect(votes.listVotes('delegates')).toEqual([]);
        });

        it('replaces a previous vote and its receipt', async () => {
            const first = secretOf(await engine.submitVote('board', 'voter-1', { kind: 'classical', selected: ['A'] }));
            const second = secretOf(await engine.submitVote('board', 'voter-1', { kind: 'classical', selected: ['B', 'D'] }));

            expect(votes.listVotes('board').map(v => v.vote)).toEqual(['B=D>A=C=_bar_']);
            expect(engine.verify(first)).toEqual({ status: LookupStatus.NotFound });
            expect(engine.verify(second)).toEqual({ status: LookupStatus.Found, ballotId: 'board', vote: 'B=D>A=C=_bar_' });
        });

        it('keeps voters apart', async () => {
            await engine.submitVote('board', 'voter-1', { kind: 'classical', selected: ['A', 'B', 'D'] });
            await engine.submitVote('board', 'voter-2', { kind: 'classical', selected: [], rejectAll: true });
            expect(votes.listVotes('board').map(v => v.vote).sort()).toEqual(['A=B=D>C=_bar_', '_bar_>A=B=C=D']);
        });

        it('only accepts votes while voting', async () => {
            await expect(engine.submitVote('missing', 'voter-1', { kind: 'preferential', vote: '' }))
                .rejects.toMatchObject({ code: ErrorCode.BallotNotFound });

            directory.setPhase('delegates', BallotPhase.Upcoming);
            await expect(engine.submitVote('delegates', 'voter-1', { kind: 'preferential', vote: '' }))
                .rejects.toMatchObject({ code: ErrorCode.BallotNotVoting, ballotId: 'delegates' });

            directory.setPhase('delegates', BallotPhase.Closed);
            await expect(engine.submitVote('delegates', 'voter-1', { kind: 'preferential', vote: '' }))
                .rejects.toMatchObject({ code: ErrorCode.BallotNotVoting });
        });
    });

    describe('tally', () => {
        it('waits for the ballot to close', async () => {
            await expect(engine.tally('delegates')).rejects.toMatchObject({ code: ErrorCode.BallotNotClosed });
        });

        it('publishes the result once', async () => {
            await castDelegateVotes();
            directory.setPhase('delegates', BallotPhase.Closed);

            const record = await engine.tally('delegates');
            expect(record.result).toBe('C=D>A>B=E>J');
            expect(record.boundaries).toEqual([
                { upper: ['C', 'D'], lower: ['A'], pro: 3, contra: 2 },
                { upper: ['A'], lower: ['B', 'E'], pro: 5, contra: 0 },
                { upper: ['B', 'E'], lower: ['J'], pro: 3, contra: 2 },
            ]);
            expect(record.voteCount).toBe(5);

            const published = archive.getResult('delegates');
            expect(published?.record).toBe(serializeResultRecord(record));

            // a late vote slipping into the store does not change what was published
            votes.putVote('delegates', 'late', { vote: 'J>A=B=C=D=E', salt: 'x', hash: 'y' });
            expect(await engine.tally('delegates')).toEqual(record);
            expect(archive.getResult('delegates')).toEqual(published);
        });

        it('refuses to publish next to a different result', async () => {
            class RacingArchive extends MemoryResultArchive {
                publish(ballotId: string, record: string, hash: string): boolean {
                    super.publish(ballotId, record.replace('"voteCount": 5', '"voteCount": 6'), hash);
                    return false;
                }
            }
            archive = new RacingArchive();
            engine = new TallyEngine({ directory, votes, receipts, archive, voterKey: 'test-key' });

            await castDelegateVotes();
            directory.setPhase('delegates', BallotPhase.Closed);
            await expect(engine.tally('delegates')).rejects.toMatchObject({ code: ErrorCode.IntegrityFault });
        });
    });

    describe('audit', () => {
        it('needs a published result', async () => {
            directory.setPhase('delegates', BallotPhase.Closed);
            await expect(engine.audit('delegates')).rejects.toMatchObject({ code: ErrorCode.ResultNotPublished });
            expect(archive.getResult('delegates')).toBeNull();
        });

        it('recomputes the published record', async () => {
            await castDelegateVotes();
            directory.setPhase('delegates', BallotPhase.Closed);
            const record = await engine.tally('delegates');
            expect(await engine.audit('delegates')).toEqual(record);
        });

        it('detects stored votes that differ from the published ones', async () => {
            await castDelegateVotes();
            directory.setPhase('delegates', BallotPhase.Closed);
            await engine.tally('delegates');

            votes.putVote('delegates', 'intruder', { vote: 'J>A=B=C=D=E', salt: 'x', hash: 'y' });
            await expect(engine.audit('delegates')).rejects.toMatchObject({
                code: ErrorCode.IntegrityFault,
                ballotId: 'delegates',
            });
        });
    });

    describe('concludeAssembly', () => {
        it('waits for the assembly to conclude', async () => {
            await expect(engine.concludeAssembly('assembly-1'))
                .rejects.toMatchObject({ code: ErrorCode.AssemblyNotConcluded });
        });

        it('makes receipts unusable but keeps results auditable', async () => {
            const secrets = await castDelegateVotes();
            const boardSecret = secretOf(await engine.submitVote('board', 'voter-1', { kind: 'classical', selected: ['C'] }));
            directory.setPhase('delegates', BallotPhase.Closed);
            directory.setPhase('board', BallotPhase.Closed);
            await engine.tally('delegates');
            const published = archive.getResult('delegates')?.record;

            directory.concluded.add('assembly-1');
            expect(await engine.concludeAssembly('assembly-1')).toBe(6);

            for (const secret of [...secrets, boardSecret]) {
                expect(engine.verify(secret)).toEqual({ status: LookupStatus.NotFound });
            }
            expect(serializeResultRecord(await engine.audit('delegates'))).toBe(published);
            expect(await engine.concludeAssembly('assembly-1')).toBe(0);
        });
    });

    it('pairs votes and receipts in SQLite', async () => {
        const sqlite = createEngine(directory, loadSettings({ dbPath: ':memory:', voterKey: 'test-key' }));
        const first = secretOf(await sqlite.submitVote('board', 'voter-1', { kind: 'classical', selected: ['A'] }));
        const second = secretOf(await sqlite.submitVote('board', 'voter-1', { kind: 'classical', selected: ['C'] }));

        expect(sqlite.verify(first)).toEqual({ status: LookupStatus.NotFound });
        expect(sqlite.verify(second)).toEqual({ status: LookupStatus.Found, ballotId: 'board', vote: 'C>A=B=D=_bar_' });
    });

    it('answers unknown secrets like purged ones', () => {
        expect(engine.verify('no-such-secret')).toEqual({ status: LookupStatus.NotFound });
    });
});
