import { describe, expect, it } from 'vitest';
import {
    CodecStatus,
    encodeVote,
    formatPartition,
    LegacyPolicy,
    parsePreferenceString,
    upgradeLegacyClassicalVote,
    validateVoteString,
    VoteRejection,
} from './ballots';
import { resolveBallot, VoteMode } from './config';

const abcd = [{ token: 'A' }, { token: 'B' }, { token: 'C' }, { token: 'D' }];

const preferential = resolveBallot({ candidates: abcd, useBar: false, mode: VoteMode.Preferential });
const preferentialBar = resolveBallot({ candidates: abcd, useBar: true, mode: VoteMode.Preferential });
const classical = (numVotes: number, useBar = true) => resolveBallot({
    candidates: abcd,
    useBar,
    mode: VoteMode.Classical,
    numVotes,
});

describe('parsePreferenceString', () => {
    it('parses levels and ties', () => {
        const result = parsePreferenceString('C=D>A>B', preferential.set);
        expect(result).toEqual({
            status: CodecStatus.Accepted,
            partition: [['C', 'D'], ['A'], ['B']],
            vote: 'C=D>A>B',
        });
    });

    it('writes ties in candidate order', () => {
        const result = parsePreferenceString('D=C>B=A', preferential.set);
        expect(result).toMatchObject({ status: CodecStatus.Accepted, vote: 'C=D>A=B' });
    });

    it('round trips through formatPartition', () => {
        for (const vote of ['A>B>C>D', 'A=B=C=D', 'B>A=C>D', 'D>C=B=A']) {
            const result = parsePreferenceString(vote, preferential.set);
            if (result.status !== CodecStatus.Accepted) throw new Error(`rejected ${vote}`);
            expect(parsePreferenceString(formatPartition(result.partition, preferential.set), preferential.set))
                .toEqual(result);
        }
    });

    it('rejects malformed strings', () => {
        expect(parsePreferenceString('A>>B=C=D', preferential.set))
            .toEqual({ status: CodecStatus.Rejected, reason: VoteRejection.Malformed, candidates: [] });
        expect(parsePreferenceString('A>B>C>D>E', preferential.set))
            .toEqual({ status: CodecStatus.Rejected, reason: VoteRejection.UnknownCandidate, candidates: ['E'] });
        expect(parsePreferenceString('A>B>A>C>D', preferential.set))
            .toEqual({ status: CodecStatus.Rejected, reason: VoteRejection.DuplicateCandidate, candidates: ['A'] });
        expect(parsePreferenceString('A>B>C', preferential.set))
            .toEqual({ status: CodecStatus.Rejected, reason: VoteRejection.IncompleteRanking, candidates: ['D'] });
    });

    it('requires the bar when the ballot has one', () => {
        expect(parsePreferenceString('A>B>C>D', preferentialBar.set))
            .toMatchObject({ reason: VoteRejection.IncompleteRanking, candidates: ['_bar_'] });
        expect(parsePreferenceString('A>_bar_>B=C=D', preferentialBar.set))
            .toMatchObject({ status: CodecStatus.Accepted, vote: 'A>_bar_>B=C=D' });
    });
});

describe('encodeVote', () => {
    it('treats an empty preference string as abstention', () => {
        expect(encodeVote({ kind: 'preferential', vote: '  ' }, preferentialBar))
            .toMatchObject({ status: CodecStatus.Accepted, vote: 'A=B=C=D=_bar_' });
    });

    it('refuses payloads of the other mode', () => {
        expect(encodeVote({ kind: 'classical', selected: ['A'] }, preferential))
            .toMatchObject({ status: CodecStatus.Rejected, reason: VoteRejection.ModeMismatch });
        expect(encodeVote({ kind: 'preferential', vote: 'A>B=C=D' }, classical(1)))
            .toMatchObject({ status: CodecStatus.Rejected, reason: VoteRejection.ModeMismatch });
    });

    describe('classical with bar', () => {
        const ballot = classical(3);
        const encode = (selected: string[], rejectAll = false) =>
            encodeVote({ kind: 'classical', selected, rejectAll }, ballot);

        it('puts the bar below a partial selection', () => {
            expect(encode(['D', 'A', 'B'])).toMatchObject({ vote: 'A=B=D>C=_bar_' });
        });

        it('puts the bar alone on top when rejecting all', () => {
            expect(encode([], true)).toMatchObject({ vote: '_bar_>A=B=C=D' });
        });

        it('ties everything for an empty selection', () => {
            expect(encode([])).toMatchObject({ vote: 'A=B=C=D=_bar_' });
        });

        it('puts the bar alone at the bottom when everyone is selected', () => {
            const result = encodeVote({ kind: 'classical', selected: ['A', 'B', 'C', 'D'] }, classical(4));
            expect(result).toMatchObject({ status: CodecStatus.Accepted, vote: 'A=B=C=D>_bar_' });
        });

        it('refuses selecting more than N', () => {
            expect(encode(['D', 'C', 'B', 'A'])).toEqual({
                status: CodecStatus.Rejected,
                reason: VoteRejection.TooManyVotes,
                candidates: ['A', 'B', 'C', 'D'],
            });
        });

        it('refuses rejecting all next to a selection', () => {
            expect(encode(['A'], true)).toEqual({
                status: CodecStatus.Rejected,
                reason: VoteRejection.RejectionIsExclusive,
                candidates: ['A'],
            });
        });

        it('refuses unknown, duplicate and bar selections', () => {
            expect(encode(['E'])).toMatchObject({ reason: VoteRejection.UnknownCandidate, candidates: ['E'] });
            expect(encode(['_bar_'])).toMatchObject({ reason: VoteRejection.UnknownCandidate, candidates: ['_bar_'] });
            expect(encode(['A', 'A'])).toMatchObject({ reason: VoteRejection.DuplicateCandidate, candidates: ['A'] });
        });
    });

    describe('classical without bar', () => {
        it('splits chosen from not chosen', () => {
            expect(encodeVote({ kind: 'classical', selected: ['C'] }, classical(1, false)))
                .toMatchObject({ status: CodecStatus.Accepted, vote: 'C>A=B=D' });
        });

        it('cannot reject all', () => {
            expect(encodeVote({ kind: 'classical', selected: [], rejectAll: true }, classical(1, false)))
                .toMatchObject({ status: CodecStatus.Rejected, reason: VoteRejection.BarUnavailable });
        });
    });
});

describe('validateVoteString', () => {
    const ballot = classical(2);

    it('accepts what the classical encoder produces', () => {
        for (const vote of ['A=B>C=D=_bar_', '_bar_>A=B=C=D', 'A=B=C=D=_bar_', 'B>A=C=D=_bar_']) {
            expect(validateVoteString(vote, ballot)).toMatchObject({ status: CodecStatus.Accepted, vote });
        }
    });

    it('refuses classical strings no selection can produce', () => {
        expect(validateVoteString('A>B>C=D=_bar_', ballot))
            .toMatchObject({ reason: VoteRejection.TooManyLevels });
        expect(validateVoteString('A=_bar_>B=C=D', ballot))
            .toMatchObject({ reason: VoteRejection.MisplacedBar });
        expect(validateVoteString('A=B=C>D=_bar_', ballot))
            .toMatchObject({ reason: VoteRejection.TooManyVotes, candidates: ['A', 'B', 'C'] });
    });

    it('does not restrict preferential strings', () => {
        expect(validateVoteString('A>B>_bar_>C>D', preferentialBar))
            .toMatchObject({ status: CodecStatus.Accepted });
    });
});

describe('upgradeLegacyClassicalVote', () => {
    const ballot = resolveBallot({
        candidates: abcd.slice(0, 3),
        useBar: true,
        mode: VoteMode.Classical,
        numVotes: 3,
    });

    it('adds the bar to the lowest level', () => {
        expect(upgradeLegacyClassicalVote('A>B=C', ballot))
            .toMatchObject({ status: CodecStatus.Accepted, vote: 'A>B=C=_bar_' });
    });

    it('leaves votes that already rank the bar alone', () => {
        expect(upgradeLegacyClassicalVote('_bar_>A=B=C', ballot))
            .toMatchObject({ status: CodecStatus.Accepted, vote: '_bar_>A=B=C' });
    });

    it('needs a policy for single-level votes', () => {
        expect(upgradeLegacyClassicalVote('A=B=C', ballot))
            .toMatchObject({ status: CodecStatus.Rejected, reason: VoteRejection.AmbiguousLegacyVote });
        expect(upgradeLegacyClassicalVote('A=B=C', ballot, LegacyPolicy.Abstain))
            .toMatchObject({ status: CodecStatus.Accepted, vote: 'A=B=C=_bar_' });
        expect(upgradeLegacyClassicalVote('A=B=C', ballot, LegacyPolicy.Approve))
            .toMatchObject({ status: CodecStatus.Accepted, vote: 'A=B=C>_bar_' });
    });

    it('still enforces N when approving everyone', () => {
        const narrow = resolveBallot({ candidates: abcd.slice(0, 3), useBar: true, mode: VoteMode.Classical, numVotes: 2 });
        expect(upgradeLegacyClassicalVote('A=B=C', narrow, LegacyPolicy.Approve))
            .toMatchObject({ status: CodecStatus.Rejected, reason: VoteRejection.TooManyVotes });
    });

    it('only applies to classical ballots', () => {
        expect(upgradeLegacyClassicalVote('A>B=C=D', preferentialBar))
            .toMatchObject({ status: CodecStatus.Rejected, reason: VoteRejection.ModeMismatch });
    });
});
