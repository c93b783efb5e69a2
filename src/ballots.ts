import { BAR, CandidateSet } from './candidates';
import { Ballot, VoteMode } from './config';

/**
 * A preference partition: levels from most to least preferred, with the candidates of
 * one level tied. Every candidate of the ballot appears in exactly one level.
 *
 * For example, `C=D>A>B` is `[['C', 'D'], ['A'], ['B']]`.
 */
export type Partition<N> = N[][];

export enum CodecStatus {
    Accepted = 'accepted',
    Rejected = 'rejected',
}

/** reasons a vote is refused */
export enum VoteRejection {
    /** empty token, e.g. `A>>B` */
    Malformed = 'malformed',
    UnknownCandidate = 'unknown-candidate',
    DuplicateCandidate = 'duplicate-candidate',
    /** a preference string that leaves out candidates */
    IncompleteRanking = 'incomplete-ranking',
    /** a classical vote selecting more than N candidates */
    TooManyVotes = 'too-many-votes',
    /** a classical vote selecting candidates and rejecting all of them */
    RejectionIsExclusive = 'rejection-is-exclusive',
    /** a classical “reject all” on a ballot without bar */
    BarUnavailable = 'bar-unavailable',
    /** payload kind does not match the ballot mode */
    ModeMismatch = 'mode-mismatch',
    /** a stored classical vote with more than two levels */
    TooManyLevels = 'too-many-levels',
    /** a stored classical vote with the bar tied to selected candidates */
    MisplacedBar = 'misplaced-bar',
    /** a legacy classical vote that cannot tell abstention from approving everyone */
    AmbiguousLegacyVote = 'ambiguous-legacy-vote',
}

export type CodecResult = {
    status: CodecStatus.Accepted;
    partition: Partition<string>;
    /** canonical vote string */
    vote: string;
} | {
    status: CodecStatus.Rejected;
    reason: VoteRejection;
    /** offending tokens, if the reason has any */
    candidates: string[];
};

/** raw vote input, in one of the two surface formats */
export type VotePayload = {
    kind: 'preferential';
    /** a relation string like `C=D>A>B=E`. empty means abstention */
    vote: string;
} | {
    kind: 'classical';
    selected: string[];
    /** reject all candidates. needs a ballot with bar and an empty selection */
    rejectAll?: boolean;
};

/** how to read a legacy classical vote that is a single level over the real candidates */
export enum LegacyPolicy {
    Unresolvable = 'unresolvable',
    Abstain = 'abstain',
    Approve = 'approve',
}

/** serializes a partition. members of each level are written in candidate order */
export function formatPartition(partition: Partition<string>, set: CandidateSet): string {
    return partition.map(level => set.sort(level).join('=')).join('>');
}

/** splits a vote string into levels without checking it against a ballot */
export function splitVoteString(vote: string): Partition<string> {
    return vote.split('>').map(level => level.split('='));
}

function accept(partition: Partition<string>, set: CandidateSet): CodecResult {
    const levels = partition.filter(level => level.length).map(level => set.sort(level));
    return {
        status: CodecStatus.Accepted,
        partition: levels,
        vote: levels.map(level => level.join('=')).join('>'),
    };
}

function reject(reason: VoteRejection, candidates: string[] = []): CodecResult {
    return { status: CodecStatus.Rejected, reason, candidates };
}

/** the vote that ties every candidate and the bar */
export function abstention(set: CandidateSet): Partition<string> {
    return [set.all()];
}

/** parses a preference string, which must rank every candidate (and the bar, if enabled) exactly once */
export function parsePreferenceString(vote: string, set: CandidateSet): CodecResult {
    const levels = splitVoteString(vote);
    const seen = new Set<string>();

    for (const level of levels) {
        for (const token of level) {
            if (!token) return reject(VoteRejection.Malformed);
            if (!set.has(token)) return reject(VoteRejection.UnknownCandidate, [token]);
            if (seen.has(token)) return reject(VoteRejection.DuplicateCandidate, [token]);
            seen.add(token);
        }
    }

    const missing = set.all().filter(token => !seen.has(token));
    if (missing.length) return reject(VoteRejection.IncompleteRanking, missing);

    return accept(levels, set);
}

/**
 * Maps a classical selection to its canonical partition.
 *
 * Classical votes have at most two levels, chosen over not chosen. With a bar the three
 * edge cases are told apart by where the bar goes: rejecting all puts it on top,
 * choosing everyone puts it alone at the bottom and an empty selection ties it with all.
 */
export function encodeClassicalVote(selected: string[], rejectAll: boolean, ballot: Ballot): CodecResult {
    const { set } = ballot;
    const maxVotes = ballot.numVotes ?? set.tokens().length;

    if (rejectAll) {
        if (!set.useBar) return reject(VoteRejection.BarUnavailable, [BAR]);
        if (selected.length) return reject(VoteRejection.RejectionIsExclusive, selected.slice());
        return accept([[BAR], set.tokens()], set);
    }

    const chosen = new Set<string>();
    for (const token of selected) {
        // the bar can only be picked through rejectAll
        if (token === BAR || !set.has(token)) return reject(VoteRejection.UnknownCandidate, [token]);
        if (chosen.has(token)) return reject(VoteRejection.DuplicateCandidate, [token]);
        chosen.add(token);
    }
    if (chosen.size > maxVotes) return reject(VoteRejection.TooManyVotes, set.sort([...chosen]));

    const preferred = set.tokens().filter(token => chosen.has(token));
    const rest = set.tokens().filter(token => !chosen.has(token));

    if (set.useBar) {
        if (!preferred.length) return accept(abstention(set), set);
        return accept([preferred, [...rest, BAR]], set);
    }
    return accept([preferred, rest], set);
}

/** validates raw vote input for a ballot and returns its canonical form */
export function encodeVote(payload: VotePayload, ballot: Ballot): CodecResult {
    if (payload.kind === 'preferential') {
        if (ballot.mode !== VoteMode.Preferential) return reject(VoteRejection.ModeMismatch);
        const vote = payload.vote.trim();
        // an empty preference string counts as abstaining
        if (!vote) return accept(abstention(ballot.set), ballot.set);
        return parsePreferenceString(vote, ballot.set);
    }

    if (ballot.mode !== VoteMode.Classical) return reject(VoteRejection.ModeMismatch);
    return encodeClassicalVote(payload.selected, payload.rejectAll ?? false, ballot);
}

/**
 * Validates a stored vote string, e.g. one read back from the vote store or a published result.
 *
 * Classical votes must additionally look like something `encodeClassicalVote` produces.
 */
export function validateVoteString(vote: string, ballot: Ballot): CodecResult {
    const parsed = parsePreferenceString(vote, ballot.set);
    if (parsed.status !== CodecStatus.Accepted) return parsed;

    const levels = parsed.partition;
    if (ballot.mode === VoteMode.Classical && levels.length > 1) {
        if (levels.length > 2) return reject(VoteRejection.TooManyLevels);

        const [top] = levels;
        if (top.includes(BAR) && top.length > 1) return reject(VoteRejection.MisplacedBar, [BAR]);
        if (top.length > (ballot.numVotes ?? top.length)) return reject(VoteRejection.TooManyVotes, top.slice());
    }

    return parsed;
}

/**
 * Reads a classical vote string recorded before the bar was added to classical ballots.
 *
 * Such a string ranks only the real candidates. Two levels are unambiguous: the bar joins the
 * lower one. A single level was either an abstention or a vote for everyone, and only the
 * caller can know which; `LegacyPolicy.Unresolvable` refuses to guess.
 */
export function upgradeLegacyClassicalVote(
    vote: string,
    ballot: Ballot,
    policy: LegacyPolicy = LegacyPolicy.Unresolvable,
): CodecResult {
    const { set } = ballot;
    if (ballot.mode !== VoteMode.Classical) return reject(VoteRejection.ModeMismatch);
    if (!set.useBar || splitVoteString(vote).some(level => level.includes(BAR))) {
        return validateVoteString(vote, ballot);
    }

    const legacy = parsePreferenceString(vote, new CandidateSet([...set.candidates], false));
    if (legacy.status !== CodecStatus.Accepted) return legacy;

    const levels = legacy.partition;
    if (levels.length === 1) {
        if (policy === LegacyPolicy.Abstain) return accept(abstention(set), set);
        if (policy === LegacyPolicy.Approve) return validateVoteString(formatPartition([set.tokens(), [BAR]], set), ballot);
        return reject(VoteRejection.AmbiguousLegacyVote);
    }

    const lowest = levels[levels.length - 1];
    const upgraded = [...levels.slice(0, -1), [...lowest, BAR]];
    return validateVoteString(formatPartition(upgraded, set), ballot);
}
