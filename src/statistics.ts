import { Partition, splitVoteString } from './ballots';
import { CandidateSet } from './candidates';
import { VoteMode } from './config';
import { PairwiseMatrix } from './pairwise';

/** support for one step of the aggregate ranking */
export interface LevelBoundary<N> {
    /** the level ranked higher */
    upper: N[];
    /** the level directly below it */
    lower: N[];
    /** votes ranking the upper level above the lower one */
    pro: number;
    /** votes ranking the lower level above the upper one */
    contra: number;
}

export function remapBoundary<N, M>(boundary: LevelBoundary<N>, remap: (node: N) => M): LevelBoundary<M> {
    return { ...boundary, upper: boundary.upper.map(remap), lower: boundary.lower.map(remap) };
}

/**
 * Computes Pro and Contra for every adjacent pair of levels of the aggregate ranking.
 *
 * Each level is represented by its first member; the counts are read off the pairwise matrix.
 */
export function boundaryStatistics<N>(ranking: Partition<N>, d: PairwiseMatrix<N>): LevelBoundary<N>[] {
    const boundaries: LevelBoundary<N>[] = [];
    for (let i = 0; i + 1 < ranking.length; i++) {
        const upper = ranking[i];
        const lower = ranking[i + 1];
        boundaries.push({
            upper: upper.slice(),
            lower: lower.slice(),
            pro: d.get(upper[0], lower[0]),
            contra: d.get(lower[0], upper[0]),
        });
    }
    return boundaries;
}

/**
 * Counts how often each candidate was selected in a classical ballot.
 *
 * A vote with more than one level selected the candidates in its top level. A single level is an
 * abstention. A top level that is only the bar is a “reject all” and counts for the bar.
 */
export function selectionCounts(votes: Partition<string>[], set: CandidateSet): Map<string, number> {
    const counts = new Map<string, number>(set.all().map(token => [token, 0]));
    for (const vote of votes) {
        if (vote.length < 2) continue;
        for (const token of vote[0]) {
            counts.set(token, (counts.get(token) ?? 0) + 1);
        }
    }
    return counts;
}

/** counts single-level votes, i.e. abstentions */
export function countAbstentions<N>(votes: Partition<N>[]): number {
    return votes.filter(vote => vote.length === 1).length;
}

/** key under which classical abstentions are counted by `countEqualVotes` */
export const ABSTAIN_KEY = 'special: abstain';

/**
 * Counts how often each distinct vote was cast, most frequent first.
 *
 * Votes are expected in canonical form. In classical mode only the selected candidates matter, so
 * a vote is keyed by its top level.
 */
export function countEqualVotes(votes: string[], mode: VoteMode): Map<string, number> {
    const counts = new Map<string, number>();
    for (const vote of votes) {
        let key = vote;
        if (mode === VoteMode.Classical) {
            const levels = splitVoteString(vote);
            key = levels.length === 1 ? ABSTAIN_KEY : levels[0].join('=');
        }
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return new Map([...counts.entries()].sort(([a, x], [b, y]) => y - x || (a < b ? -1 : a > b ? 1 : 0)));
}
