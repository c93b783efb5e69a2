import { Partition } from './ballots';

/**
 * Counts of ballots preferring one candidate to another.
 *
 * `get(a, b)` is the number of votes that put a strictly above b. The diagonal is always zero.
 */
export class PairwiseMatrix<N> {
    readonly candidates: readonly N[];
    #index: Map<N, number>;
    #counts: number[][];

    constructor(candidates: N[]) {
        this.candidates = candidates.slice();
        this.#index = new Map(candidates.map((cand, i) => [cand, i]));
        if (this.#index.size !== candidates.length) throw new Error('duplicate candidate in pairwise matrix');
        this.#counts = candidates.map(() => candidates.map(() => 0));
    }

    /** position of a candidate in `candidates` */
    indexOf(cand: N): number {
        const index = this.#index.get(cand);
        if (index === undefined) throw new Error(`candidate ${String(cand)} not found here`);
        return index;
    }

    get(a: N, b: N): number {
        return this.#counts[this.indexOf(a)][this.indexOf(b)];
    }

    /** counts by candidate index */
    at(i: number, j: number): number {
        return this.#counts[i][j];
    }

    /** adds one ballot preferring a to b */
    increment(a: N, b: N) {
        this.#counts[this.indexOf(a)][this.indexOf(b)]++;
    }

    /** a plain copy of the counts, indexed like `candidates` */
    toArray(): number[][] {
        return this.#counts.map(row => row.slice());
    }
}

/** level of each candidate in a vote, by candidate index. a candidate missing from the vote is an invariant violation */
function levelIndices<N>(vote: Partition<N>, candidates: N[]): number[] {
    const levels = new Map<N, number>();
    vote.forEach((level, i) => {
        for (const cand of level) levels.set(cand, i);
    });
    return candidates.map(cand => {
        const level = levels.get(cand);
        if (level === undefined) throw new Error(`candidate ${String(cand)} missing from vote`);
        return level;
    });
}

/**
 * Builds the pairwise preference matrix over all candidates (the bar included, if any).
 *
 * Pure; running it again over the same votes gives the same matrix.
 */
export function pairwisePreference<N>(votes: Partition<N>[], candidates: N[]): PairwiseMatrix<N> {
    const matrix = new PairwiseMatrix(candidates);

    for (const vote of votes) {
        const levels = levelIndices(vote, candidates);
        for (let i = 0; i < candidates.length; i++) {
            for (let j = 0; j < candidates.length; j++) {
                // lower level index = more preferred
                if (levels[i] < levels[j]) matrix.increment(candidates[i], candidates[j]);
            }
        }
    }

    return matrix;
}
