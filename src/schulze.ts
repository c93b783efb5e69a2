import { Partition } from './ballots';
import { PairwiseMatrix } from './pairwise';

/** schulze output */
export interface ScData<N> {
    /** the aggregate ranking. candidates in one level are genuinely tied */
    ranking: Partition<N>;
    /** strongest path strengths over all candidates, indexed like `candidates` */
    paths: number[][];
    candidates: N[];
}

// for converting from one candidate type to another
export function remapPartition<N, M>(partition: Partition<N>, remap: (node: N) => M): Partition<M> {
    return partition.map(level => level.map(remap));
}
export function remapScData<N, M>(data: ScData<N>, remap: (node: N) => M): ScData<M> {
    return {
        ranking: remapPartition(data.ranking, remap),
        paths: data.paths.map(row => row.slice()),
        candidates: data.candidates.map(remap),
    };
}

/** strongest paths within the candidates at `indices` of `d`, indexed like `indices` */
function pathsAmong<N>(d: PairwiseMatrix<N>, indices: number[]): number[][] {
    const n = indices.length;
    const p: number[][] = [];

    for (let i = 0; i < n; i++) {
        p.push([]);
        for (let j = 0; j < n; j++) {
            const support = d.at(indices[i], indices[j]);
            p[i].push(i !== j && support > d.at(indices[j], indices[i]) ? support : 0);
        }
    }

    for (let k = 0; k < n; k++) {
        for (let i = 0; i < n; i++) {
            if (i === k) continue;
            for (let j = 0; j < n; j++) {
                if (j === k || j === i) continue;
                p[i][j] = Math.max(p[i][j], Math.min(p[i][k], p[k][j]));
            }
        }
    }

    return p;
}

/**
 * Computes the strength of the strongest path between every ordered pair of candidates.
 *
 * A direct link a->b exists if more ballots prefer a to b than the other way around, and its
 * strength is the number of ballots preferring a (“winning votes”). A path is as strong as its
 * weakest link.
 */
export function strongestPaths<N>(d: PairwiseMatrix<N>): number[][] {
    return pathsAmong(d, d.candidates.map((_, i) => i));
}

/**
 * Ranks candidates by the Schulze method.
 *
 * The top level is every candidate no other candidate beats, where a beats b if the strongest
 * path a->b is stronger than b->a. The top level is removed and the process repeats on the
 * remainder, with paths recomputed among the remaining candidates only. There is no tie breaking:
 * candidates neither of which beats the other may share a level, and members of a level keep
 * their order in `d.candidates`.
 */
export function schulze<N>(d: PairwiseMatrix<N>): ScData<N> {
    const paths = strongestPaths(d);

    let remaining = d.candidates.map((_, i) => i);
    const ranking: Partition<N> = [];

    while (remaining.length) {
        const p = remaining.length === d.candidates.length ? paths : pathsAmong(d, remaining);
        const level = remaining.filter((_, x) => !remaining.some((_, y) => p[y][x] > p[x][y]));
        // the beat relation is transitive, so some remaining candidate is always unbeaten
        if (!level.length) throw new Error('schulze beat relation contains a cycle');

        ranking.push(level.map(i => d.candidates[i]));
        remaining = remaining.filter(i => !level.includes(i));
    }

    return {
        ranking,
        paths,
        candidates: d.candidates.slice(),
    };
}
