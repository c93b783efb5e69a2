import { CandidateSet } from './candidates';
import { Evaluation } from './result';
import { LevelBoundary } from './statistics';

function describeLevel(level: string[], set: CandidateSet): string {
    const names = level.map(token => set.label(token)).join(', ');
    return `${level.length === 1 ? 'option' : 'options'} ${names}`;
}

/** e.g. `Detail: options C, D got more votes than option A with 3 pro and 2 contra` */
export function describeBoundary(boundary: LevelBoundary<string>, set: CandidateSet): string {
    const upper = describeLevel(boundary.upper, set);
    const lower = describeLevel(boundary.lower, set);
    return `Detail: ${upper} got more votes than ${lower} with ${boundary.pro} pro and ${boundary.contra} contra`;
}

/** human readable summary of a tally, one line per entry */
export function summarize(evaluation: Evaluation, set: CandidateSet): string[] {
    const lines = [`Result: ${evaluation.result}`];
    for (const boundary of evaluation.boundaries) {
        lines.push(describeBoundary(boundary, set));
    }
    if (evaluation.counts) {
        lines.push('Counts:');
        for (const { candidate, count } of evaluation.counts) {
            lines.push(`  ${set.label(candidate)}: ${count}`);
        }
    }
    lines.push(`Abstentions: ${evaluation.abstentions} of ${evaluation.voteCount} votes`);
    return lines;
}

/** lines for `countEqualVotes` output */
export function describeEqualVotes(counts: Map<string, number>): string[] {
    return [...counts].map(([vote, count]) => `  ${count}x ${vote}`);
}
