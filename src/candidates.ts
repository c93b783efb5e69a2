import { ErrorCode, TallyError } from './errors';

/** reserved token of the synthetic rejection candidate */
export const BAR = '_bar_';

/** a single option on a ballot */
export interface Candidate {
    /** short token used in vote strings, e.g. `Anton` */
    token: string;
    /** optional display label */
    label?: string;
}

const RESERVED = /[>=\s]/;

/**
 * The fixed candidates of one ballot, plus the bar if the ballot allows rejection.
 *
 * Display order is the order the candidates were given in. The bar never shows up in
 * `tokens` but is the last entry of `all`, so it takes part in every comparison.
 */
export class CandidateSet {
    readonly candidates: readonly Candidate[];
    readonly useBar: boolean;
    #order: Map<string, number>;

    constructor(candidates: Candidate[], useBar: boolean) {
        if (!candidates.length) {
            throw new TallyError('a ballot needs at least one candidate', ErrorCode.InvalidBallot);
        }
        this.#order = new Map();
        for (const { token } of candidates) {
            if (!token || RESERVED.test(token)) {
                throw new TallyError(`invalid candidate token ${JSON.stringify(token)}`, ErrorCode.InvalidBallot);
            }
            if (token === BAR) {
                throw new TallyError(`candidate token ${BAR} is reserved`, ErrorCode.InvalidBallot);
            }
            if (this.#order.has(token)) {
                throw new TallyError(`duplicate candidate token ${token}`, ErrorCode.InvalidBallot);
            }
            this.#order.set(token, this.#order.size);
        }
        if (useBar) this.#order.set(BAR, this.#order.size);

        this.candidates = candidates.map(c => ({ ...c }));
        this.useBar = useBar;
    }

    /** real candidate tokens in display order */
    tokens(): string[] {
        return this.candidates.map(c => c.token);
    }

    /** every token that must appear in a vote: the candidates, then the bar if enabled */
    all(): string[] {
        return this.useBar ? [...this.tokens(), BAR] : this.tokens();
    }

    has(token: string): boolean {
        return this.#order.has(token);
    }

    /** position of a token in `all()`, or -1 */
    indexOf(token: string): number {
        return this.#order.get(token) ?? -1;
    }

    label(token: string): string {
        if (token === BAR) return 'Rejection limit';
        return this.candidates.find(c => c.token === token)?.label ?? token;
    }

    /** sorts tokens into canonical order. unknown tokens go last */
    sort(tokens: string[]): string[] {
        const rank = (token: string) => this.#order.get(token) ?? Number.MAX_SAFE_INTEGER;
        return tokens.slice().sort((a, b) => rank(a) - rank(b));
    }
}
