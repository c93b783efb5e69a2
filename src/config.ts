import { Candidate, CandidateSet } from './candidates';
import { ErrorCode, TallyError } from './errors';

export enum VoteMode {
    /** voters submit a full preference string like `C=D>A>B` */
    Preferential = 'preferential',
    /** voters pick up to N candidates, all weighted equally */
    Classical = 'classical',
}

export enum BallotPhase {
    Upcoming = 'upcoming',
    Voting = 'voting',
    Closed = 'closed',
}

/** the tallying-relevant configuration of a ballot */
export interface BallotConfig {
    candidates: Candidate[];
    /** whether the ballot has the rejection option `_bar_` */
    useBar: boolean;
    mode: VoteMode;
    /** number of selectable candidates in classical mode */
    numVotes?: number;
}

/** what the surrounding system tells us about a ballot */
export interface BallotInfo extends BallotConfig {
    ballotId: string;
    assemblyId: string;
    title?: string;
    phase: BallotPhase;
}

/** a ballot config resolved into its candidate set */
export interface Ballot {
    set: CandidateSet;
    mode: VoteMode;
    /** N in classical mode, null otherwise */
    numVotes: number | null;
}

/** validates a ballot config and builds its candidate set */
export function resolveBallot(config: BallotConfig): Ballot {
    const set = new CandidateSet(config.candidates, config.useBar);

    if (config.mode === VoteMode.Classical) {
        const n = config.numVotes;
        if (n === undefined || !Number.isInteger(n) || n < 1) {
            throw new TallyError('classical ballots need a positive number of votes', ErrorCode.InvalidBallot);
        }
        return { set, mode: config.mode, numVotes: n };
    }

    return { set, mode: config.mode, numVotes: null };
}
