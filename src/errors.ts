/** failure classes raised by the engine. malformed votes are not errors; see `VoteRejection` */
export enum ErrorCode {
    /** the ballot directory does not know the ballot */
    BallotNotFound = 'ballot-not-found',
    /** a vote was submitted outside the voting period */
    BallotNotVoting = 'ballot-not-voting',
    /** a tally was requested before voting closed */
    BallotNotClosed = 'ballot-not-closed',
    /** receipts may only be purged once the assembly has concluded */
    AssemblyNotConcluded = 'assembly-not-concluded',
    /** an audit was requested for a ballot without a published result */
    ResultNotPublished = 'result-not-published',
    /** stored data does not reproduce the published result, or a stored vote is invalid */
    IntegrityFault = 'integrity-fault',
    /** the ballot configuration itself is unusable */
    InvalidBallot = 'invalid-ballot',
    /** a result record could not be read */
    InvalidRecord = 'invalid-record',
    Configuration = 'configuration',
}

export class TallyError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly ballotId?: string,
    ) {
        super(message);
        this.name = 'TallyError';
    }
}
