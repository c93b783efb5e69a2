export { BAR, Candidate, CandidateSet } from './candidates';
export { VoteMode, BallotPhase, BallotConfig, BallotInfo, Ballot, resolveBallot } from './config';
export {
    Partition,
    CodecStatus,
    VoteRejection,
    CodecResult,
    VotePayload,
    LegacyPolicy,
    formatPartition,
    splitVoteString,
    abstention,
    parsePreferenceString,
    encodeClassicalVote,
    encodeVote,
    validateVoteString,
    upgradeLegacyClassicalVote,
} from './ballots';
export { PairwiseMatrix, pairwisePreference } from './pairwise';
export { ScData, remapPartition, remapScData, strongestPaths, schulze } from './schulze';
export {
    LevelBoundary,
    remapBoundary,
    boundaryStatistics,
    selectionCounts,
    countAbstentions,
    countEqualVotes,
    ABSTAIN_KEY,
} from './statistics';
export {
    generateSecret,
    voteHash,
    secretDigest,
    storageKey,
    ReceiptEntry,
    ReceiptRegistry,
    MemoryReceiptRegistry,
} from './receipts';
export {
    StoredVote,
    VoteStore,
    WriteTransaction,
    runDirectly,
    PublishedResult,
    ResultArchive,
    MemoryVoteStore,
    MemoryResultArchive,
} from './store';
export {
    openDatabase,
    createSqliteVoteStore,
    createSqliteReceiptRegistry,
    createSqliteResultArchive,
    createSqliteTransaction,
} from './sqlite-store';
export {
    resultRecordSchema,
    ResultRecord,
    TallyBallot,
    Evaluation,
    evaluateVotes,
    buildResultRecord,
    serializeResultRecord,
    resultHash,
    parseResultRecord,
    recordBallot,
    VerifyStatus,
    VerificationResult,
    verifyResultRecord,
    findOwnVote,
} from './result';
export {
    BallotDirectory,
    EngineOptions,
    SubmitStatus,
    SubmitResult,
    LookupStatus,
    LookupResult,
    TallyEngine,
    createEngine,
} from './engine';
export { ErrorCode, TallyError } from './errors';
export { Settings, loadSettings } from './settings';
export { createLogger, getLogger } from './logger';
