/** one vote as it is stored and later published */
export interface StoredVote {
    /** canonical vote string */
    vote: string;
    salt: string;
    /** `voteHash(salt, secret, vote)` */
    hash: string;
}

/**
 * Accepted votes, keyed by ballot and storage key.
 *
 * Writes are synchronous so that a replace is atomic per key.
 */
export interface VoteStore {
    /** inserts the vote, or replaces the voter's previous one */
    putVote(ballotId: string, storageKey: string, vote: StoredVote): void;
    getVote(ballotId: string, storageKey: string): StoredVote | null;
    /** every vote of a ballot, in no particular order */
    listVotes(ballotId: string): StoredVote[];
}

/** runs `fn` so that the writes it makes are stored together or not at all */
export type WriteTransaction = <T>(fn: () => T) => T;

/** for stores that only live in this process, where synchronous writes cannot interleave */
export function runDirectly<T>(fn: () => T): T {
    return fn();
}

export interface PublishedResult {
    /** serialized result record */
    record: string;
    /** `resultHash` of the record */
    hash: string;
}

/** where published result records go. a record, once published, is never replaced */
export interface ResultArchive {
    /** stores the record unless one exists already. returns whether it was stored */
    publish(ballotId: string, record: string, hash: string): boolean;
    getResult(ballotId: string): PublishedResult | null;
}

export class MemoryVoteStore implements VoteStore {
    #votes = new Map<string, Map<string, StoredVote>>();

    putVote(ballotId: string, storageKey: string, vote: StoredVote) {
        let ballot = this.#votes.get(ballotId);
        if (!ballot) {
            ballot = new Map();
            this.#votes.set(ballotId, ballot);
        }
        ballot.set(storageKey, { ...vote });
    }

    getVote(ballotId: string, storageKey: string): StoredVote | null {
        const vote = this.#votes.get(ballotId)?.get(storageKey);
        return vote ? { ...vote } : null;
    }

    listVotes(ballotId: string): StoredVote[] {
        return [...(this.#votes.get(ballotId)?.values() ?? [])].map(vote => ({ ...vote }));
    }
}

export class MemoryResultArchive implements ResultArchive {
    #results = new Map<string, PublishedResult>();

    publish(ballotId: string, record: string, hash: string): boolean {
        if (this.#results.has(ballotId)) return false;
        this.#results.set(ballotId, { record, hash });
        return true;
    }

    getResult(ballotId: string): PublishedResult | null {
        return this.#results.get(ballotId) ?? null;
    }
}
