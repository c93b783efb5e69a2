import crypto from 'node:crypto';

/** random secret handed to a voter, url-safe */
export function generateSecret(bytes = 12): string {
    return crypto.randomBytes(bytes).toString('base64url');
}

/**
 * Hash published next to each vote. Only the holder of the secret can find their vote by it.
 *
 * HMAC-SHA512 keyed with the per-vote salt over secret and vote, hex encoded.
 */
export function voteHash(salt: string, secret: string, vote: string): string {
    const h = crypto.createHmac('sha512', salt);
    h.update(secret);
    h.update(vote);
    return h.digest('hex');
}

/** what the receipt registry keeps instead of the secret itself */
export function secretDigest(secret: string): string {
    return crypto.createHash('sha256').update(secret).digest('hex');
}

/** stable per (ballot, voter), but not linkable to the voter without the server key */
export function storageKey(voterKey: string, ballotId: string, voterId: string): string {
    const h = crypto.createHmac('sha256', voterKey);
    h.update(`${ballotId}:${voterId}`);
    return h.digest('hex');
}

export interface ReceiptEntry {
    ballotId: string;
    assemblyId: string;
    storageKey: string;
    /** `secretDigest` of the receipt secret */
    digest: string;
}

/** maps receipt secrets to stored votes until the assembly concludes */
export interface ReceiptRegistry {
    /** makes `entry` the only live receipt for its ballot and storage key */
    replace(entry: ReceiptEntry): void;
    lookup(digest: string): ReceiptEntry | null;
    /** deletes every receipt of an assembly. returns how many were deleted */
    purgeAssembly(assemblyId: string): number;
}

export class MemoryReceiptRegistry implements ReceiptRegistry {
    #byVote = new Map<string, ReceiptEntry>();
    #byDigest = new Map<string, ReceiptEntry>();

    replace(entry: ReceiptEntry) {
        const key = `${entry.ballotId}\0${entry.storageKey}`;
        const previous = this.#byVote.get(key);
        if (previous) this.#byDigest.delete(previous.digest);
        this.#byVote.set(key, { ...entry });
        this.#byDigest.set(entry.digest, { ...entry });
    }

    lookup(digest: string): ReceiptEntry | null {
        const entry = this.#byDigest.get(digest);
        return entry ? { ...entry } : null;
    }

    purgeAssembly(assemblyId: string): number {
        let purged = 0;
        for (const [key, entry] of this.#byVote) {
            if (entry.assemblyId !== assemblyId) continue;
            this.#byVote.delete(key);
            this.#byDigest.delete(entry.digest);
            purged++;
        }
        return purged;
    }
}
