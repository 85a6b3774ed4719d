// services/cache/cacheKey.ts
import crypto from 'crypto';

/**
 * Deterministic cache slot for a research request.
 *
 * Both parts are lowercased, then encoded as a JSON pair so that no topic
 * can borrow characters from the research type ("a_b"/"c" vs "a"/"b_c").
 * No timestamp or randomness: the same logical request always lands in the
 * same slot.
 */
export const getCacheKey = (topic: string, researchType: string): string => {
    const keyString = JSON.stringify([topic.toLowerCase(), researchType.toLowerCase()]);
    return crypto.createHash('sha256').update(keyString).digest('hex');
};
