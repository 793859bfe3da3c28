import { createHash, randomInt } from 'crypto';

const BASE36_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_EPOCH_SECONDS = Date.UTC(2024, 0, 1) / 1000;
const TIME_CHARS = 6;

/**
 * Stable base36 identifier derived from the SHA-256 of a (salted) value.
 * Keeps the first `numChars` characters; at most 49 are available.
 */
export function uniqueIdFromString(value: string, numChars: number, salt?: string): string {
    if (numChars < 1 || numChars > 49) {
        throw new RangeError(`numChars must be within 1..49, got ${numChars}`);
    }
    const salted = salt ? `${salt}:${value}` : value;
    const digest = createHash('sha256').update(salted).digest('hex');
    return BigInt(`0x${digest}`).toString(36).padStart(50, '0').slice(0, numChars);
}

/**
 * Base36 identifier that sorts by creation time: six characters of seconds
 * since 2024-01-01, then random characters.
 */
export function uniqueIdFromDate(date: Date = new Date(), numChars = 12): string {
    if (numChars < TIME_CHARS) {
        throw new RangeError(`numChars must be at least ${TIME_CHARS}, got ${numChars}`);
    }
    const seconds = Math.max(0, Math.floor(date.getTime() / 1000) - ID_EPOCH_SECONDS);
    const time = seconds.toString(36).padStart(TIME_CHARS, '0').slice(-TIME_CHARS);
    let random = '';
    for (let index = TIME_CHARS; index < numChars; index++) {
        random += BASE36_CHARS[randomInt(BASE36_CHARS.length)];
    }
    return `${time}${random}`;
}

/**
 * JSON with object keys sorted, so that equal values always hash the same
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const sorted: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
            if (entry !== undefined) {
                sorted[key] = sortKeys(entry);
            }
        }
        return sorted;
    }
    return value;
}
