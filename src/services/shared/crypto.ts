import { randomBytes } from 'node:crypto';

const BASE62_CHARS = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

// Use rejection sampling for uniform distribution.
// 256 (byte range) is not divisible by 62, so using modulo creates bias.
// Values 0-247 map to 0-61 uniformly (248 = 62 * 4).
// Values 248-255 are in the biased range and must be resampled.
const MAX_UNBIASED_BYTE = 247; // 62 * 4 - 1

/**
 * Encodes `length` base62 characters, drawing extra random bytes whenever a
 * byte in the biased range is discarded.
 */
export function bytesToBase62(bytes: Uint8Array, length: number = bytes.length): string {
    const result: string[] = [];
    let pool = bytes;
    let i = 0;

    while (result.length < length) {
        if (i >= pool.length) {
            pool = generateRandomBytes(length - result.length);
            i = 0;
        }
        const byte = pool[i] ?? 255;
        if (byte <= MAX_UNBIASED_BYTE) {
            result.push(BASE62_CHARS.charAt(byte % 62));
        }
        i++;
    }

    return result.join('');
}

export function generateRandomBytes(length: number): Uint8Array {
    return new Uint8Array(randomBytes(length));
}

export function generateRandomToken(length: number = 32): string {
    return bytesToBase62(generateRandomBytes(length), length);
}
