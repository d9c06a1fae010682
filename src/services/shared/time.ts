// Shared time utilities.

// Get current timestamp in milliseconds.
export function nowMs(): number {
    return Date.now();
}

// Check if a timestamp has passed.
export function isExpired(expiresAt: number, now: number = Date.now()): boolean {
    return now > expiresAt;
}

// Calculate expiry timestamp from now + seconds.
export function expiresIn(seconds: number, now: number = Date.now()): number {
    return now + seconds * 1000;
}
