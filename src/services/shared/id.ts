import { generateRandomToken } from './crypto';

// Prefixed identifier, e.g. `circle_3fZq8...`.
export function generateId(prefix: string): string {
    return `${prefix}_${generateRandomToken(20)}`;
}
