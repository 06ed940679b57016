const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

/**
 * Parse a boolean spelled the way operators type it ("true", "yes", "on", "1")
 */
export function parseBoolean(raw: string): boolean | undefined {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    return undefined;
}

/**
 * Parse a base-10 integer, rejecting partial matches like "10abc" or "1.5"
 */
export function parseInteger(raw: string): number | undefined {
    const text = raw.trim();
    if (!/^[+-]?\d+$/.test(text)) return undefined;
    const value = Number(text);
    return Number.isSafeInteger(value) ? value : undefined;
}
