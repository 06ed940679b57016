import { UsageError } from '../errors.js';

/**
 * Split a command line into tokens.
 *
 * Whitespace separates tokens. A single- or double-quoted segment is part
 * of one token ('' yields an empty token). A backslash outside single
 * quotes takes the next character literally. An unterminated quote is a
 * usage error.
 */
export function tokenize(line: string): string[] {
    const tokens: string[] = [];
    let current = '';
    let inToken = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];

        if (quote === "'") {
            if (ch === "'") quote = null;
            else current += ch;
            continue;
        }

        if (ch === '\\') {
            const next = line[i + 1];
            if (next === undefined) {
                current += ch;
            } else {
                current += next;
                i++;
            }
            inToken = true;
            continue;
        }

        if (quote === '"') {
            if (ch === '"') quote = null;
            else current += ch;
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
            inToken = true;
            continue;
        }

        if (/\s/.test(ch)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
            continue;
        }

        current += ch;
        inToken = true;
    }

    if (quote) {
        throw new UsageError(`Unterminated ${quote === '"' ? 'double' : 'single'} quote`);
    }
    if (inToken) tokens.push(current);
    return tokens;
}
