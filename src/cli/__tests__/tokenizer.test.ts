import { describe, it, expect } from 'vitest';
import { tokenize } from '../tokenizer.js';
import { UsageError } from '../../errors.js';

describe('tokenize', () => {
    it('splits on whitespace', () => {
        expect(tokenize('  set   ports 22,80 ')).toEqual(['set', 'ports', '22,80']);
        expect(tokenize('')).toEqual([]);
    });

    it('keeps quoted segments together', () => {
        expect(tokenize('set user_agent "Mozilla/5.0 (X11)"')).toEqual(['set', 'user_agent', 'Mozilla/5.0 (X11)']);
        expect(tokenize("set data 'id=1&name=a b'")).toEqual(['set', 'data', 'id=1&name=a b']);
        expect(tokenize('set cookie a"b c"d')).toEqual(['set', 'cookie', 'ab cd']);
    });

    it('yields empty tokens for empty quotes', () => {
        expect(tokenize('set data ""')).toEqual(['set', 'data', '']);
    });

    it('honours backslash escapes outside single quotes', () => {
        expect(tokenize('set path a\\ b')).toEqual(['set', 'path', 'a b']);
        expect(tokenize('set q "say \\"hi\\""')).toEqual(['set', 'q', 'say "hi"']);
        expect(tokenize("set q 'c:\\temp'")).toEqual(['set', 'q', 'c:\\temp']);
        expect(tokenize('trailing\\')).toEqual(['trailing\\']);
    });

    it('rejects unterminated quotes', () => {
        expect(() => tokenize('set data "open')).toThrow(UsageError);
        expect(() => tokenize("set data 'open")).toThrow('Unterminated single quote');
    });
});
