import { describe, it, expect } from 'vitest';
import { CommandBuilder, formatCommand, quoteArg } from '../command-builder.js';

describe('CommandBuilder', () => {
    it('skips empty flags and keeps values as separate entries', () => {
        const argv = new CommandBuilder(['nmap'])
            .flag('-sV', true)
            .flag('-O', false)
            .flag('-p', '')
            .flag('--dbms', undefined)
            .flag('--tamper', null)
            .flag('--max-retries', 2)
            .keyValue('--script-args', 'user=admin')
            .keyValue('--skip', undefined)
            .arg('10.0.0.5')
            .build();
        expect(argv).toEqual(['nmap', '-sV', '--max-retries', '2', '--script-args=user=admin', '10.0.0.5']);
    });

    it('omits a flag whose optional value was never given', () => {
        const options: { script?: string; timing?: number } = {};
        const argv = new CommandBuilder()
            .flag('--script', options.script)
            .flag('-T', options.timing)
            .arg('10.0.0.5')
            .build();
        expect(argv).toEqual(['10.0.0.5']);
    });

    it('renders a shell-quoted command line', () => {
        const builder = new CommandBuilder(['sqlmap']).flag('--data', "a=1&b=it's");
        expect(builder.toString()).toBe(`sqlmap --data 'a=1&b=it'\\''s'`);
    });
});

describe('quoting', () => {
    it('leaves plain words alone', () => {
        expect(quoteArg('-oX')).toBe('-oX');
        expect(quoteArg('')).toBe("''");
        expect(formatCommand(['echo', 'two words'])).toBe("echo 'two words'");
    });
});
