import { describe, it, expect } from 'vitest';
import {
    ErrorCode,
    ExecutionTimeoutError,
    MissingRequiredOptionError,
    NotFoundError,
    ScanShellError,
    ScriptError,
    UnknownKeyError,
    UsageError,
    isScanShellError,
    wrapError,
} from '../errors.js';

describe('ScanShellError', () => {
    it('carries name, code and details', () => {
        const err = new ScanShellError('boom', 'SOME_CODE', { a: 1 });
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('ScanShellError');
        expect(err.code).toBe('SOME_CODE');
        expect(err.toJSON()).toEqual({ name: 'ScanShellError', message: 'boom', code: 'SOME_CODE', details: { a: 1 } });
    });

    it('defaults to the internal code', () => {
        expect(new ScanShellError('x').code).toBe(ErrorCode.INTERNAL);
    });
});

describe('subclasses', () => {
    it('UnknownKeyError is a NotFoundError', () => {
        const err = new UnknownKeyError('tools.nope');
        expect(err).toBeInstanceOf(NotFoundError);
        expect(err.message).toBe('Unknown config key: tools.nope');
        expect(err.code).toBe(ErrorCode.UNKNOWN_KEY);
        expect(err.kind).toBe('key');
    });

    it('lists missing options', () => {
        const err = new MissingRequiredOptionError(['target', 'ports']);
        expect(err.message).toBe('Missing required option(s): target, ports');
        expect(err.missing).toEqual(['target', 'ports']);
    });

    it('formats timeouts in seconds', () => {
        expect(new ExecutionTimeoutError('nmap', 1000, { stdout: '', stderr: '' }).message).toBe('nmap timed out after 1s');
        expect(new ExecutionTimeoutError('nmap', 1500, { stdout: 'a', stderr: 'b' }).message).toBe('nmap timed out after 1.5s');
    });

    it('ScriptError names the line and the command', () => {
        const err = new ScriptError(3, 'use nothing', new UsageError('bad'));
        expect(err.message).toBe('Script failed at line 3 (use nothing): bad');
        expect(err.details).toEqual({
            line: 3,
            command: 'use nothing',
            failure: { name: 'UsageError', message: 'bad', code: ErrorCode.USAGE, details: undefined },
        });
    });
});

describe('wrapError', () => {
    it('returns shell errors unchanged', () => {
        const err = new UsageError('x');
        expect(wrapError(err)).toBe(err);
    });

    it('wraps foreign errors and values', () => {
        const wrapped = wrapError(new TypeError('bad type'));
        expect(isScanShellError(wrapped)).toBe(true);
        expect(wrapped.message).toBe('bad type');
        expect(wrapped.details).toEqual({ originalName: 'TypeError' });
        expect(wrapError('plain').message).toBe('plain');
    });
});
