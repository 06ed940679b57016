import { spawn } from 'node:child_process';
import { access, constants, stat } from 'node:fs/promises';
import path from 'node:path';
import type { ProcessOutcome, ProcessRequest } from './types.js';

/** Per-stream capture limit */
const MAX_OUTPUT = 10 * 1024 * 1024;

/**
 * Kill a process and everything it spawned.
 * The child is started in its own group, so signalling `-pid` reaches all of it.
 */
export function killProcessTree(pid: number): void {
    if (process.platform === 'win32') {
        spawn('taskkill', ['/F', '/T', '/PID', String(pid)], { stdio: 'ignore', detached: true }).unref();
        return;
    }
    try {
        process.kill(-pid, 'SIGKILL');
    } catch {
        try {
            process.kill(pid, 'SIGKILL');
        } catch {
            // already gone
        }
    }
}

/**
 * Run a process to completion, enforcing the timeout and abort signal.
 * Settles only after the process has closed and both streams are drained.
 */
export function spawnProcess(request: ProcessRequest): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
        const start = Date.now();
        let stdout = '';
        let stderr = '';
        let timedOut = false;
        let aborted = false;
        let killed = false;
        let truncated = false;
        const limit = request.maxOutput ?? MAX_OUTPUT;

        const capture = (current: string, chunk: string): string => {
            const room = limit - current.length;
            if (chunk.length <= room) return current + chunk;
            truncated = true;
            return room > 0 ? current + chunk.slice(0, room) : current;
        };

        if (request.signal?.aborted) {
            resolve({ stdout, stderr, exitCode: null, durationMs: 0, timedOut, aborted: true });
            return;
        }

        const child = spawn(request.command, [...request.args], {
            cwd: request.cwd,
            detached: process.platform !== 'win32',
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        const terminate = (): void => {
            if (killed) return;
            killed = true;
            if (child.pid !== undefined) killProcessTree(child.pid);
            if (request.onKill) {
                request.onKill().catch(() => undefined);
            }
        };

        const timer = setTimeout(() => {
            timedOut = true;
            terminate();
        }, request.timeoutMs);

        const onAbort = (): void => {
            aborted = true;
            terminate();
        };
        request.signal?.addEventListener('abort', onAbort, { once: true });

        // decode through the stream so a character split across chunks survives
        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => {
            stdout = capture(stdout, chunk);
        });
        child.stderr.on('data', (chunk: string) => {
            stderr = capture(stderr, chunk);
        });

        child.on('error', (err) => {
            clearTimeout(timer);
            request.signal?.removeEventListener('abort', onAbort);
            reject(err);
        });

        child.on('close', (code) => {
            clearTimeout(timer);
            request.signal?.removeEventListener('abort', onAbort);
            resolve({
                stdout,
                stderr,
                exitCode: killed ? null : code,
                pid: child.pid,
                durationMs: Date.now() - start,
                timedOut,
                aborted: aborted && !timedOut,
                truncated,
            });
        });
    });
}

/**
 * True when the path is a regular file the current user may execute
 */
export async function isExecutable(filePath: string): Promise<boolean> {
    try {
        const info = await stat(filePath);
        if (!info.isFile()) return false;
        await access(filePath, constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Find a binary on PATH. Names containing a separator are checked as given.
 */
export async function findExecutable(binary: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
    if (binary.includes('/') || binary.includes(path.sep)) {
        const resolved = path.resolve(binary);
        return (await isExecutable(resolved)) ? resolved : null;
    }

    const dirs = (env['PATH'] ?? '').split(path.delimiter).filter(Boolean);
    const extensions = process.platform === 'win32'
        ? (env['PATHEXT'] ?? '.EXE;.CMD;.BAT').split(';')
        : [''];

    for (const dir of dirs) {
        for (const ext of extensions) {
            const candidate = path.join(dir, binary + ext);
            if (await isExecutable(candidate)) return candidate;
        }
    }
    return null;
}
