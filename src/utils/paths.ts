import os from 'node:os';
import path from 'node:path';

/**
 * Root directory for user-level state (~/.scanshell, or $SCANSHELL_HOME)
 */
export function getHomeDir(env: NodeJS.ProcessEnv = process.env): string {
    const override = env['SCANSHELL_HOME'];
    if (override && override.trim()) {
        return path.resolve(override);
    }
    return path.join(os.homedir(), '.scanshell');
}

export function getConfigPath(env?: NodeJS.ProcessEnv): string {
    return path.join(getHomeDir(env), 'config.yaml');
}

export function getPluginsDir(env?: NodeJS.ProcessEnv): string {
    return path.join(getHomeDir(env), 'plugins');
}

export function getSessionsDir(env?: NodeJS.ProcessEnv): string {
    return path.join(getHomeDir(env), 'sessions');
}

export function getLogPath(env?: NodeJS.ProcessEnv): string {
    return path.join(getHomeDir(env), 'scanshell.log');
}

/**
 * Generate a short unique run identifier, e.g. "run-lq2x8k-3f9a"
 */
export function generateRunId(): string {
    const ts = Date.now().toString(36);
    const rand = Math.random().toString(36).slice(2, 6);
    return `run-${ts}-${rand}`;
}
