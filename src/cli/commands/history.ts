import { Command } from 'commander';
import { UsageError } from '../../errors.js';
import { ResultStore } from '../../session/store.js';
import { loadConfig, type GlobalOptions } from '../bootstrap.js';
import { ConsolePrinter, formatDuration, formatFindings, formatTable, formatTargets, type Printer } from '../ui/render.js';

export type HistoryView = 'results' | 'targets' | 'findings';

export function createHistoryCommand(): Command {
    return new Command('history')
        .description('Show archived sessions, or the results of one session')
        .argument('[session]', 'Session id')
        .option('-n, --limit <count>', 'Number of results to show', '20')
        .option('-t, --targets', 'Show the targets the session discovered')
        .option('-f, --findings', 'Show the findings the session recorded')
        .action(async (
            session: string | undefined,
            opts: { limit: string; targets?: boolean; findings?: boolean },
            command: Command
        ) => {
            const view: HistoryView = opts.findings ? 'findings' : opts.targets ? 'targets' : 'results';
            const config = await loadConfig(command.optsWithGlobals<GlobalOptions>());
            const store = ResultStore.open(config.getString('sessions.path'));
            try {
                const limit = Number.parseInt(opts.limit, 10);
                printHistory(store, new ConsolePrinter(), session, Number.isNaN(limit) ? 20 : limit, view);
            } finally {
                store.close();
            }
        });
}

/**
 * Archived sessions, or one session's results oldest first. The targets
 * and findings views need a session.
 */
export function printHistory(
    store: ResultStore,
    printer: Printer,
    session?: string,
    limit = 20,
    view: HistoryView = 'results'
): void {
    if (view !== 'results') {
        if (session === undefined) {
            throw new UsageError(`history --${view} needs a session id`);
        }
        const lines = view === 'targets'
            ? formatRecords(store.targets(session), formatTargets)
            : formatRecords(store.findings(session), formatFindings);
        if (lines.length === 0) {
            printer.info(`No archived ${view} for session ${session}`);
        }
        for (const line of lines) {
            printer.line(line);
        }
        return;
    }

    if (session === undefined) {
        const sessions = store.sessions();
        if (sessions.length === 0) {
            printer.info('No archived sessions');
            return;
        }
        const rows = sessions.map(s => [s.id, String(s.results), s.createdAt, s.lastRunAt ?? '-']);
        for (const line of formatTable(['Session', 'Results', 'Created', 'Last run'], rows)) {
            printer.line(line);
        }
        return;
    }

    const results = store.results(session, limit);
    if (results.length === 0) {
        printer.info(`No archived results for session ${session}`);
        return;
    }
    const rows = results.map(r => [
        String(r.id),
        `#${r.sequence}`,
        r.module,
        r.startedAt,
        formatDuration(r.durationMs),
        r.exitCode === null ? '-' : String(r.exitCode),
        r.error ? r.error.code : r.success ? 'ok' : 'failed',
    ]);
    for (const line of formatTable(['Id', 'Run', 'Module', 'Started', 'Duration', 'Exit', 'Status'], rows)) {
        printer.line(line);
    }
}

function formatRecords<T>(records: readonly T[], format: (records: readonly T[]) => string[]): string[] {
    return records.length === 0 ? [] : format(records);
}
