import { z } from 'zod';
import { CommandBuilder } from '../command-builder.js';
import type { OutputParser, ParsedOutput, ToolIntegrationDescriptor } from '../types.js';

export const vulnerabilitySchema = z.object({
    title: z.string(),
    description: z.string(),
    severity: z.enum(['low', 'medium', 'high', 'critical']),
    url: z.string(),
    type: z.string(),
    details: z.unknown().optional(),
});

export const sqlmapScanSchema = z.object({
    vulnerabilities: z.array(vulnerabilitySchema),
    summary: z.record(z.unknown()),
    rawOutput: z.string(),
});

export type Vulnerability = z.infer<typeof vulnerabilitySchema>;
export type SqlmapScanResult = z.infer<typeof sqlmapScanSchema>;

/** JSON report section sqlmap writes with `data.vulnerable` / `data.stats` */
const jsonReportSchema = z.object({
    data: z
        .object({
            vulnerable: z.record(z.record(z.unknown())).optional(),
            stats: z.record(z.unknown()).optional(),
        })
        .passthrough(),
});

const VULNERABLE_MARKER = 'is vulnerable to';

function injection(url: string, type: string, details?: unknown): Vulnerability {
    return {
        title: `SQL Injection (${type})`,
        description: `SQL Injection vulnerability found in ${url}`,
        severity: 'high',
        url,
        type,
        ...(details === undefined ? {} : { details }),
    };
}

function extractJsonReport(stdout: string): z.infer<typeof jsonReportSchema> | null {
    const start = stdout.indexOf('{');
    const end = stdout.lastIndexOf('}');
    if (start < 0 || end <= start) return null;

    let document: unknown;
    try {
        document = JSON.parse(stdout.slice(start, end + 1));
    } catch {
        return null;
    }
    const report = jsonReportSchema.safeParse(document);
    return report.success ? report.data : null;
}

function parseText(output: string): Pick<SqlmapScanResult, 'vulnerabilities' | 'summary'> {
    const vulnerabilities: Vulnerability[] = [];
    let currentUrl: string | null = null;

    for (const rawLine of output.split('\n')) {
        const line = rawLine.trim();
        if (line.startsWith('URL:')) {
            currentUrl = line.slice(4).trim();
        }
        const at = line.indexOf(VULNERABLE_MARKER);
        if (at >= 0 && currentUrl) {
            vulnerabilities.push(injection(currentUrl, line.slice(at + VULNERABLE_MARKER.length).trim()));
        }
    }

    return {
        vulnerabilities,
        summary: {
            vulnerabilitiesFound: vulnerabilities.length,
            scanCompleted: output.toLowerCase().includes('scan completed'),
        },
    };
}

/**
 * Parses sqlmap output: the JSON report when stdout carries one, otherwise
 * the `URL:` / `is vulnerable to` lines of the text log.
 */
export const sqlmapParser: OutputParser<SqlmapScanResult> = {
    parse(stdout: string, stderr: string): ParsedOutput<SqlmapScanResult> {
        if (!stdout.trim() && !stderr.trim()) {
            return { parsed: false, raw: stdout, error: 'No output from sqlmap' };
        }

        const report = extractJsonReport(stdout);
        if (report) {
            const vulnerabilities: Vulnerability[] = [];
            for (const [url, findings] of Object.entries(report.data.vulnerable ?? {})) {
                for (const [type, details] of Object.entries(findings)) {
                    vulnerabilities.push(injection(url, type, details));
                }
            }
            return {
                parsed: true,
                data: { vulnerabilities, summary: report.data.stats ?? {}, rawOutput: stdout },
            };
        }

        return { parsed: true, data: { ...parseText(stdout), rawOutput: stdout } };
    },
};

export const sqlmapDescriptor: ToolIntegrationDescriptor<SqlmapScanResult> = {
    name: 'sqlmap',
    binaryName: 'sqlmap',
    versionArgs: ['--version'],
    defaultArgs: ['--batch'],
    containerImage: 'vulnerables/sqlmap-python3',
    containerOptions: [],
    mode: 'auto',
    defaultTimeoutMs: 1_800_000,
    versionPattern: /(\d+\.\d+(?:\.\d+)*(?:#\w+)?)/,
    parser: sqlmapParser,
};

export interface SqlmapScanOptions {
    url: string;
    data?: string;
    cookie?: string;
    headers?: Record<string, string>;
    userAgent?: string;
    /** Detection level 1-5 */
    level?: number;
    /** Risk level 1-3 */
    risk?: number;
    dbms?: string;
    forms?: boolean;
    crawl?: number;
    threads?: number;
    outputDir?: string;
    extraArgs?: readonly string[];
}

/**
 * Arguments for a non-interactive scan of one URL (`--batch` comes from
 * the descriptor's default args)
 */
export function buildSqlmapArgs(options: SqlmapScanOptions): string[] {
    const builder = new CommandBuilder()
        .flag('-u', options.url)
        .flag('--output-dir', options.outputDir)
        .flag('--data', options.data)
        .flag('--cookie', options.cookie);

    for (const [name, value] of Object.entries(options.headers ?? {})) {
        builder.flag('-H', `${name}: ${value}`);
    }

    return builder
        .flag('--user-agent', options.userAgent)
        .flag('--level', options.level)
        .flag('--risk', options.risk)
        .flag('--dbms', options.dbms)
        .flag('--forms', options.forms)
        .flag('--crawl', options.crawl && options.crawl > 0 ? options.crawl : undefined)
        .flag('--threads', options.threads && options.threads > 1 ? options.threads : undefined)
        .arg(...(options.extraArgs ?? []))
        .build();
}
