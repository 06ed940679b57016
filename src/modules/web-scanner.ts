import path from 'node:path';
import { ModuleError } from '../errors.js';
import { defineModule } from '../plugins/registry.js';
import type { FindingReport, TargetReport } from '../plugins/types.js';
import { boolOption, intOption, stringOption } from '../plugins/options.js';
import { buildSqlmapArgs, sqlmapScanSchema, type SqlmapScanOptions, type SqlmapScanResult } from '../tools/core/sqlmap.js';

export interface WebScanReport {
    targetUrl: string;
    scanType: string;
    vulnerabilities: SqlmapScanResult['vulnerabilities'];
    summary: SqlmapScanResult['summary'];
    vulnerabilityCount: number;
    vulnerabilityTypes: Record<string, number>;
}

export function toWebScanReport(targetUrl: string, scanType: string, scan: SqlmapScanResult): WebScanReport {
    const vulnerabilityTypes: Record<string, number> = {};
    for (const vulnerability of scan.vulnerabilities) {
        const type = vulnerability.type || 'unknown';
        vulnerabilityTypes[type] = (vulnerabilityTypes[type] ?? 0) + 1;
    }
    return {
        targetUrl,
        scanType,
        vulnerabilities: scan.vulnerabilities,
        summary: scan.summary,
        vulnerabilityCount: scan.vulnerabilities.length,
        vulnerabilityTypes,
    };
}

/**
 * The scanned URL and every URL a vulnerability was found at, each reported
 * as a target; one finding per vulnerability
 */
export function toDiscoveries(targetUrl: string, scan: SqlmapScanResult): { targets: TargetReport[]; findings: FindingReport[] } {
    const urls = new Set([targetUrl, ...scan.vulnerabilities.map(v => v.url)]);
    return {
        targets: Array.from(urls, name => ({ name })),
        findings: scan.vulnerabilities.map(v => ({
            target: v.url,
            name: v.title,
            description: v.description,
            severity: v.severity,
            ...(v.details === undefined ? {} : { details: v.details }),
        })),
    };
}

export const webScanner = defineModule({
    name: 'web_scanner',
    description: 'Scan web applications for vulnerabilities',
    version: '0.1.0',
    author: 'scanshell',
    options: {
        target_url: { type: 'string', required: true, description: 'URL to test' },
        data: { type: 'string', default: '', description: 'POST body to send' },
        cookie: { type: 'string', default: '', description: 'Cookie header value' },
        user_agent: { type: 'string', default: 'scanshell web scanner', description: 'User-Agent header' },
        scan_level: { type: 'int', default: 1, min: 1, max: 5, description: 'Detection level' },
        risk_level: { type: 'int', default: 1, min: 1, max: 3, description: 'Risk of the payloads used' },
        forms: { type: 'bool', default: true, description: 'Parse and test forms on the target page' },
        crawl_depth: { type: 'int', default: 0, min: 0, description: 'Crawl depth (0 disables crawling)' },
        threads: { type: 'int', default: 1, min: 1, max: 10, description: 'Concurrent requests' },
        timeout: { type: 'int', min: 1, description: 'Scan timeout in seconds (unset: tools.sqlmap.timeout)' },
        scan_type: { type: 'string', default: 'quick', choices: ['quick', 'thorough'], description: 'Scan profile' },
    },

    async run(ctx) {
        const targetUrl = stringOption(ctx.options, 'target_url');
        if (!targetUrl) {
            throw new ModuleError('Target URL must be specified');
        }

        const scanType = stringOption(ctx.options, 'scan_type') ?? 'quick';
        const level = intOption(ctx.options, 'scan_level') ?? 1;
        const risk = intOption(ctx.options, 'risk_level') ?? 1;
        const workdir = ctx.config.getString('workdir');

        const scanOptions: SqlmapScanOptions = {
            url: targetUrl,
            outputDir: path.join(workdir, 'sqlmap_output'),
            data: stringOption(ctx.options, 'data'),
            cookie: stringOption(ctx.options, 'cookie'),
            userAgent: stringOption(ctx.options, 'user_agent'),
            level,
            risk,
            forms: boolOption(ctx.options, 'forms'),
            crawl: intOption(ctx.options, 'crawl_depth'),
            threads: intOption(ctx.options, 'threads'),
        };

        // thorough raises the floor, never lowers what the operator chose
        if (scanType === 'thorough') {
            scanOptions.level = Math.max(level, 3);
            scanOptions.risk = Math.max(risk, 2);
            scanOptions.forms = true;
        }

        const timeout = intOption(ctx.options, 'timeout');
        const execution = await ctx.tools.get('sqlmap').execute(buildSqlmapArgs(scanOptions), {
            timeoutMs: timeout === undefined ? undefined : timeout * 1000,
            signal: ctx.signal,
        });

        if (!execution.parsed.parsed) {
            ctx.logger.warn('sqlmap output could not be parsed', { error: execution.parsed.error });
            return { result: null, execution, success: false };
        }

        const scan = sqlmapScanSchema.safeParse(execution.parsed.data);
        if (!scan.success) {
            throw new ModuleError('sqlmap returned an unexpected payload', { issues: scan.error.issues.length });
        }

        const report = toWebScanReport(targetUrl, scanType, scan.data);
        ctx.logger.info('Scan finished', { targetUrl, vulnerabilities: report.vulnerabilityCount });
        return { result: report, execution, ...toDiscoveries(targetUrl, scan.data) };
    },
});
