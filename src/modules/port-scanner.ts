import { ModuleError } from '../errors.js';
import { defineModule } from '../plugins/registry.js';
import type { TargetReport } from '../plugins/types.js';
import { boolOption, intOption, stringOption } from '../plugins/options.js';
import { buildNmapArgs, nmapScanSchema, type NmapScanResult } from '../tools/core/nmap.js';

const SCAN_TYPE_FLAGS: Record<string, string> = {
    tcp: '-sT',
    syn: '-sS',
    udp: '-sU',
};

export interface MinimalScanReport {
    target: string;
    hosts: {
        ip: string;
        hostname: string | null;
        openPorts: { port: number; protocol: string; service: string | null; version: string | null; banner: string | null }[];
    }[];
}

export function toTargets(scan: NmapScanResult): TargetReport[] {
    return scan.hosts.map(host => ({
        name: host.ipAddress,
        ipAddress: host.ipAddress,
        hostname: host.hostname,
        os: host.os,
        status: host.status,
    }));
}

/**
 * Reduce a scan to open ports per host
 */
export function toMinimalReport(target: string, scan: NmapScanResult): MinimalScanReport {
    return {
        target,
        hosts: scan.hosts.map(host => ({
            ip: host.ipAddress,
            hostname: host.hostname,
            openPorts: host.ports
                .filter(p => p.state === 'open')
                .map(p => ({ port: p.port, protocol: p.protocol, service: p.service, version: p.version, banner: p.banner })),
        })),
    };
}

export const portScanner = defineModule({
    name: 'port_scanner',
    description: 'Scan for open ports on target systems',
    version: '0.1.0',
    author: 'scanshell',
    options: {
        target: { type: 'string', required: true, description: 'Host, IP address or CIDR range to scan' },
        ports: { type: 'string', default: '1-1000', description: 'Port specification (e.g. 22,80,443 or 1-1000)' },
        scan_type: { type: 'string', default: 'tcp', choices: ['tcp', 'syn', 'udp'], description: 'Scan technique' },
        timing: { type: 'int', default: 4, min: 0, max: 5, description: 'Timing template (0 slowest, 5 fastest)' },
        service_detection: { type: 'bool', default: true, description: 'Detect service versions on open ports' },
        script_scan: { type: 'bool', default: false, description: 'Run the default NSE scripts' },
        show_only_open: { type: 'bool', default: false, description: 'Only report open ports' },
        output_format: { type: 'string', default: 'normal', choices: ['normal', 'minimal'], description: 'Result detail' },
        timeout: { type: 'int', min: 1, description: 'Scan timeout in seconds (unset: tools.nmap.timeout)' },
    },

    async run(ctx) {
        const target = stringOption(ctx.options, 'target');
        if (!target) {
            throw new ModuleError('Target must be specified');
        }

        const extraArgs: string[] = [];
        const scanType = stringOption(ctx.options, 'scan_type') ?? 'tcp';
        const scanFlag = SCAN_TYPE_FLAGS[scanType];
        if (scanFlag) extraArgs.push(scanFlag);
        if (boolOption(ctx.options, 'show_only_open')) extraArgs.push('--open');

        const args = buildNmapArgs({
            target,
            ports: stringOption(ctx.options, 'ports'),
            serviceDetection: boolOption(ctx.options, 'service_detection'),
            script: boolOption(ctx.options, 'script_scan') ? 'default' : undefined,
            timing: intOption(ctx.options, 'timing'),
            extraArgs,
        });

        const timeout = intOption(ctx.options, 'timeout');
        const execution = await ctx.tools.get('nmap').execute(args, {
            timeoutMs: timeout === undefined ? undefined : timeout * 1000,
            signal: ctx.signal,
        });

        if (!execution.parsed.parsed) {
            ctx.logger.warn('nmap output could not be parsed', { error: execution.parsed.error });
            return { result: null, execution, success: false };
        }

        const scan = nmapScanSchema.safeParse(execution.parsed.data);
        if (!scan.success) {
            throw new ModuleError('nmap returned an unexpected payload', { issues: scan.error.issues.length });
        }

        ctx.logger.info('Scan finished', { target, hosts: scan.data.hosts.length });

        const result = stringOption(ctx.options, 'output_format') === 'minimal'
            ? toMinimalReport(target, scan.data)
            : scan.data;
        return { result, execution, targets: toTargets(scan.data) };
    },
});
