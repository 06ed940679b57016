import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { CommandBuilder } from '../command-builder.js';
import type { OutputParser, ParsedOutput, ToolIntegrationDescriptor } from '../types.js';

// ─── Result shape ───

export const nmapPortSchema = z.object({
    port: z.number().int(),
    protocol: z.string(),
    state: z.string(),
    service: z.string().nullable(),
    version: z.string().nullable(),
    banner: z.string().nullable(),
});

export const nmapHostSchema = z.object({
    ipAddress: z.string(),
    hostname: z.string().nullable(),
    os: z.string().nullable(),
    status: z.enum(['up', 'down', 'unknown']),
    macAddress: z.string().nullable(),
    ports: z.array(nmapPortSchema),
});

export const nmapScanSchema = z.object({
    scanInfo: z.object({
        scanner: z.string().optional(),
        version: z.string().optional(),
        time: z.string().optional(),
        elapsed: z.string().optional(),
        exit: z.string().optional(),
        summary: z.string().optional(),
    }),
    hosts: z.array(nmapHostSchema),
});

export type NmapPort = z.infer<typeof nmapPortSchema>;
export type NmapHost = z.infer<typeof nmapHostSchema>;
export type NmapScanResult = z.infer<typeof nmapScanSchema>;

// ─── XML helpers ───

type XmlNode = Record<string, unknown>;

const xml = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseAttributeValue: false,
    isArray: (name) => ['host', 'address', 'hostname', 'port', 'osmatch', 'script'].includes(name),
});

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: XmlNode | undefined, name: string): XmlNode | undefined {
    const value = node?.[name];
    return isNode(value) ? value : undefined;
}

function children(node: XmlNode | undefined, name: string): XmlNode[] {
    const value = node?.[name];
    if (Array.isArray(value)) return value.filter(isNode);
    return isNode(value) ? [value] : [];
}

function attr(node: XmlNode | undefined, name: string): string | undefined {
    const value = node?.[name];
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return undefined;
}

// ─── Parser ───

function parsePort(node: XmlNode): NmapPort | null {
    const portId = Number(attr(node, 'portid'));
    if (!Number.isInteger(portId)) return null;

    const service = child(node, 'service');
    let version: string | null = null;
    if (service) {
        const product = attr(service, 'product') ?? '';
        const productVersion = attr(service, 'version');
        version = (productVersion ? `${product} ${productVersion}` : product).trim() || null;
    }

    const banner = children(node, 'script').find(s => attr(s, 'id') === 'banner');

    return {
        port: portId,
        protocol: attr(node, 'protocol') ?? '',
        state: attr(child(node, 'state'), 'state') ?? 'unknown',
        service: attr(service, 'name') ?? null,
        version,
        banner: attr(banner, 'output') ?? null,
    };
}

function parseHost(node: XmlNode): NmapHost | null {
    const addresses = children(node, 'address');
    const ipAddress = attr(addresses.find(a => attr(a, 'addrtype') === 'ipv4'), 'addr');
    if (!ipAddress) return null;

    const state = attr(child(node, 'status'), 'state');
    const hostnames = children(child(node, 'hostnames'), 'hostname');
    const hostname = hostnames.find(h => attr(h, 'type') === 'user') ?? hostnames[0];
    const osMatch = children(child(node, 'os'), 'osmatch').find(o => attr(o, 'name'));

    const ports: NmapPort[] = [];
    for (const portNode of children(child(node, 'ports'), 'port')) {
        const port = parsePort(portNode);
        if (port) ports.push(port);
    }

    return {
        ipAddress,
        hostname: attr(hostname, 'name') ?? null,
        os: attr(osMatch, 'name') ?? null,
        status: state === 'up' || state === 'down' ? state : 'unknown',
        macAddress: attr(addresses.find(a => attr(a, 'addrtype') === 'mac'), 'addr') ?? null,
        ports,
    };
}

/**
 * Parses `nmap -oX -` output. Hosts without an IPv4 address are skipped.
 */
export const nmapParser: OutputParser<NmapScanResult> = {
    parse(stdout: string, stderr: string): ParsedOutput<NmapScanResult> {
        const text = stdout.trim();
        if (!text) {
            const error = stderr.trim() ? `No output from nmap: ${stderr.trim()}` : 'No output from nmap';
            return { parsed: false, raw: stdout, error };
        }

        const validation = XMLValidator.validate(text);
        if (validation !== true) {
            return {
                parsed: false,
                raw: stdout,
                error: `Invalid nmap XML at line ${validation.err.line}: ${validation.err.msg}`,
            };
        }

        const root = child(xml.parse(text), 'nmaprun');
        if (!root) {
            return { parsed: false, raw: stdout, error: 'Output is not an nmap XML report' };
        }

        const finished = child(child(root, 'runstats'), 'finished');
        const hosts: NmapHost[] = [];
        for (const hostNode of children(root, 'host')) {
            const host = parseHost(hostNode);
            if (host) hosts.push(host);
        }

        return {
            parsed: true,
            data: {
                scanInfo: {
                    scanner: attr(root, 'scanner'),
                    version: attr(root, 'version'),
                    time: attr(finished, 'time'),
                    elapsed: attr(finished, 'elapsed'),
                    exit: attr(finished, 'exit'),
                    summary: attr(finished, 'summary'),
                },
                hosts,
            },
        };
    },
};

// ─── Descriptor & arguments ───

export const nmapDescriptor: ToolIntegrationDescriptor<NmapScanResult> = {
    name: 'nmap',
    binaryName: 'nmap',
    versionArgs: ['--version'],
    defaultArgs: [],
    containerImage: 'instrumentisto/nmap:latest',
    containerOptions: ['--net=host'],
    mode: 'auto',
    defaultTimeoutMs: 600_000,
    versionPattern: /Nmap version (\S+)/,
    parser: nmapParser,
};

export interface NmapScanOptions {
    target: string;
    ports?: string;
    serviceDetection?: boolean;
    osDetection?: boolean;
    script?: string;
    /** Timing template 0-5 */
    timing?: number;
    extraArgs?: readonly string[];
}

/**
 * Arguments for an XML-reporting scan of one target
 */
export function buildNmapArgs(options: NmapScanOptions): string[] {
    return new CommandBuilder()
        .flag('-oX', '-')
        .flag('-p', options.ports)
        .flag('-sV', options.serviceDetection)
        .flag('-O', options.osDetection)
        .flag('--script', options.script)
        .flag(`-T${options.timing ?? ''}`, options.timing !== undefined)
        .arg(...(options.extraArgs ?? []))
        .arg(options.target)
        .build();
}
