import { z } from 'zod';
import type { FindingRecord, TargetRecord } from './types.js';

const optionalText = z.string().nullable().optional();

const targetReportSchema = z.object({
    name: z.string().trim().min(1, 'target name must not be empty'),
    ipAddress: optionalText,
    hostname: optionalText,
    os: optionalText,
    status: optionalText,
});

const findingReportSchema = z.object({
    target: z.string().trim().min(1, 'finding target must not be empty'),
    name: z.string().trim().min(1, 'finding name must not be empty'),
    description: z.string().optional(),
    severity: z.enum(['info', 'low', 'medium', 'high', 'critical']).optional(),
    details: z.unknown().optional(),
});

/**
 * Targets and findings a module returns next to its result. Plugin output
 * is untyped at runtime, so it is parsed before anything is recorded.
 */
export const discoveriesSchema = z.object({
    targets: z.array(targetReportSchema).default([]),
    findings: z.array(findingReportSchema).default([]),
});

export type Discoveries = z.infer<typeof discoveriesSchema>;
export type TargetInput = Discoveries['targets'][number];
export type FindingInput = Discoveries['findings'][number];

interface Provenance {
    sessionId: string;
    module: string;
    sequence: number;
    /** ISO timestamp */
    seenAt: string;
}

/**
 * Fold a new report into what the session already knows about the target.
 * Fields the report leaves out keep their previous value.
 */
export function mergeTarget(previous: TargetRecord | undefined, report: TargetInput, from: Provenance): TargetRecord {
    return Object.freeze({
        sessionId: from.sessionId,
        name: report.name,
        ipAddress: report.ipAddress ?? previous?.ipAddress ?? null,
        hostname: report.hostname ?? previous?.hostname ?? null,
        os: report.os ?? previous?.os ?? null,
        status: report.status ?? previous?.status ?? null,
        module: from.module,
        firstSeenAt: previous?.firstSeenAt ?? from.seenAt,
        lastSeenAt: from.seenAt,
    });
}

export function toFinding(report: FindingInput, from: Provenance): FindingRecord {
    return Object.freeze({
        sessionId: from.sessionId,
        target: report.target,
        name: report.name,
        description: report.description ?? '',
        severity: report.severity ?? 'info',
        module: from.module,
        sequence: from.sequence,
        createdAt: from.seenAt,
        ...(report.details === undefined ? {} : { details: report.details }),
    });
}
