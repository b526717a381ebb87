import type { RawMetadataRecord } from '../types/index.js';
import { TransformError } from '../utils/errors.js';
import { parseIdentifier, parseVersion } from '../sources/identifiers.js';
import { optionalArray, optionalBoolean, optionalText, toIsoTimestamp } from './values.js';

export interface PaperIdentity {
    paperId: string;
    version: number;
}

interface VersionFacts {
    version: number;
    withdrawn: boolean;
    /** What the upstream record says about itself, if anything */
    claimedCurrent?: boolean;
    /** Own submission timestamp, ISO */
    submittedDate?: string;
    /** Every submission timestamp the record knows about, ISO */
    dates: string[];
    announced?: string;
}

/**
 * Cross-version facts for one document.
 */
export interface VersionResolution extends PaperIdentity {
    currentVersion: number;
    isCurrent: boolean;
    isWithdrawn: boolean;
    submittedDate: string;
    submittedDateFirst: string;
    submittedDateLatest: string;
    submittedDateAll: string[];
    announcedDateFirst?: string;
    warnings: string[];
}

/**
 * Versionless id and version of a raw record. A `vN` suffix on paper_id is
 * split off; it must agree with `version` when both are present.
 */
export function resolveIdentity(record: RawMetadataRecord): PaperIdentity {
    const rawId = optionalText(record.paper_id, null, 'paper_id');
    if (!rawId) {
        throw new TransformError('paper_id is required', null, 'paper_id');
    }
    const parsed = parseIdentifier(rawId);
    if (!parsed) {
        throw new TransformError(`paper_id "${rawId}" is not a valid identifier`, rawId, 'paper_id');
    }

    const { paperId } = parsed;
    if (record.version === undefined || record.version === null) {
        if (parsed.version === null) {
            throw new TransformError('version is required', paperId, 'version');
        }
        return { paperId, version: parsed.version };
    }

    const version = parseVersion(record.version);
    if (version === null) {
        throw new TransformError(`version must be a positive integer, got ${JSON.stringify(record.version)}`, paperId, 'version');
    }
    if (parsed.version !== null && parsed.version !== version) {
        throw new TransformError(`paper_id suffix v${parsed.version} disagrees with version ${version}`, paperId, 'version');
    }
    return { paperId, version };
}

/**
 * Normalize a month to `yyyy-MM`. Accepts `yyyy-MM` and full dates.
 */
export function toYearMonth(value: string, paperId: string, field: string): string {
    const match = /^(\d{4})-(\d{2})(?:-\d{2}(?:[T ].*)?)?$/.exec(value);
    const month = match?.[2] ? parseInt(match[2], 10) : 0;
    if (!match?.[1] || month < 1 || month > 12) {
        throw new TransformError(`${field} is not a valid month: "${value}"`, paperId, field);
    }
    return `${match[1]}-${match[2]}`;
}

function versionFacts(record: RawMetadataRecord, paperId: string, version: number): VersionFacts {
    const submitted = optionalText(record.submitted_date, paperId, 'submitted_date');
    const submittedDate = submitted ? toIsoTimestamp(submitted, paperId, 'submitted_date') : undefined;

    const dates = optionalArray(record.submitted_date_all, paperId, 'submitted_date_all')
        .map((value, i) => optionalText(value, paperId, `submitted_date_all[${i}]`))
        .filter((value): value is string => value !== undefined)
        .map((value) => toIsoTimestamp(value, paperId, 'submitted_date_all'));
    if (submittedDate) dates.push(submittedDate);

    const announced = optionalText(record.announced_date_first, paperId, 'announced_date_first');

    return {
        version,
        withdrawn: optionalBoolean(record.is_withdrawn, paperId, 'is_withdrawn') ?? false,
        claimedCurrent: optionalBoolean(record.is_current, paperId, 'is_current'),
        submittedDate,
        dates,
        announced: announced ? toYearMonth(announced, paperId, 'announced_date_first') : undefined,
    };
}

/**
 * Resolve current/withdrawn flags and submission dates over the record and
 * its sibling versions. The record wins over a sibling with the same
 * version; siblings that belong to another paper or carry no usable
 * version are skipped with a warning.
 *
 * The current version is the highest non-withdrawn one, or the highest
 * version when all are withdrawn. Upstream data contradicting that rule is
 * reported in `warnings`.
 */
export function resolveVersions(record: RawMetadataRecord, siblings: readonly RawMetadataRecord[]): VersionResolution {
    const { paperId, version } = resolveIdentity(record);
    const warnings: string[] = [];

    const own = versionFacts(record, paperId, version);
    const byVersion = new Map<number, VersionFacts>([[version, own]]);

    siblings.forEach((sibling, i) => {
        let identity: PaperIdentity;
        try {
            identity = resolveIdentity(sibling.paper_id === undefined ? { ...sibling, paper_id: paperId } : sibling);
        } catch (error) {
            if (!(error instanceof TransformError)) throw error;
            warnings.push(`sibling record ${i} ignored: ${error.message}`);
            return;
        }
        if (identity.paperId !== paperId) {
            warnings.push(`sibling record ${i} ignored: belongs to ${identity.paperId}`);
            return;
        }
        if (!byVersion.has(identity.version)) {
            byVersion.set(identity.version, versionFacts(sibling, paperId, identity.version));
        }
    });

    const versions = [...byVersion.values()].sort((a, b) => a.version - b.version);
    const live = versions.filter((facts) => !facts.withdrawn);
    const current = live[live.length - 1] ?? versions[versions.length - 1] ?? own;

    for (const facts of versions) {
        if (live.length > 0 && facts.withdrawn && facts.version > current.version) {
            warnings.push(`withdrawn version v${facts.version} is newer than current version v${current.version}`);
        }
        const isCurrent = facts.version === current.version;
        if (facts.claimedCurrent !== undefined && facts.claimedCurrent !== isCurrent) {
            warnings.push(`v${facts.version} claims is_current=${facts.claimedCurrent} but the current version is v${current.version}`);
        }
    }

    const submittedDate = own.submittedDate ?? [...own.dates].sort().pop();
    if (!submittedDate) {
        throw new TransformError('submitted_date is required', paperId, 'submitted_date');
    }

    // ISO timestamps in UTC order lexicographically
    const all = [...new Set(versions.flatMap((facts) => facts.dates))].sort();
    const announced = versions
        .map((facts) => facts.announced)
        .filter((value): value is string => value !== undefined)
        .sort();

    return {
        paperId,
        version,
        currentVersion: current.version,
        isCurrent: version === current.version,
        isWithdrawn: own.withdrawn,
        submittedDate,
        submittedDateFirst: all[0] ?? submittedDate,
        submittedDateLatest: all[all.length - 1] ?? submittedDate,
        submittedDateAll: all,
        announcedDateFirst: announced[0],
        warnings,
    };
}
