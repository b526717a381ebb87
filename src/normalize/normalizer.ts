import type {
    Classification,
    DocumentBody,
    License,
    PaperDocument,
    RawMetadataRecord,
    SourceInfo,
} from '../types/index.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { TransformError } from '../utils/errors.js';
import { stripDoiPrefix, versionedId } from '../sources/identifiers.js';
import { normalizeAuthors, normalizeOwners, normalizeSubmitter } from './authors.js';
import { resolveVersions } from './versions.js';
import {
    optionalArray,
    optionalLine,
    optionalObject,
    optionalText,
    prop,
    splitList,
    toIsoTimestamp,
} from './values.js';

export interface NormalizedDocument {
    document: PaperDocument;
    /** Upstream data that was accepted but contradicts the version rules or is incomplete */
    warnings: string[];
}

/**
 * Maps raw, version-scoped metadata records into canonical PaperDocuments.
 * Pure: the same record and siblings always produce the same document.
 */
export class DocumentNormalizer {
    constructor(private readonly registry: SchemaRegistry) {}

    /**
     * Normalize one version record, resolving cross-version facts against
     * its siblings. Throws TransformError for malformed input.
     */
    normalize(record: RawMetadataRecord, siblings: readonly RawMetadataRecord[] = []): NormalizedDocument {
        const resolution = resolveVersions(record, siblings);
        const { paperId, version } = resolution;
        const warnings = [...resolution.warnings];

        const title = optionalLine(record.title, paperId, 'title');
        if (!title) {
            throw new TransformError('title is required', paperId, 'title');
        }

        const body: DocumentBody = {
            paper_id: paperId,
            version,
            paper_id_v: versionedId(paperId, version),
            is_current: resolution.isCurrent,
            is_withdrawn: resolution.isWithdrawn,
            latest: versionedId(paperId, resolution.currentVersion),
            latest_version: resolution.currentVersion,
            submitted_date: resolution.submittedDate,
            submitted_date_first: resolution.submittedDateFirst,
            submitted_date_latest: resolution.submittedDateLatest,
            submitted_date_all: resolution.submittedDateAll,
            title,
            formats: this.formats(record.formats, paperId),
            primary_classification: this.primaryClassification(record.primary_classification, paperId),
            secondary_classification: this.secondaryClassifications(record.secondary_classification, paperId),
            authors: normalizeAuthors(record.authors_parsed, paperId, 'authors', warnings),
            owners: normalizeOwners(record.author_owners, paperId, 'owners', warnings),
        };

        const updated = optionalText(record.updated_date, paperId, 'updated_date');
        if (updated) body.updated_date = toIsoTimestamp(updated, paperId, 'updated_date');
        const modified = optionalText(record.modified_date, paperId, 'modified_date');
        if (modified) body.modified_date = toIsoTimestamp(modified, paperId, 'modified_date');
        if (resolution.announcedDateFirst) body.announced_date_first = resolution.announcedDateFirst;

        const abstract = optionalText(record.abstract, paperId, 'abstract');
        if (abstract) body.abstract = abstract;
        const comments = optionalLine(record.comments, paperId, 'comments');
        if (comments) body.comments = comments;
        const journalRef = optionalLine(record.journal_ref, paperId, 'journal_ref');
        if (journalRef) body.journal_ref = journalRef;
        const reportNum = optionalLine(record.report_num, paperId, 'report_num');
        if (reportNum) body.report_num = reportNum;

        const doi = splitList(optionalText(record.doi, paperId, 'doi'), /\s+/)
            ?.map((value) => stripDoiPrefix(value))
            .filter((value): value is string => value !== null);
        if (doi && doi.length > 0) body.doi = doi;
        const msc = splitList(optionalText(record.msc_class, paperId, 'msc_class'), /[;,]/);
        if (msc) body.msc_class = msc;
        const acm = splitList(optionalText(record.acm_class, paperId, 'acm_class'), /[;,]/);
        if (acm) body.acm_class = acm;

        const license = this.license(record.license, paperId);
        if (license) body.license = license;
        const source = this.source(record.source, paperId);
        if (source) body.source = source;
        const submitter = normalizeSubmitter(record.submitter, paperId);
        if (submitter) body.submitter = submitter;
        const fulltext = optionalText(record.fulltext, paperId, 'fulltext');
        if (fulltext) body.fulltext = fulltext;

        return { document: this.registry.fanOut(body), warnings };
    }

    /**
     * Normalize every version of one paper, each against the others.
     * Returned in ascending version order.
     */
    normalizeVersions(records: readonly RawMetadataRecord[]): NormalizedDocument[] {
        return records
            .map((record, i) => this.normalize(record, records.filter((_, j) => j !== i)))
            .sort((a, b) => a.document.version - b.document.version);
    }

    private formats(raw: unknown, paperId: string): string[] {
        const formats = optionalArray(raw, paperId, 'formats')
            .map((value, i) => optionalText(value, paperId, `formats[${i}]`))
            .filter((value): value is string => value !== undefined);
        return [...new Set(formats)];
    }

    private primaryClassification(raw: unknown, paperId: string): Classification {
        if (raw === undefined || raw === null) {
            throw new TransformError('primary_classification is required', paperId, 'primary_classification');
        }
        return this.classify(raw, paperId, 'primary_classification');
    }

    private secondaryClassifications(raw: unknown, paperId: string): Classification[] {
        const seen = new Set<string>();
        const result: Classification[] = [];
        optionalArray(raw, paperId, 'secondary_classification').forEach((entry, i) => {
            const classification = this.classify(entry, paperId, `secondary_classification[${i}]`);
            if (seen.has(classification.category.id)) return;
            seen.add(classification.category.id);
            result.push(classification);
        });
        return result;
    }

    /**
     * Resolve a raw `{category, archive?, group?}` reference through the
     * taxonomy. Archive and group ids, when given, must match the
     * category's place in the taxonomy.
     */
    private classify(raw: unknown, paperId: string, field: string): Classification {
        const entry = optionalObject(raw, paperId, field);
        const idAt = (level: 'category' | 'archive' | 'group'): string | undefined =>
            optionalText(prop(optionalObject(prop(entry, level), paperId, `${field}.${level}`), 'id'), paperId, `${field}.${level}.id`);

        const categoryId = idAt('category');
        if (!categoryId) {
            throw new TransformError(`${field}.category.id is required`, paperId, `${field}.category.id`);
        }

        const taxonomy = this.registry.taxonomy;
        const classification = taxonomy.classify(categoryId);
        if (!classification) {
            throw new TransformError(`unknown category "${categoryId}"`, paperId, `${field}.category.id`);
        }

        // Legacy category ids come with legacy archive ids
        if (classification.category.id !== categoryId) return classification;

        for (const level of ['archive', 'group'] as const) {
            const id = idAt(level);
            if (id === undefined || id === classification[level].id) continue;

            const known = level === 'archive' ? taxonomy.hasArchive(id) : taxonomy.hasGroup(id);
            throw new TransformError(
                known
                    ? `${level} "${id}" contradicts category ${categoryId}, which belongs to ${classification[level].id}`
                    : `unknown ${level} "${id}"`,
                paperId,
                `${field}.${level}.id`
            );
        }
        return classification;
    }

    private license(raw: unknown, paperId: string): License | undefined {
        const entry = optionalObject(raw, paperId, 'license');
        const uri = optionalText(prop(entry, 'uri'), paperId, 'license.uri');
        if (!uri) return undefined;
        const label = optionalText(prop(entry, 'label'), paperId, 'license.label');
        return label ? { uri, label } : { uri };
    }

    private source(raw: unknown, paperId: string): SourceInfo | undefined {
        const entry = optionalObject(raw, paperId, 'source');
        if (!entry) return undefined;

        const source: SourceInfo = {};
        const flags = optionalText(prop(entry, 'flags'), paperId, 'source.flags');
        if (flags) source.flags = flags;
        const format = optionalText(prop(entry, 'format'), paperId, 'source.format');
        if (format) source.format = format;

        const size = prop(entry, 'size_bytes');
        if (size !== undefined && size !== null) {
            if (typeof size !== 'number' || !Number.isInteger(size) || size < 0) {
                throw new TransformError('source.size_bytes must be a non-negative integer', paperId, 'source.size_bytes');
            }
            source.size_bytes = size;
        }
        return Object.keys(source).length > 0 ? source : undefined;
    }
}
