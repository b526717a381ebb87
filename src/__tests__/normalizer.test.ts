import { describe, it, expect } from 'vitest';
import { DocumentNormalizer } from '../normalize/normalizer.js';
import { initialsOf } from '../normalize/authors.js';
import { resolveIdentity, toYearMonth } from '../normalize/versions.js';
import { createSchemaRegistry } from '../schema/registry.js';
import { TransformError } from '../utils/errors.js';
import type { RawMetadataRecord } from '../types/index.js';

function record(overrides: Partial<RawMetadataRecord> = {}): RawMetadataRecord {
    return {
        paper_id: '1234.5678',
        version: 1,
        title: 'Learning  to\n Index',
        abstract: ' An abstract. ',
        submitted_date: '2024-01-15T10:00:00Z',
        announced_date_first: '2024-01',
        is_current: true,
        primary_classification: { category: { id: 'cs.LG' } },
        authors_parsed: [{ first_name: 'Jane', last_name: 'Doe' }],
        formats: ['pdf', 'ps', 'pdf'],
        ...overrides,
    };
}

function transformErrorOf(fn: () => unknown): TransformError {
    try {
        fn();
    } catch (error) {
        if (error instanceof TransformError) return error;
        throw error;
    }
    throw new Error('expected a TransformError');
}

describe('DocumentNormalizer', () => {
    const normalizer = new DocumentNormalizer(createSchemaRegistry());

    it('should normalize a single-version record', () => {
        const { document, warnings } = normalizer.normalize(record());

        expect(warnings).toEqual([]);
        expect(document.paper_id).toBe('1234.5678');
        expect(document.paper_id_v).toBe('1234.5678v1');
        expect(document.title).toBe('Learning to Index');
        expect(document.abstract).toBe('An abstract.');
        expect(document.is_current).toBe(true);
        expect(document.is_withdrawn).toBe(false);
        expect(document.latest).toBe('1234.5678v1');
        expect(document.latest_version).toBe(1);
        expect(document.submitted_date).toBe('2024-01-15T10:00:00.000Z');
        expect(document.submitted_date_all).toEqual(['2024-01-15T10:00:00.000Z']);
        expect(document.announced_date_first).toBe('2024-01');
        expect(document.formats).toEqual(['pdf', 'ps']);
        expect(document.primary_classification.archive).toEqual({ id: 'cs', name: 'Computer Science' });
        expect(document.secondary_classification).toEqual([]);
        expect(document.owners).toEqual([]);
        expect(document.combined).toBe('1234.5678 Learning to Index An abstract. Jane Doe cs.LG');
        expect(document.authors_combined).toBe('Jane Doe J Doe');
    });

    it('should rebuild combined when a contributing field changes', () => {
        const base = normalizer.normalize(record()).document.combined;
        const commented = normalizer.normalize(record({ comments: 'Ten pages.' })).document.combined;
        const crossListed = normalizer.normalize(record({
            comments: 'Ten pages.',
            secondary_classification: [{ category: { id: 'cs.AI' } }],
        })).document.combined;

        expect(commented).toBe('1234.5678 Learning to Index An abstract. Jane Doe Ten pages. cs.LG');
        expect(crossListed).toBe('1234.5678 Learning to Index An abstract. Jane Doe Ten pages. cs.LG cs.AI');
        expect(new Set([base, commented, crossListed]).size).toBe(3);
    });

    it('should be deterministic', () => {
        expect(normalizer.normalize(record())).toEqual(normalizer.normalize(record()));
    });

    it('should reject a record without a title', () => {
        const error = transformErrorOf(() => normalizer.normalize(record({ title: '  ' })));
        expect(error.message).toBe('title is required');
        expect(error.paperId).toBe('1234.5678');
        expect(error.field).toBe('title');
    });

    it('should reject a record without a primary classification', () => {
        expect(() => normalizer.normalize(record({ primary_classification: null })))
            .toThrow('primary_classification is required');
    });

    it('should resolve versions across siblings', () => {
        const v1 = record({ is_current: false });
        const v2 = record({ version: 2, submitted_date: '2024-03-01T09:00:00Z' });

        const [first, second] = normalizer.normalizeVersions([v2, v1]);
        if (!first || !second) throw new Error('expected two documents');

        expect(first.document.paper_id_v).toBe('1234.5678v1');
        expect(first.document.is_current).toBe(false);
        expect(first.document.latest).toBe('1234.5678v2');
        expect(first.document.submitted_date).toBe('2024-01-15T10:00:00.000Z');
        expect(second.document.is_current).toBe(true);
        expect(second.document.latest_version).toBe(2);

        for (const { document, warnings } of [first, second]) {
            expect(warnings).toEqual([]);
            expect(document.submitted_date_first).toBe('2024-01-15T10:00:00.000Z');
            expect(document.submitted_date_latest).toBe('2024-03-01T09:00:00.000Z');
            expect(document.submitted_date_all).toEqual(['2024-01-15T10:00:00.000Z', '2024-03-01T09:00:00.000Z']);
        }
    });

    it('should keep the newest live version current when a later one is withdrawn', () => {
        const v1 = record();
        const v2 = record({ version: 2, is_current: false, is_withdrawn: true, submitted_date: '2024-02-01T00:00:00Z' });

        const { document, warnings } = normalizer.normalize(v2, [v1]);
        expect(document.is_current).toBe(false);
        expect(document.is_withdrawn).toBe(true);
        expect(document.latest).toBe('1234.5678v1');
        expect(warnings).toEqual(['withdrawn version v2 is newer than current version v1']);
    });

    it('should make the highest version current when every version is withdrawn', () => {
        const v1 = record({ is_current: false, is_withdrawn: true });
        const v2 = record({ version: 2, is_withdrawn: true, submitted_date: '2024-02-01T00:00:00Z' });

        const [first, second] = normalizer.normalizeVersions([v1, v2]);
        if (!first || !second) throw new Error('expected two documents');

        expect(first.document).toMatchObject({ paper_id_v: '1234.5678v1', is_current: false, is_withdrawn: true, latest: '1234.5678v2' });
        expect(second.document).toMatchObject({ paper_id_v: '1234.5678v2', is_current: true, is_withdrawn: true, latest: '1234.5678v2' });
        expect(first.warnings).toEqual([]);
        expect(second.warnings).toEqual([]);
    });

    it('should warn when upstream flags contradict the current version', () => {
        const { warnings } = normalizer.normalize(record(), [record({ version: 2, submitted_date: '2024-02-01T00:00:00Z' })]);
        expect(warnings).toEqual(['v1 claims is_current=true but the current version is v2']);
    });

    it('should skip siblings of another paper', () => {
        const { document, warnings } = normalizer.normalize(record(), [record({ paper_id: '9999.0000', version: 2 })]);
        expect(document.is_current).toBe(true);
        expect(warnings).toEqual(['sibling record 0 ignored: belongs to 9999.0000']);
    });

    it('should fall back to the latest known submission date', () => {
        const { document } = normalizer.normalize(record({
            submitted_date: null,
            submitted_date_all: ['2024-01-15', '2024-02-01'],
        }));
        expect(document.submitted_date).toBe('2024-02-01T00:00:00.000Z');
    });

    it('should require a submission date', () => {
        expect(() => normalizer.normalize(record({ submitted_date: null }))).toThrow('submitted_date is required');
    });

    describe('classifications', () => {
        it('should reject unknown categories', () => {
            const error = transformErrorOf(() => normalizer.normalize(record({
                primary_classification: { category: { id: 'cs.XX' } },
            })));
            expect(error.message).toBe('unknown category "cs.XX"');
            expect(error.field).toBe('primary_classification.category.id');
        });

        it('should reject an archive that contradicts the category', () => {
            expect(() => normalizer.normalize(record({
                primary_classification: { category: { id: 'cs.LG' }, archive: { id: 'math' } },
            }))).toThrow('archive "math" contradicts category cs.LG, which belongs to cs');
        });

        it('should map legacy categories', () => {
            const { document } = normalizer.normalize(record({
                primary_classification: { category: { id: 'alg-geom' }, archive: { id: 'alg-geom' } },
            }));
            expect(document.primary_classification.category.id).toBe('math.AG');
            expect(document.primary_classification.archive.id).toBe('math');
        });

        it('should de-duplicate secondary categories', () => {
            const { document } = normalizer.normalize(record({
                secondary_classification: [
                    { category: { id: 'stat.ML' } },
                    { category: { id: 'stat.ML' } },
                    { category: { id: 'cs.AI' } },
                ],
            }));
            expect(document.secondary_classification.map((c) => c.category.id)).toEqual(['stat.ML', 'cs.AI']);
        });
    });

    describe('people', () => {
        it('should build names and initials', () => {
            const { document } = normalizer.normalize(record({
                authors_parsed: [
                    { first_name: 'Jean Paul', last_name: 'Sartre', suffix: 'Jr.', affiliation: 'Somewhere University' },
                    { last_name: 'Solo' },
                ],
            }));
            expect(document.authors).toEqual([
                {
                    first_name: 'Jean Paul',
                    last_name: 'Sartre',
                    suffix: 'Jr.',
                    initials: 'J P',
                    full_name: 'Jean Paul Sartre Jr.',
                    full_name_initialized: 'J P Sartre Jr.',
                    affiliation: ['Somewhere University'],
                },
                { last_name: 'Solo', full_name: 'Solo' },
            ]);
        });

        it('should keep the paper when an author lacks a last name', () => {
            const { document, warnings } = normalizer.normalize(record({
                authors_parsed: [{ last_name: 'Doe' }, { first_name: 'Plato' }, { affiliation: 'Nowhere' }],
            }));
            expect(document.authors).toEqual([
                { last_name: 'Doe', full_name: 'Doe' },
                { last_name: 'Plato', full_name: 'Plato' },
            ]);
            expect(warnings).toEqual([
                'authors[1] has no last_name; first_name used as the name',
                'authors[2] has no name; entry skipped',
            ]);
        });

        it('should collapse duplicate owners', () => {
            const { document } = normalizer.normalize(record({
                author_owners: [
                    { first_name: 'Jane', last_name: 'Doe', author_id: 'doe_j_1' },
                    { first_name: 'J.', last_name: 'Doe', author_id: 'doe_j_1' },
                    { last_name: 'Roe' },
                    { last_name: 'roe' },
                ],
            }));
            expect(document.owners.map((owner) => owner.full_name)).toEqual(['Jane Doe', 'Roe']);
        });

        it('should map the submitter', () => {
            const { document } = normalizer.normalize(record({
                submitter: { name: 'Jane Doe', email: 'jane@example.org', name_id: 'jdoe', is_author: true },
            }));
            expect(document.submitter).toEqual({
                name: 'Jane Doe',
                email: 'jane@example.org',
                submitter_id: 'jdoe',
                is_author: true,
            });
        });
    });

    it('should split list-valued fields', () => {
        const { document } = normalizer.normalize(record({
            doi: 'https://doi.org/10.1/a  10.2/b',
            msc_class: '68T05; 62H30, 68T05',
            acm_class: '',
        }));
        expect(document.doi).toEqual(['10.1/a', '10.2/b']);
        expect(document.msc_class).toEqual(['68T05', '62H30']);
        expect(document.acm_class).toBeUndefined();
    });

    it('should validate source sizes', () => {
        expect(() => normalizer.normalize(record({ source: { size_bytes: -1 } })))
            .toThrow('source.size_bytes must be a non-negative integer');
        const { document } = normalizer.normalize(record({ source: { format: 'pdf', size_bytes: 2048 } }));
        expect(document.source).toEqual({ format: 'pdf', size_bytes: 2048 });
    });

    it('should reject a malformed announcement month', () => {
        expect(() => normalizer.normalize(record({ announced_date_first: '2024-13' })))
            .toThrow('announced_date_first is not a valid month: "2024-13"');
    });
});

describe('version helpers', () => {
    it('should split a version suffix off paper_id', () => {
        expect(resolveIdentity({ paper_id: '1234.5678v2' })).toEqual({ paperId: '1234.5678', version: 2 });
        expect(() => resolveIdentity({ paper_id: '1234.5678v2', version: 3 }))
            .toThrow('paper_id suffix v2 disagrees with version 3');
        expect(() => resolveIdentity({ paper_id: '1234.5678' })).toThrow('version is required');
    });

    it('should normalize months', () => {
        expect(toYearMonth('2024-03', '1234.5678', 'announced_date_first')).toBe('2024-03');
        expect(toYearMonth('2024-03-17', '1234.5678', 'announced_date_first')).toBe('2024-03');
    });

    it('should derive initials', () => {
        expect(initialsOf('A. B.')).toBe('A B');
        expect(initialsOf('Jean Paul')).toBe('J P');
    });
});
