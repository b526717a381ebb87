import { describe, it, expect } from 'vitest';
import {
    extractIdentifier,
    parseIdentifier,
    parseIdentifierList,
    parseVersion,
    stripDoiPrefix,
    versionedId,
} from '../sources/identifiers.js';

describe('identifiers', () => {
    describe('parseIdentifier', () => {
        it('should split a version suffix', () => {
            expect(parseIdentifier('1234.5678v2')).toEqual({ paperId: '1234.5678', version: 2 });
            expect(parseIdentifier(' 2401.01234 ')).toEqual({ paperId: '2401.01234', version: null });
        });

        it('should accept old-style identifiers', () => {
            expect(parseIdentifier('hep-th/9901001')).toEqual({ paperId: 'hep-th/9901001', version: null });
            expect(parseIdentifier('math.AG/0101001v3')).toEqual({ paperId: 'math.AG/0101001', version: 3 });
        });

        it('should reject anything else', () => {
            expect(parseIdentifier('1234.5678v0')).toBeNull();
            expect(parseIdentifier('not-an-id')).toBeNull();
            expect(parseIdentifier('')).toBeNull();
        });
    });

    it('should parse version numbers', () => {
        expect(parseVersion(3)).toBe(3);
        expect(parseVersion('3')).toBe(3);
        expect(parseVersion(0)).toBeNull();
        expect(parseVersion(2.5)).toBeNull();
        expect(parseVersion('v2')).toBeNull();
        expect(parseVersion(undefined)).toBeNull();
    });

    it('should compose versioned ids', () => {
        expect(versionedId('1234.5678', 2)).toBe('1234.5678v2');
    });

    it('should extract identifiers from URLs and prefixes', () => {
        expect(extractIdentifier('https://arxiv.org/abs/2401.01234v2')).toBe('2401.01234v2');
        expect(extractIdentifier('arXiv:2401.01234')).toBe('2401.01234');
        expect(extractIdentifier('hello world')).toBeNull();
        expect(extractIdentifier(null)).toBeNull();
    });

    it('should strip DOI prefixes', () => {
        expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('doi:10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('')).toBeNull();
    });

    describe('parseIdentifierList', () => {
        it('should de-duplicate and keep first-occurrence order', () => {
            const list = parseIdentifierList('1234.5678\n\n# comment\n1234.5678v2\nbogus\r\nhep-th/9901001\n');
            expect(list.ids).toEqual(['1234.5678', 'hep-th/9901001']);
            expect(list.invalid).toEqual(['bogus']);
        });

        it('should unwrap abstract URLs and arXiv prefixes', () => {
            const list = parseIdentifierList('https://arxiv.org/abs/2401.01234v2\narXiv:hep-th/9901001\n2401.01234\narXiv: 1234.5678\n');
            expect(list.ids).toEqual(['2401.01234', 'hep-th/9901001']);
            expect(list.invalid).toEqual(['arXiv: 1234.5678']);
        });

        it('should return nothing for an empty list', () => {
            expect(parseIdentifierList('')).toEqual({ ids: [], invalid: [] });
        });
    });
});
