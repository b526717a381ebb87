import { readFile } from 'node:fs/promises';

/**
 * Shared identifier utilities for the fetcher, normalizer and query layer.
 */

const NEW_STYLE = /^(\d{4}\.\d{4,5})(?:v(\d+))?$/;
const OLD_STYLE = /^([a-z]+(?:-[a-z]+)*(?:\.[A-Z]{2})?\/\d{7})(?:v(\d+))?$/;

export interface ParsedIdentifier {
    /** Versionless identifier */
    paperId: string;
    /** Version when the input carried a `vN` suffix */
    version: number | null;
}

/**
 * Parse a paper identifier with an optional version suffix.
 * "1234.5678v2" → { paperId: "1234.5678", version: 2 }
 * "hep-th/9901001" → { paperId: "hep-th/9901001", version: null }
 */
export function parseIdentifier(input: string): ParsedIdentifier | null {
    const trimmed = input.trim();
    const match = NEW_STYLE.exec(trimmed) ?? OLD_STYLE.exec(trimmed);
    if (!match?.[1]) return null;

    const version = match[2] ? parseInt(match[2], 10) : null;
    if (version !== null && version < 1) return null;

    return { paperId: match[1], version };
}

/**
 * Extract an identifier from the usual ways people write one.
 * "https://arxiv.org/abs/2401.01234" → "2401.01234"
 * "arXiv:2401.01234v2" → "2401.01234v2"
 */
export function extractIdentifier(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/abs\/([^\s?#]+)/i,
        /^arxiv:(\S+)$/i,
        /^(\S+)$/,
    ];

    for (const pattern of patterns) {
        const match = input.trim().match(pattern);
        if (match?.[1] && parseIdentifier(match[1])) return match[1];
    }

    return null;
}

/**
 * A version number given as a number or a numeric string, or null when it
 * is absent or not a positive integer.
 */
export function parseVersion(value: unknown): number | null {
    const version = typeof value === 'string' && /^\d+$/.test(value.trim())
        ? parseInt(value, 10)
        : value;
    return typeof version === 'number' && Number.isInteger(version) && version >= 1 ? version : null;
}

/**
 * Compose the versioned key used as the engine document id.
 */
export function versionedId(paperId: string, version: number): string {
    return `${paperId}v${version}`;
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:/i, '')
        .trim() || null;
}

export interface IdentifierList {
    /** Valid versionless identifiers, first occurrence order, no duplicates */
    ids: string[];
    /** Lines that are not identifiers */
    invalid: string[];
}

/**
 * Parse newline-delimited identifiers. Blank lines and `#` comments are
 * ignored; abstract URLs and `arXiv:` prefixes are unwrapped, and a
 * versioned entry is reduced to its versionless id.
 */
export function parseIdentifierList(text: string): IdentifierList {
    const seen = new Set<string>();
    const ids: string[] = [];
    const invalid: string[] = [];

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;

        const extracted = extractIdentifier(line);
        const parsed = extracted ? parseIdentifier(extracted) : null;
        if (!parsed) {
            invalid.push(line);
            continue;
        }
        if (!seen.has(parsed.paperId)) {
            seen.add(parsed.paperId);
            ids.push(parsed.paperId);
        }
    }

    return { ids, invalid };
}

/**
 * Read an identifier list file. Rejects when the file cannot be read.
 */
export async function readIdentifierList(path: string): Promise<IdentifierList> {
    return parseIdentifierList(await readFile(path, 'utf-8'));
}
