import type { Author, Submitter } from '../types/index.js';
import { optionalArray, optionalBoolean, optionalObject, optionalText, prop } from './values.js';

/**
 * First letter of every given-name part, space separated.
 * "Jean Paul" → "J P", "A. B." → "A B"
 */
export function initialsOf(firstName: string): string {
    return firstName
        .split(/[\s.]+/)
        .filter(Boolean)
        .map((part) => Array.from(part)[0] ?? '')
        .join(' ');
}

/**
 * Build a canonical author from a raw entry.
 * full_name = first last suffix; full_name_initialized = initials last suffix.
 * A lone first name is taken as the whole name. Entries without any name
 * are skipped; both cases are reported through `warnings`.
 */
export function normalizeAuthor(raw: unknown, paperId: string, field: string, warnings: string[]): Author | null {
    const entry = optionalObject(raw, paperId, field);
    if (!entry) {
        warnings.push(`${field} is empty; entry skipped`);
        return null;
    }
    const givenLast = optionalText(prop(entry, 'last_name'), paperId, `${field}.last_name`);
    const givenFirst = optionalText(prop(entry, 'first_name'), paperId, `${field}.first_name`);

    let lastName: string;
    let firstName: string | undefined;
    if (givenLast) {
        lastName = givenLast;
        firstName = givenFirst;
    } else if (givenFirst) {
        warnings.push(`${field} has no last_name; first_name used as the name`);
        lastName = givenFirst;
    } else {
        warnings.push(`${field} has no name; entry skipped`);
        return null;
    }
    const suffix = optionalText(prop(entry, 'suffix'), paperId, `${field}.suffix`);
    const initials = firstName ? initialsOf(firstName) : undefined;

    const author: Author = {
        last_name: lastName,
        full_name: [firstName, lastName, suffix].filter(Boolean).join(' '),
    };
    if (firstName) author.first_name = firstName;
    if (initials) {
        author.initials = initials;
        author.full_name_initialized = [initials, lastName, suffix].filter(Boolean).join(' ');
    }
    if (suffix) author.suffix = suffix;

    const authorId = optionalText(prop(entry, 'author_id'), paperId, `${field}.author_id`);
    if (authorId) author.author_id = authorId;
    const orcid = optionalText(prop(entry, 'orcid'), paperId, `${field}.orcid`);
    if (orcid) author.orcid = orcid;

    const affiliation = normalizeAffiliation(prop(entry, 'affiliation'), paperId, `${field}.affiliation`);
    if (affiliation.length > 0) author.affiliation = affiliation;

    return author;
}

function normalizeAffiliation(raw: unknown, paperId: string, field: string): string[] {
    if (typeof raw === 'string') {
        const single = raw.trim();
        return single ? [single] : [];
    }
    return optionalArray(raw, paperId, field)
        .map((item, i) => optionalText(item, paperId, `${field}[${i}]`))
        .filter((item): item is string => item !== undefined);
}

/**
 * Ordered author list; order is authorship order and is preserved.
 */
export function normalizeAuthors(raw: unknown, paperId: string, field: string, warnings: string[]): Author[] {
    return optionalArray(raw, paperId, field)
        .map((entry, i) => normalizeAuthor(entry, paperId, `${field}[${i}]`, warnings))
        .filter((author): author is Author => author !== null);
}

/**
 * Owner set: duplicates (same author id, or same full name without one) collapse.
 */
export function normalizeOwners(raw: unknown, paperId: string, field: string, warnings: string[]): Author[] {
    const seen = new Set<string>();
    const owners: Author[] = [];
    for (const owner of normalizeAuthors(raw, paperId, field, warnings)) {
        const key = owner.author_id ?? `name:${owner.full_name.toLowerCase()}`;
        if (seen.has(key)) continue;
        seen.add(key);
        owners.push(owner);
    }
    return owners;
}

export function normalizeSubmitter(raw: unknown, paperId: string): Submitter | undefined {
    const entry = optionalObject(raw, paperId, 'submitter');
    if (!entry) return undefined;

    const submitter: Submitter = {};
    const email = optionalText(prop(entry, 'email'), paperId, 'submitter.email');
    if (email) submitter.email = email;
    const name = optionalText(prop(entry, 'name'), paperId, 'submitter.name');
    if (name) submitter.name = name;
    const submitterId = optionalText(prop(entry, 'name_id'), paperId, 'submitter.name_id');
    if (submitterId) submitter.submitter_id = submitterId;
    const isAuthor = optionalBoolean(prop(entry, 'is_author'), paperId, 'submitter.is_author');
    if (isAuthor !== undefined) submitter.is_author = isAuthor;
    const authorId = optionalText(prop(entry, 'author_id'), paperId, 'submitter.author_id');
    if (authorId) submitter.author_id = authorId;
    const orcid = optionalText(prop(entry, 'orcid'), paperId, 'submitter.orcid');
    if (orcid) submitter.orcid = orcid;

    return Object.keys(submitter).length > 0 ? submitter : undefined;
}
