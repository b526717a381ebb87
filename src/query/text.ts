import { QueryError } from '../utils/errors.js';

/** Quoted substrings of a query */
const STRING_LITERAL = /("[^"]*")/;

/** A two-digit year and month standing alone, as in identifier prefixes ("1901") */
const DATE_PARTIAL = /(?:^|\s)(\d{2})(0[1-9]|1[0-2])(?:$|\s)/;

export interface EscapedQuery {
    text: string;
    /** True when an unescaped `*` or `?` remains outside quotes */
    wildcard: boolean;
}

/**
 * Escape wildcard characters inside quoted literals and report whether any
 * remain outside them. A query may not begin with a wildcard.
 */
export function wildcardEscape(query: string, parameter = 'query'): EscapedQuery {
    if (query.startsWith('*') || query.startsWith('?')) {
        throw new QueryError('Query cannot start with a wildcard', parameter);
    }

    const text = query
        .split(STRING_LITERAL)
        .map((part) => (part.startsWith('"') ? part.replace(/\*/g, '\\*').replace(/\?/g, '\\?') : part))
        .join('');

    return { text, wildcard: /(?<!\\)[*?]/.test(text) };
}

/**
 * Quoted input asks for exact matching.
 */
export function isLiteral(term: string): boolean {
    return term.includes('"');
}

export function stripQuotes(term: string): string {
    return term.replace(/"/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Lowercase and strip diacritics, the same folding the `folded`
 * normalizer applies at index time.
 */
export function fold(text: string): string {
    return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}

export interface DatePartial {
    /** `yyyy-MM` */
    month: string;
    /** The term with the partial removed */
    remainder: string;
}

/**
 * Find a four-digit `yymm` partial. Years from 91 belong to the 1900s.
 * "hep-th 9901" → { month: "1999-01", remainder: "hep-th" }
 */
export function matchDatePartial(term: string): DatePartial | null {
    const match = DATE_PARTIAL.exec(term);
    if (!match?.[1] || !match[2]) return null;

    const year = match[1];
    const century = parseInt(year, 10) >= 91 ? 19 : 20;
    const remainder = `${term.slice(0, match.index)} ${term.slice(match.index + match[0].length)}`;
    return {
        month: `${century}${year}-${match[2]}`,
        remainder: remainder.replace(/\s+/g, ' ').trim(),
    };
}

/** Inline TeX between dollar signs */
const TEXISM = /\$[^$]+\$/g;

export function isTexQuery(term: string): boolean {
    return /\$[^$]+\$/.test(term);
}

/**
 * Drop inline TeX segments, leaving the plain words around them.
 * "bounds on $\ell_1$ recovery" → "bounds on recovery"
 */
export function stripTex(term: string): string {
    return term.replace(TEXISM, ' ').replace(/\s+/g, ' ').trim();
}

/** Classic `surname_initials` author syntax, e.g. "doe_j" or "van-der-berg_jp" */
const CLASSIC_AUTHOR = /(^|\s)([\p{L}'-]+)_(\p{L}{1,3})(?=$|\s)/gu;

/**
 * Rewrite `surname_initials` tokens to "initials surname", the word order
 * of `full_name_initialized`. "doe_jp" → "j p doe"
 */
export function rewriteClassicAuthor(term: string): string {
    return term.replace(CLASSIC_AUTHOR, (_match: string, lead: string, surname: string, initials: string) =>
        `${lead}${Array.from(initials).join(' ')} ${surname}`);
}
