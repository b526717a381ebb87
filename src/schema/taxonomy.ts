import { readFileSync } from 'node:fs';
import type { Classification, TaxonomyNode } from '../types/index.js';

const DEFAULT_TAXONOMY_URL = new URL('../../data/taxonomy.json', import.meta.url);

interface ArchiveEntry extends TaxonomyNode {
    in_group: string;
}

interface CategoryEntry extends TaxonomyNode {
    in_archive: string;
}

export interface TaxonomyData {
    groups: TaxonomyNode[];
    archives: ArchiveEntry[];
    categories: CategoryEntry[];
    /** Legacy category ids subsumed into current ones */
    aliases: Record<string, string>;
}

/**
 * Closed, read-only classification taxonomy: group → archive → category.
 * Each category belongs to exactly one archive and each archive to exactly
 * one group; construction fails if the data says otherwise.
 */
export class Taxonomy {
    private readonly groups = new Map<string, TaxonomyNode>();
    private readonly archives = new Map<string, ArchiveEntry>();
    private readonly categories = new Map<string, CategoryEntry>();
    private readonly aliases = new Map<string, string>();

    constructor(data: TaxonomyData) {
        for (const group of data.groups) {
            this.groups.set(group.id, { id: group.id, name: group.name });
        }
        for (const archive of data.archives) {
            if (!this.groups.has(archive.in_group)) {
                throw new Error(`Archive ${archive.id} references unknown group ${archive.in_group}`);
            }
            if (this.archives.has(archive.id)) {
                throw new Error(`Duplicate archive ${archive.id}`);
            }
            this.archives.set(archive.id, archive);
        }
        for (const category of data.categories) {
            if (!this.archives.has(category.in_archive)) {
                throw new Error(`Category ${category.id} references unknown archive ${category.in_archive}`);
            }
            if (this.categories.has(category.id)) {
                throw new Error(`Duplicate category ${category.id}`);
            }
            this.categories.set(category.id, category);
        }
        for (const [legacy, current] of Object.entries(data.aliases)) {
            if (!this.categories.has(current)) {
                throw new Error(`Alias ${legacy} points at unknown category ${current}`);
            }
            this.aliases.set(legacy, current);
        }
    }

    /**
     * Canonical category id for `id` (following legacy aliases), or null.
     */
    canonicalCategory(id: string): string | null {
        if (this.categories.has(id)) return id;
        return this.aliases.get(id) ?? null;
    }

    hasGroup(id: string): boolean {
        return this.groups.has(id);
    }

    hasArchive(id: string): boolean {
        return this.archives.has(id);
    }

    /**
     * Full classification for a category id, or null when it is not in the taxonomy.
     */
    classify(categoryId: string): Classification | null {
        const canonical = this.canonicalCategory(categoryId);
        if (!canonical) return null;

        // Both lookups hold by construction
        const category = this.categories.get(canonical);
        const archive = category ? this.archives.get(category.in_archive) : undefined;
        const group = archive ? this.groups.get(archive.in_group) : undefined;
        if (!category || !archive || !group) return null;

        return {
            group: { id: group.id, name: group.name },
            archive: { id: archive.id, name: archive.name },
            category: { id: category.id, name: category.name },
        };
    }

    get size(): { groups: number; archives: number; categories: number } {
        return {
            groups: this.groups.size,
            archives: this.archives.size,
            categories: this.categories.size,
        };
    }
}

function isNode(value: unknown): value is TaxonomyNode {
    return typeof value === 'object' && value !== null
        && 'id' in value && typeof value.id === 'string'
        && 'name' in value && typeof value.name === 'string';
}

function isArchiveEntry(value: unknown): value is ArchiveEntry {
    return isNode(value) && 'in_group' in value && typeof value.in_group === 'string';
}

function isCategoryEntry(value: unknown): value is CategoryEntry {
    return isNode(value) && 'in_archive' in value && typeof value.in_archive === 'string';
}

/**
 * Validate parsed JSON as taxonomy data.
 */
export function parseTaxonomyData(raw: unknown): TaxonomyData {
    if (typeof raw !== 'object' || raw === null) {
        throw new Error('Taxonomy data must be an object');
    }

    const groups = 'groups' in raw ? raw.groups : undefined;
    const archives = 'archives' in raw ? raw.archives : undefined;
    const categories = 'categories' in raw ? raw.categories : undefined;
    const aliases = 'aliases' in raw ? raw.aliases : {};

    if (!Array.isArray(groups) || !groups.every(isNode)) {
        throw new Error('Taxonomy "groups" must be a list of {id, name}');
    }
    if (!Array.isArray(archives) || !archives.every(isArchiveEntry)) {
        throw new Error('Taxonomy "archives" must be a list of {id, name, in_group}');
    }
    if (!Array.isArray(categories) || !categories.every(isCategoryEntry)) {
        throw new Error('Taxonomy "categories" must be a list of {id, name, in_archive}');
    }

    const aliasMap: Record<string, string> = {};
    if (typeof aliases === 'object' && aliases !== null) {
        for (const [legacy, current] of Object.entries(aliases)) {
            if (typeof current !== 'string') {
                throw new Error(`Taxonomy alias ${legacy} must map to a category id`);
            }
            aliasMap[legacy] = current;
        }
    }

    return { groups, archives, categories, aliases: aliasMap };
}

/**
 * Load the taxonomy from a JSON file (defaults to data/taxonomy.json).
 */
export function loadTaxonomy(path: string | URL = DEFAULT_TAXONOMY_URL): Taxonomy {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return new Taxonomy(parseTaxonomyData(raw));
}
