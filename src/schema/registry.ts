import { createHash } from 'node:crypto';
import type { estypes } from '@elastic/elasticsearch';
import type { AggregateField, DocumentBody, PaperDocument, SchemaPlan } from '../types/index.js';
import { FIELD_DEFINITIONS, SCHEMA_VERSION, type FieldDefinition, type FieldRole } from './fields.js';
import { loadTaxonomy, type Taxonomy } from './taxonomy.js';

/**
 * Analysis chain referenced by the field definitions.
 */
const ANALYSIS: estypes.IndicesIndexSettingsAnalysis = {
    filter: {
        english_stop: { type: 'stop', stopwords: '_english_' },
        english_stemmer: { type: 'stemmer', language: 'english' },
        english_possessive_stemmer: { type: 'stemmer', language: 'possessive_english' },
    },
    analyzer: {
        stemmed_text: {
            type: 'custom',
            tokenizer: 'standard',
            filter: ['english_possessive_stemmer', 'lowercase', 'asciifolding', 'english_stop', 'english_stemmer'],
        },
        folded_text: {
            type: 'custom',
            tokenizer: 'standard',
            filter: ['lowercase', 'asciifolding'],
        },
    },
    normalizer: {
        folded: {
            type: 'custom',
            filter: ['lowercase', 'asciifolding'],
        },
    },
};

const AGGREGATE_FIELDS: readonly AggregateField[] = ['combined', 'authors_combined'];

/**
 * Schema metadata stored on the live index (mapping `_meta`).
 */
export interface IndexSchemaMeta {
    schemaVersion: number | null;
    fingerprint: string | null;
}

export interface IndexDefinition {
    settings: estypes.IndicesIndexSettings;
    mappings: estypes.MappingTypeMapping;
}

/**
 * Single source of truth for what an indexed document looks like: field
 * roles, aggregate fan-out, analysis settings and the closed taxonomy.
 */
export class SchemaRegistry {
    readonly version: number;
    readonly fingerprint: string;
    private readonly byPath = new Map<string, FieldDefinition>();

    constructor(
        readonly taxonomy: Taxonomy,
        readonly fields: readonly FieldDefinition[] = FIELD_DEFINITIONS,
        version: number = SCHEMA_VERSION
    ) {
        for (const field of fields) {
            if (this.byPath.has(field.path)) {
                throw new Error(`Duplicate field definition: ${field.path}`);
            }
            this.byPath.set(field.path, field);
        }
        this.version = version;
        this.fingerprint = createHash('sha256')
            .update(JSON.stringify({ fields, analysis: ANALYSIS }))
            .digest('hex');
    }

    getField(path: string): FieldDefinition | undefined {
        return this.byPath.get(path);
    }

    /**
     * Aggregate fields that `path` feeds.
     */
    copyTargets(path: string): AggregateField[] {
        return [...(this.byPath.get(path)?.copyTo ?? [])];
    }

    /**
     * Source fields of an aggregate, in concatenation order.
     */
    sourcesOf(target: AggregateField): string[] {
        return this.fields
            .filter((field) => field.copyTo?.includes(target))
            .map((field) => field.path);
    }

    /**
     * Engine field name carrying `role` for the field at `path`:
     * the field itself or one of its variants (e.g. `title.exact`).
     */
    fieldFor(path: string, role: FieldRole): string {
        const field = this.byPath.get(path);
        if (!field) {
            throw new Error(`Unknown field: ${path}`);
        }
        if (field.role === role) return path;

        const variant = field.variants?.find((v) => v.role === role);
        if (!variant) {
            throw new Error(`Field ${path} has no ${role} representation`);
        }
        return `${path}.${variant.name}`;
    }

    /**
     * Compute the aggregate fields for a document body. This is the only
     * place `combined` and `authors_combined` are produced.
     */
    fanOut(body: DocumentBody): PaperDocument {
        const aggregates: Record<AggregateField, string> = { combined: '', authors_combined: '' };

        for (const target of AGGREGATE_FIELDS) {
            const parts: string[] = [];
            for (const path of this.sourcesOf(target)) {
                collectValues(body, path.split('.'), parts);
            }
            aggregates[target] = parts.join(' ');
        }

        return { ...body, ...aggregates };
    }

    /**
     * Elasticsearch settings and strict mappings for this schema version.
     */
    indexDefinition(): IndexDefinition {
        const root: Record<string, estypes.MappingProperty> = {};
        const containers = new Map<string, Record<string, estypes.MappingProperty>>();

        for (const field of this.fields) {
            const segments = field.path.split('.');
            const name = segments.pop() ?? field.path;
            const parentPath = segments.join('.');
            const parent = parentPath ? containers.get(parentPath) : root;
            if (!parent) {
                throw new Error(`Field ${field.path} is defined before its parent ${parentPath}`);
            }

            if (field.type === 'object' || field.type === 'nested') {
                const properties: Record<string, estypes.MappingProperty> = {};
                containers.set(field.path, properties);
                parent[name] = field.type === 'nested'
                    ? { type: 'nested', properties }
                    : { type: 'object', properties };
            } else {
                parent[name] = toMappingProperty(field);
            }
        }

        return {
            settings: { analysis: ANALYSIS },
            mappings: {
                dynamic: 'strict',
                _meta: { schema_version: this.version, schema_fingerprint: this.fingerprint },
                properties: root,
            },
        };
    }

    /**
     * Decide whether documents can be written incrementally into the live
     * index or the index has to be rebuilt from scratch.
     */
    planSchemaChange(live: IndexSchemaMeta | null): SchemaPlan {
        if (!live) return { action: 'create' };

        if (live.schemaVersion !== this.version) {
            return {
                action: 'rebuild',
                reason: `index schema version ${live.schemaVersion ?? 'unknown'} differs from ${this.version}`,
            };
        }
        if (live.fingerprint !== this.fingerprint) {
            return {
                action: 'rebuild',
                reason: `index field definitions changed without a schema version bump (version ${this.version})`,
            };
        }
        return { action: 'incremental' };
    }
}

function toMappingProperty(field: FieldDefinition): estypes.MappingProperty {
    const fields: Record<string, estypes.MappingProperty> = {};
    for (const variant of field.variants ?? []) {
        fields[variant.name] = variant.type === 'keyword'
            ? { type: 'keyword', ignore_above: 1024, ...(variant.normalizer ? { normalizer: variant.normalizer } : {}) }
            : { type: 'text', ...(variant.analyzer ? { analyzer: variant.analyzer } : {}) };
    }
    const multiFields = Object.keys(fields).length > 0 ? { fields } : {};

    switch (field.type) {
        case 'text':
            return { type: 'text', ...(field.analyzer ? { analyzer: field.analyzer } : {}), ...multiFields };
        case 'keyword':
            return { type: 'keyword', ...(field.normalizer ? { normalizer: field.normalizer } : {}), ...multiFields };
        case 'date':
            return { type: 'date', ...(field.format ? { format: field.format } : {}) };
        case 'integer':
            return { type: 'integer' };
        case 'long':
            return { type: 'long' };
        case 'boolean':
            return { type: 'boolean' };
        case 'object':
            return { type: 'object', properties: {} };
        case 'nested':
            return { type: 'nested', properties: {} };
    }
}

/**
 * Append every scalar found at `segments` below `value`, descending through
 * arrays (nested authors, secondary classifications).
 */
function collectValues(value: unknown, segments: string[], out: string[]): void {
    if (value === undefined || value === null) return;

    if (Array.isArray(value)) {
        for (const item of value) collectValues(item, segments, out);
        return;
    }

    const [head, ...rest] = segments;
    if (head === undefined) {
        if (typeof value === 'string') {
            if (value.length > 0) out.push(value);
        } else if (typeof value === 'number' || typeof value === 'boolean') {
            out.push(String(value));
        }
        return;
    }

    if (typeof value === 'object') {
        const next: unknown = Reflect.get(value, head);
        collectValues(next, rest, out);
    }
}

/**
 * Registry over the bundled taxonomy.
 */
export function createSchemaRegistry(taxonomy: Taxonomy = loadTaxonomy()): SchemaRegistry {
    return new SchemaRegistry(taxonomy);
}
