/**
 * Typesense Schema for stored knowledge objects
 *
 * Every storage key is one document. `dirs` lists each directory above the
 * key, so listing a directory is an exact-match filter.
 */

import { CollectionCreateSchema } from 'typesense/lib/Typesense/Collections';

export const KNOWLEDGE_OBJECTS_COLLECTION = 'knowledge_objects';

export const knowledgeObjectsSchema: CollectionCreateSchema = {
    name: KNOWLEDGE_OBJECTS_COLLECTION,
    fields: [
        { name: 'key', type: 'string', facet: false, index: true },
        { name: 'dirs', type: 'string[]', facet: true, index: true },
        // Stored only; YAML records are never searched.
        { name: 'value', type: 'string', facet: false, index: false, optional: true },
        { name: 'updated_at', type: 'int64', facet: false, index: true },
    ],
    default_sorting_field: 'updated_at',
};

export type KnowledgeObjectDocument = {
    /** Digest of the key; keys contain characters document ids may not */
    id: string;
    key: string;
    dirs: string[];
    value: string;
    updated_at: number;
};

/**
 * "v1/relation/refs/a+b/x.txt" -> ["v1", "v1/relation", "v1/relation/refs", "v1/relation/refs/a+b"]
 */
export function keyDirectories(key: string): string[] {
    const segments = key.split('/').slice(0, -1);
    return segments.map((_, index) => segments.slice(0, index + 1).join('/'));
}
