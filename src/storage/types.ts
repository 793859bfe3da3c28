/**
 * Key-value storage backends. Values are text: YAML records or empty markers.
 */

export type StorageWrite = { readonly op: 'put'; readonly key: string; readonly value: string } | { readonly op: 'delete'; readonly key: string };

export interface StorageBackend {
    readonly name: string;

    /** null when the key does not exist */
    get(key: string): Promise<string | null>;
    put(key: string, value: string): Promise<void>;
    /** Deleting a missing key is not an error */
    delete(key: string): Promise<void>;
    /** Keys starting with `prefix`, sorted */
    list(prefix: string): Promise<string[]>;
    /** Apply writes in order; each individual write is atomic */
    commit(writes: readonly StorageWrite[]): Promise<void>;
}
