/**
 * @file Storage Boundary Type Definitions
 *
 * Everything the pipeline reads or writes (sequence documents, the
 * content corpus, archive records) goes through this interface. The
 * filesystem backend serves the CLI; the memory backend serves tests.
 *
 * Paths are `/`-separated. Methods follow the project's subject_verb
 * naming convention.
 *
 * @module store
 */

export interface StorageBackend {
    /** Write data to a path. Creates parent directories as needed. */
    artifact_write(path: string, data: string): Promise<void>;

    /** Append data to a path, creating the file (and parents) if absent. */
    artifact_append(path: string, data: string): Promise<void>;

    /** Read data from a path. Returns null if the path is not a file. */
    artifact_read(path: string): Promise<string | null>;

    /** Check whether a path exists. */
    path_exists(path: string): Promise<boolean>;

    /** List immediate children of a directory. Returns names, not full paths. */
    children_list(path: string): Promise<string[]>;

    /** Create a directory (and parents). No-op if it already exists. */
    dir_create(path: string): Promise<void>;
}

/**
 * Join path segments with `/`, collapsing duplicate separators.
 */
export function path_join(...segments: string[]): string {
    const joined: string = segments
        .filter((segment: string): boolean => segment !== '')
        .join('/')
        .replace(/\/{2,}/g, '/');
    return joined.length > 1 ? joined.replace(/\/$/, '') : joined;
}

/**
 * Parent directory of a path, or '' for a bare name.
 */
export function path_parent(path: string): string {
    const slash: number = path.lastIndexOf('/');
    if (slash < 0) return '';
    return slash === 0 ? '/' : path.slice(0, slash);
}
