import { readdirSync, statSync, type Dirent, type Stats } from 'node:fs';
import path from 'node:path';

/**
 * Stat a path, following symlinks. Returns undefined when nothing is there,
 * including when a parent segment is a regular file.
 */
export function statPath(p: string): Stats | undefined {
    try {
        return statSync(p, { throwIfNoEntry: false });
    } catch (err) {
        if (err instanceof Error && 'code' in err && (err.code === 'ENOTDIR' || err.code === 'ENOENT')) {
            return undefined;
        }
        throw err;
    }
}

/**
 * Check whether a path exists (file, directory, or anything else)
 */
export function pathExists(p: string): boolean {
    return statPath(p) !== undefined;
}

/**
 * Check if a path exists and is a directory
 */
export function isDirectory(p: string): boolean {
    return statPath(p)?.isDirectory() ?? false;
}

/**
 * Check if a path exists and is a regular file
 */
export function isFile(p: string): boolean {
    return statPath(p)?.isFile() ?? false;
}

/**
 * Whether a directory entry is a regular file, or a symlink to one
 */
export function isFileEntry(dir: string, entry: Dirent): boolean {
    if (entry.isFile()) return true;
    return entry.isSymbolicLink() && isFile(path.join(dir, entry.name));
}

/**
 * Markdown files directly inside `dir`, sorted by name.
 * Hidden files are skipped; the `.md` suffix is case-sensitive.
 */
export function listMarkdownFiles(dir: string): string[] {
    if (!isDirectory(dir)) return [];

    return readdirSync(dir, { withFileTypes: true })
        .filter(entry => !entry.name.startsWith('.') && entry.name.endsWith('.md') && isFileEntry(dir, entry))
        .map(entry => entry.name)
        .sort();
}

/**
 * Path of `target` relative to `root`, always with `/` separators
 */
export function toPosixRelative(root: string, target: string): string {
    return path.relative(root, target).split(path.sep).join('/');
}
