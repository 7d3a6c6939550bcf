import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { isFile } from './fs.js';

/**
 * Root of the installed package: the nearest directory above this module
 * that holds a package.json. Works from both `src/` and the built `dist/`.
 */
export function getPackageRoot(): string {
    let dir = path.dirname(fileURLToPath(import.meta.url));
    for (;;) {
        if (isFile(path.join(dir, 'package.json'))) return dir;
        const parent = path.dirname(dir);
        if (parent === dir) {
            throw new Error('Could not locate the plugkit package root');
        }
        dir = parent;
    }
}

/**
 * Bundled plugin templates
 */
export function getTemplatesDir(): string {
    return path.join(getPackageRoot(), 'templates');
}
