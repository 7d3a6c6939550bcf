import { mkdirSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { zipSync, type Zippable } from 'fflate';
import type { PackageOptions, PackageResult } from './types.js';
import { DEFAULT_EXCLUDE_PATTERNS, shouldExclude } from './exclude.js';
import { PluginValidator } from '../validation/validator.js';
import { errorMessage } from '../utils/errors.js';
import { isFileEntry, pathExists, statPath, toPosixRelative } from '../utils/fs.js';

const ZIP_DEFLATE_LEVEL = 6;

/**
 * Where the archive for a plugin ends up: `<outputDir>/<plugin dir name>.zip`
 */
export function archivePathFor(pluginPath: string, outputDir?: string): string {
    const name = path.basename(path.resolve(pluginPath));
    return path.join(path.resolve(outputDir ?? process.cwd()), `${name}.zip`);
}

/**
 * Files to archive, relative to the plugin root and sorted.
 * Excluded directories are not descended into. Symlinked files are
 * archived with their target's content; symlinked directories are skipped.
 */
export function collectPackageFiles(pluginRoot: string, patterns: readonly string[] = DEFAULT_EXCLUDE_PATTERNS): string[] {
    const files: string[] = [];

    const walk = (dir: string): void => {
        for (const entry of readdirSync(dir, { withFileTypes: true })) {
            const absolute = path.join(dir, entry.name);
            const relative = toPosixRelative(pluginRoot, absolute);
            if (shouldExclude(relative, patterns)) continue;

            if (entry.isDirectory()) {
                walk(absolute);
            } else if (isFileEntry(dir, entry)) {
                files.push(relative);
            }
        }
    };

    walk(pluginRoot);
    return files.sort();
}

/**
 * Package a plugin directory into a zip archive.
 *
 * Unless validation is skipped, a failing report stops packaging before
 * anything is written.
 */
export function createPackage(pluginPath: string, options: PackageOptions = {}): PackageResult {
    const pluginRoot = path.resolve(pluginPath);

    const stats = statPath(pluginRoot);
    if (!stats) {
        return { success: false, reason: 'path-missing', error: `Plugin path does not exist: ${pluginRoot}` };
    }
    if (!stats.isDirectory()) {
        return { success: false, reason: 'not-a-directory', error: `Plugin path is not a directory: ${pluginRoot}` };
    }

    const report = options.skipValidation ? undefined : new PluginValidator(pluginRoot).validate();
    if (report && !report.passed) {
        return {
            success: false,
            reason: 'validation-failed',
            error: 'Validation failed. Use --skip-validation to package anyway.',
            report,
        };
    }

    const archivePath = archivePathFor(pluginRoot, options.outputDir);
    if (pathExists(archivePath) && !options.overwrite) {
        return { success: false, reason: 'archive-exists', error: `Package already exists: ${archivePath}`, report };
    }

    const patterns = [...DEFAULT_EXCLUDE_PATTERNS, ...(options.exclude ?? [])];
    // An archive written inside the plugin must not end up in the next one
    const files = collectPackageFiles(pluginRoot, patterns)
        .filter(file => path.join(pluginRoot, file) !== archivePath);

    const name = path.basename(pluginRoot);
    const entries: Zippable = {};

    try {
        for (const file of files) {
            const absolute = path.join(pluginRoot, file);
            entries[`${name}/${file}`] = [
                readFileSync(absolute),
                { level: ZIP_DEFLATE_LEVEL, mtime: statSync(absolute).mtime },
            ];
        }

        const archive = zipSync(entries);
        mkdirSync(path.dirname(archivePath), { recursive: true });
        writeFileSync(archivePath, archive);

        return {
            success: true,
            archivePath,
            files,
            sizeBytes: archive.byteLength,
            notes: packagingNotes(pluginRoot),
            report,
        };
    } catch (err) {
        return { success: false, reason: 'write-failed', error: `Error creating package: ${errorMessage(err)}`, report };
    }
}

/**
 * Reminders for servers that users must build or install after extracting
 */
export function packagingNotes(pluginRoot: string): string[] {
    const notes: string[] = [];

    if (pathExists(path.join(pluginRoot, 'package.json'))) {
        notes.push('TypeScript MCP server detected: include build instructions in the README, or run `npm run build` before packaging');
    }

    if (pathExists(path.join(pluginRoot, 'pyproject.toml'))) {
        notes.push('Python MCP server detected: users install it with `pip install .`');
    }

    return notes;
}
