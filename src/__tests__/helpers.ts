import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

const created: string[] = [];

/**
 * Fresh directory under the OS temp dir, removed by `cleanupTempDirs`
 */
export function createTempDir(prefix = 'plugkit-'): string {
    const dir = mkdtempSync(path.join(tmpdir(), prefix));
    created.push(dir);
    return dir;
}

export function cleanupTempDirs(): void {
    for (const dir of created.splice(0)) {
        rmSync(dir, { recursive: true, force: true });
    }
}

/**
 * Write files under `root`. Keys are `/`-separated relative paths; a key
 * ending in `/` creates an empty directory.
 */
export function writeTree(root: string, files: Record<string, string>): void {
    for (const [relative, content] of Object.entries(files)) {
        const target = path.join(root, ...relative.split('/'));
        if (relative.endsWith('/')) {
            mkdirSync(target, { recursive: true });
            continue;
        }
        mkdirSync(path.dirname(target), { recursive: true });
        writeFileSync(target, content, 'utf-8');
    }
}

/**
 * Temp plugin directory holding the given files
 */
export function createPlugin(files: Record<string, string>, name = 'sample-plugin'): string {
    const root = path.join(createTempDir(), name);
    mkdirSync(root);
    writeTree(root, files);
    return root;
}

// ─── Fixture documents ───

export const GOOD_SKILL_BODY = `
# Code Review

## Purpose

Reviews staged changes and reports defects, risky patterns, and missing tests.

## When to Use

Use before committing or when a pull request needs a first pass.
`;

export function skillDocument(frontmatter: string, body = GOOD_SKILL_BODY): string {
    return `---\n${frontmatter}\n---\n${body}`;
}

export const GOOD_SKILL = skillDocument(
    'name: code-review\ndescription: Reviews staged changes for common defects and risky patterns.'
);

export const GOOD_COMMAND = '# Deploy\n\n## Prompt\n\nDeploy the current branch to staging and report the URL.\n';

export const GOOD_README = `# Sample Plugin

Bundles tools for reviewing and deploying code.

## Installation

Copy the plugin into your plugins folder.

## Usage

Run the commands it provides.
`;

export const GOOD_PACKAGE_JSON = JSON.stringify({
    name: 'sample-server',
    version: '1.0.0',
    bin: { 'sample-server': 'dist/index.js' },
    dependencies: { '@modelcontextprotocol/sdk': '^1.0.4' },
}, null, 2);
