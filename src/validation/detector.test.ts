import { afterEach, describe, it, expect } from 'vitest';
import { symlinkSync } from 'node:fs';
import path from 'node:path';
import { componentKinds, detectComponents } from './detector.js';
import { cleanupTempDirs, createPlugin, createTempDir, GOOD_README, writeTree } from '../__tests__/helpers.js';

afterEach(cleanupTempDirs);

describe('detectComponents', () => {
    it('finds nothing in an empty directory', () => {
        const root = createPlugin({});
        expect(detectComponents(root)).toEqual({ hasMcp: false, hasSkill: false, hasCommands: false });
    });

    const mcpMarkers: Array<[string, Record<string, string>]> = [
        ['package.json', { 'package.json': '{}' }],
        ['pyproject.toml', { 'pyproject.toml': '' }],
        ['src/index.ts', { 'src/index.ts': '' }],
        ['app/main.py', { 'app/main.py': '' }],
        ['mcp-server/', { 'mcp-server/': '' }],
    ];

    it.each(mcpMarkers)('detects an MCP server from %s', (_marker, files) => {
        expect(detectComponents(createPlugin(files)).hasMcp).toBe(true);
    });

    it('detects a skill at the root or under skill/', () => {
        expect(detectComponents(createPlugin({ 'SKILL.md': '' })).hasSkill).toBe(true);
        expect(detectComponents(createPlugin({ 'skill/SKILL.md': '' })).hasSkill).toBe(true);
        expect(detectComponents(createPlugin({ 'skills/SKILL.md': '' })).hasSkill).toBe(false);
    });

    it('detects commands from a commands/ directory, even an empty one', () => {
        expect(detectComponents(createPlugin({ 'commands/': '' })).hasCommands).toBe(true);
    });

    it('treats a lone markdown file as the README', () => {
        const presence = detectComponents(createPlugin({ 'README.md': GOOD_README }));
        expect(presence.hasCommands).toBe(false);
    });

    it('treats two root markdown files as commands', () => {
        const presence = detectComponents(createPlugin({ 'README.md': GOOD_README, 'CHANGELOG.md': '# Changes' }));
        expect(presence.hasCommands).toBe(true);
    });

    it('ignores markdown files in subdirectories for the heuristic', () => {
        const presence = detectComponents(createPlugin({ 'README.md': '', 'docs/a.md': '', 'docs/b.md': '' }));
        expect(presence.hasCommands).toBe(false);
    });

    it('treats plain files named like marker directories as absent', () => {
        const root = createPlugin({ src: 'x', app: 'y', skill: 'z' });
        expect(detectComponents(root)).toEqual({ hasMcp: false, hasSkill: false, hasCommands: false });
    });

    it('counts symlinked root markdown files for the heuristic', () => {
        const shared = createTempDir();
        writeTree(shared, { 'deploy.md': '## Prompt\nShip it.' });
        const root = createPlugin({ 'README.md': GOOD_README });
        symlinkSync(path.join(shared, 'deploy.md'), path.join(root, 'deploy.md'));

        expect(detectComponents(root).hasCommands).toBe(true);
    });

    it('returns the same flags on repeated runs', () => {
        const root = createPlugin({ 'pyproject.toml': '', 'SKILL.md': '' });
        expect(detectComponents(root)).toEqual(detectComponents(root));
    });

    it('lists detected components in validation order', () => {
        expect(componentKinds({ hasMcp: true, hasSkill: false, hasCommands: true })).toEqual(['mcp-server', 'commands']);
    });
});
