import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { readFileSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { runValidate } from './validate.js';
import { runPackage } from './package.js';
import { runInit } from './init.js';
import { cleanupTempDirs, createPlugin, createTempDir, GOOD_COMMAND, GOOD_README } from '../../__tests__/helpers.js';

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
    cleanupTempDirs();
});

const exists = (p: string): boolean => statSync(p, { throwIfNoEntry: false }) !== undefined;

describe('runValidate', () => {
    it('exits 0 for a passing plugin', () => {
        expect(runValidate(createPlugin({ 'commands/a.md': GOOD_COMMAND, 'README.md': GOOD_README }))).toBe(0);
    });

    it('exits 1 for a failing plugin', () => {
        expect(runValidate(createPlugin({ 'README.md': GOOD_README }))).toBe(1);
    });

    it('exits 1 for a missing path', () => {
        expect(runValidate(path.join(createTempDir(), 'missing'))).toBe(1);
    });
});

describe('runPackage', () => {
    it('writes an archive for a passing plugin', async () => {
        const root = createPlugin({ 'commands/a.md': GOOD_COMMAND }, 'cmds');
        const output = createTempDir();

        expect(await runPackage(root, { output })).toBe(0);
        expect(exists(path.join(output, 'cmds.zip'))).toBe(true);
    });

    it('exits 1 without an archive when validation fails', async () => {
        const root = createPlugin({ 'commands/a.md': 'no prompt' }, 'bad');
        const output = createTempDir();

        expect(await runPackage(root, { output })).toBe(1);
        expect(exists(path.join(output, 'bad.zip'))).toBe(false);
    });

    it('packages a failing plugin when validation is skipped', async () => {
        const root = createPlugin({ 'commands/a.md': 'no prompt' }, 'bad');
        const output = createTempDir();

        expect(await runPackage(root, { output, skipValidation: true })).toBe(0);
        expect(exists(path.join(output, 'bad.zip'))).toBe(true);
    });

    it('keeps an existing archive when overwrite is declined', async () => {
        const root = createPlugin({ 'commands/a.md': GOOD_COMMAND }, 'cmds');
        const output = createTempDir();
        const archive = path.join(output, 'cmds.zip');
        writeFileSync(archive, 'old');
        const confirm = vi.fn(async () => false);

        expect(await runPackage(root, { output }, confirm)).toBe(1);
        expect(confirm).toHaveBeenCalledWith(archive);
        expect(readFileSync(archive, 'utf-8')).toBe('old');
    });

    it('does not ask about overwriting when validation fails', async () => {
        const root = createPlugin({ 'commands/a.md': 'no prompt' }, 'bad');
        const output = createTempDir();
        const archive = path.join(output, 'bad.zip');
        writeFileSync(archive, 'old');
        const confirm = vi.fn(async () => true);

        expect(await runPackage(root, { output }, confirm)).toBe(1);
        expect(confirm).not.toHaveBeenCalled();
        expect(readFileSync(archive, 'utf-8')).toBe('old');
    });

    it('replaces an existing archive with --force without asking', async () => {
        const root = createPlugin({ 'commands/a.md': GOOD_COMMAND }, 'cmds');
        const output = createTempDir();
        const archive = path.join(output, 'cmds.zip');
        writeFileSync(archive, 'old');
        const confirm = vi.fn(async () => false);

        expect(await runPackage(root, { output, force: true }, confirm)).toBe(0);
        expect(confirm).not.toHaveBeenCalled();
        expect(readFileSync(archive, 'utf-8')).not.toBe('old');
    });
});

describe('runInit', () => {
    it('scaffolds the requested type', async () => {
        const output = createTempDir();
        expect(await runInit('notes-skill', { type: 'skill', output })).toBe(0);
        expect(exists(path.join(output, 'notes-skill', 'SKILL.md'))).toBe(true);
    });

    it('exits 1 for an unknown type', async () => {
        expect(await runInit('x', { type: 'widget', output: createTempDir() })).toBe(1);
    });

    it('exits 1 when the directory already exists', async () => {
        const output = createTempDir();
        expect(await runInit('twice', { type: 'command', output })).toBe(0);
        expect(await runInit('twice', { type: 'command', output })).toBe(1);
    });
});
