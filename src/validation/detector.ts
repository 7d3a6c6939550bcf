import path from 'node:path';
import type { ComponentKind, ComponentPresence } from './types.js';
import { listMarkdownFiles, pathExists } from '../utils/fs.js';

/** Any of these marks an MCP server (TypeScript or Python, or a pre-merged one) */
export const MCP_MARKERS = [
    'package.json',
    'pyproject.toml',
    path.join('src', 'index.ts'),
    path.join('app', 'main.py'),
    'mcp-server',
];

/** Skill document locations, in lookup order */
export const SKILL_LOCATIONS = [
    'SKILL.md',
    path.join('skill', 'SKILL.md'),
];

export const COMMANDS_DIR = 'commands';

/**
 * Component Detector — decides which components a plugin has
 *
 * Detection only looks at whether marker paths exist. It never reads file
 * contents, so a detected component may still fail all of its checks.
 */
export function detectComponents(pluginRoot: string): ComponentPresence {
    return {
        hasMcp: hasMcpServer(pluginRoot),
        hasSkill: hasSkill(pluginRoot),
        hasCommands: hasCommands(pluginRoot),
    };
}

export function hasMcpServer(pluginRoot: string): boolean {
    return MCP_MARKERS.some(marker => pathExists(path.join(pluginRoot, marker)));
}

export function hasSkill(pluginRoot: string): boolean {
    return SKILL_LOCATIONS.some(location => pathExists(path.join(pluginRoot, location)));
}

/**
 * A `commands/` entry, or more than one root markdown file.
 * A single markdown file is taken to be the README.
 */
export function hasCommands(pluginRoot: string): boolean {
    if (pathExists(path.join(pluginRoot, COMMANDS_DIR))) return true;
    return listMarkdownFiles(pluginRoot).length > 1;
}

export function anyComponent(presence: ComponentPresence): boolean {
    return presence.hasMcp || presence.hasSkill || presence.hasCommands;
}

/**
 * Detected components as names, in validation order
 */
export function componentKinds(presence: ComponentPresence): ComponentKind[] {
    const kinds: ComponentKind[] = [];
    if (presence.hasMcp) kinds.push('mcp-server');
    if (presence.hasSkill) kinds.push('skill');
    if (presence.hasCommands) kinds.push('commands');
    return kinds;
}
