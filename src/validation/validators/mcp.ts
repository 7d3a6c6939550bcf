import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ValidationReport } from '../report.js';
import { errorMessage } from '../../utils/errors.js';
import { isDirectory, pathExists } from '../../utils/fs.js';

export const MCP_SDK_PACKAGE = '@modelcontextprotocol/sdk';

const JsonObjectSchema = z.record(z.string(), z.unknown());

/**
 * Validate MCP server components.
 * Both variants run when a plugin carries both manifests.
 */
export function validateMcpServer(pluginRoot: string, report: ValidationReport): void {
    if (pathExists(path.join(pluginRoot, 'package.json'))) {
        validateTypeScriptServer(pluginRoot, report);
    }

    if (pathExists(path.join(pluginRoot, 'pyproject.toml'))) {
        validatePythonServer(pluginRoot, report);
    }
}

// ─── TypeScript server ───

export function validateTypeScriptServer(pluginRoot: string, report: ValidationReport): void {
    const file = 'package.json';
    checkPackageManifest(path.join(pluginRoot, file), file, report);

    const srcDir = path.join(pluginRoot, 'src');
    if (!isDirectory(srcDir)) {
        report.error('Missing src/ directory');
    } else if (!pathExists(path.join(srcDir, 'index.ts'))) {
        report.warning('Missing src/index.ts entry point');
    }

    if (!pathExists(path.join(pluginRoot, 'tsconfig.json'))) {
        report.warning('Missing tsconfig.json');
    }
}

function checkPackageManifest(manifestPath: string, file: string, report: ValidationReport): void {
    let content: string;
    try {
        content = readFileSync(manifestPath, 'utf-8');
    } catch (err) {
        report.error(`Error reading package.json: ${errorMessage(err)}`, file);
        return;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch {
        report.error('Invalid JSON format', file);
        return;
    }

    const manifest = JsonObjectSchema.safeParse(parsed);
    if (!manifest.success) {
        report.error('package.json must contain a JSON object', file);
        return;
    }
    const pkg = manifest.data;

    if (!('name' in pkg)) {
        report.error("Missing 'name' in package.json", file);
    }

    if (!('version' in pkg)) {
        report.warning("Missing 'version' in package.json", file);
    }

    const deps = JsonObjectSchema.safeParse(pkg.dependencies);
    if (!deps.success || !(MCP_SDK_PACKAGE in deps.data)) {
        report.error(`Missing ${MCP_SDK_PACKAGE} dependency`, file);
    }

    if (!('bin' in pkg)) {
        report.warning("No bin entry in package.json (won't be installable globally)", file);
    }
}

// ─── Python server ───

/**
 * The project file is only scanned for substrings; it is never parsed as TOML
 */
export function validatePythonServer(pluginRoot: string, report: ValidationReport): void {
    const file = 'pyproject.toml';

    try {
        const content = readFileSync(path.join(pluginRoot, file), 'utf-8');

        if (!content.includes('[project]')) {
            report.error('Missing [project] section', file);
        }

        if (!content.includes('mcp')) {
            report.warning('MCP dependency not found in pyproject.toml', file);
        }
    } catch (err) {
        report.error(`Error reading pyproject.toml: ${errorMessage(err)}`, file);
    }

    const appDir = path.join(pluginRoot, 'app');
    if (!isDirectory(appDir)) {
        report.error('Missing app/ directory');
    } else if (!pathExists(path.join(appDir, 'main.py'))) {
        report.warning('Missing app/main.py entry point');
    }
}
