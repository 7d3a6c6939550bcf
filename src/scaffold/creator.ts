import { copyFileSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import {
    PLUGIN_TYPES,
    PLUGIN_TYPE_INFO,
    type CreatePluginOptions,
    type CreatePluginResult,
    type PluginType,
} from './types.js';
import { nextStepsFor } from './next-steps.js';
import { errorMessage } from '../utils/errors.js';
import { isDirectory, isFile, pathExists } from '../utils/fs.js';
import { getTemplatesDir } from '../utils/paths.js';

export const NAME_PLACEHOLDER = '{{PLUGIN_NAME}}';

/** Files whose contents get the placeholder replaced; everything else is copied as bytes */
const TEXT_EXTENSIONS = new Set(['.md', '.json', '.toml', '.ts', '.py', '.txt']);

const CreatePluginOptionsSchema = z.object({
    name: z.string()
        .min(1, 'Plugin name is required')
        .refine(name => name !== '.' && name !== '..' && !/[\\/]/.test(name), {
            message: 'Plugin name must be a single directory name',
        }),
    type: z.enum(PLUGIN_TYPES),
    outputDir: z.string().optional(),
    templatesDir: z.string().optional(),
});

/**
 * Create a plugin directory from a template
 */
export function createPlugin(options: CreatePluginOptions): CreatePluginResult {
    const parsed = CreatePluginOptionsSchema.safeParse(options);
    if (!parsed.success) {
        return { success: false, error: parsed.error.issues[0].message };
    }
    const { name, type } = parsed.data;

    const outputDir = path.resolve(parsed.data.outputDir ?? process.cwd());
    const pluginPath = path.join(outputDir, name);
    if (pathExists(pluginPath)) {
        return { success: false, error: `Directory already exists: ${pluginPath}` };
    }

    const templatesDir = path.resolve(parsed.data.templatesDir ?? getTemplatesDir());
    if (!isDirectory(templatesDir)) {
        return { success: false, error: `Templates directory not found: ${templatesDir}` };
    }

    const template = PLUGIN_TYPE_INFO[type].template;
    const templatePath = path.join(templatesDir, template);
    if (!isDirectory(templatePath)) {
        return { success: false, error: `Template not found: ${templatePath}` };
    }

    try {
        if (type === 'full') {
            assembleFullPlugin(templatesDir, pluginPath, name);
        } else {
            copyTemplate(templatePath, pluginPath, name);
        }
    } catch (err) {
        return { success: false, error: `Error creating plugin: ${errorMessage(err)}` };
    }

    return { success: true, pluginPath, template, nextSteps: nextStepsFor(type, name) };
}

/**
 * A full plugin combines every component template in one directory
 */
function assembleFullPlugin(templatesDir: string, pluginPath: string, name: string): void {
    const parts: Array<{ from: string; to: string }> = [
        { from: PLUGIN_TYPE_INFO['mcp-ts'].template, to: 'mcp-server-typescript' },
        { from: PLUGIN_TYPE_INFO['mcp-py'].template, to: 'mcp-server-python' },
        { from: PLUGIN_TYPE_INFO.skill.template, to: 'skill' },
        { from: path.join(PLUGIN_TYPE_INFO.command.template, 'commands'), to: 'commands' },
    ];

    mkdirSync(pluginPath, { recursive: true });

    for (const part of parts) {
        const source = path.join(templatesDir, part.from);
        if (!isDirectory(source)) {
            throw new Error(`Template not found: ${source}`);
        }
        copyTemplate(source, path.join(pluginPath, part.to), name);
    }

    const readme = path.join(templatesDir, PLUGIN_TYPE_INFO.full.template, 'README.md');
    if (!isFile(readme)) {
        throw new Error(`Template not found: ${readme}`);
    }
    copyTemplateFile(readme, path.join(pluginPath, 'README.md'), name);
}

/**
 * Recursively copy a template directory, filling in the plugin name
 */
export function copyTemplate(source: string, destination: string, name: string): void {
    mkdirSync(destination, { recursive: true });

    for (const entry of readdirSync(source, { withFileTypes: true })) {
        const from = path.join(source, entry.name);
        const to = path.join(destination, entry.name);

        if (entry.isDirectory()) {
            copyTemplate(from, to, name);
        } else if (entry.isFile()) {
            copyTemplateFile(from, to, name);
        }
    }
}

function copyTemplateFile(from: string, to: string, name: string): void {
    if (!TEXT_EXTENSIONS.has(path.extname(from).toLowerCase())) {
        copyFileSync(from, to);
        return;
    }
    const content = readFileSync(from, 'utf-8');
    writeFileSync(to, content.split(NAME_PLACEHOLDER).join(name), 'utf-8');
}

export function isPluginType(value: string): value is PluginType {
    return PLUGIN_TYPES.some(type => type === value);
}
