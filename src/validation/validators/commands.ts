import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { ValidationReport } from '../report.js';
import { COMMANDS_DIR } from '../detector.js';
import { errorMessage } from '../../utils/errors.js';
import { isDirectory, listMarkdownFiles, pathExists } from '../../utils/fs.js';

export const PROMPT_SECTION = '## Prompt';
export const MIN_COMMAND_LENGTH = 50;

/**
 * Command files, relative to the plugin root.
 *
 * With a `commands/` directory, every markdown file directly inside it.
 * Without one, every root markdown file except the README.
 */
export function collectCommandFiles(pluginRoot: string): string[] {
    const commandsDir = path.join(pluginRoot, COMMANDS_DIR);

    if (pathExists(commandsDir)) {
        if (!isDirectory(commandsDir)) return [];
        return listMarkdownFiles(commandsDir).map(name => `${COMMANDS_DIR}/${name}`);
    }

    return listMarkdownFiles(pluginRoot).filter(name => name.toLowerCase() !== 'readme.md');
}

/**
 * Validate slash command files.
 * Each file is checked on its own; one unreadable file does not stop the rest.
 */
export function validateCommands(pluginRoot: string, report: ValidationReport): void {
    const files = collectCommandFiles(pluginRoot);

    if (files.length === 0) {
        report.info('No command files found');
        return;
    }

    for (const file of files) {
        let content: string;
        try {
            content = readFileSync(path.join(pluginRoot, file), 'utf-8');
        } catch (err) {
            report.error(`Error reading command file: ${errorMessage(err)}`, file);
            continue;
        }

        if (!content.includes(PROMPT_SECTION)) {
            report.error(`Missing ${PROMPT_SECTION} section`, file);
        }

        if (content.trim().length < MIN_COMMAND_LENGTH) {
            report.warning('Command file is very short', file);
        }
    }
}
