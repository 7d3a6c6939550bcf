import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { ValidationReport } from '../report.js';
import { errorMessage } from '../../utils/errors.js';
import { pathExists } from '../../utils/fs.js';

export const README_FILE = 'README.md';
export const MIN_README_LENGTH = 100;

/** Title line, installation and usage sections */
export const RECOMMENDED_README_MARKERS = ['# ', '## Installation', '## Usage'];

/**
 * Validate the plugin README. A missing README only warns.
 */
export function validateDocumentation(pluginRoot: string, report: ValidationReport): void {
    const readmePath = path.join(pluginRoot, README_FILE);

    if (!pathExists(readmePath)) {
        report.warning(`Missing ${README_FILE}`);
        return;
    }

    let content: string;
    try {
        content = readFileSync(readmePath, 'utf-8');
    } catch (err) {
        report.error(`Error reading ${README_FILE}: ${errorMessage(err)}`, README_FILE);
        return;
    }

    if (content.trim().length < MIN_README_LENGTH) {
        report.warning(`${README_FILE} is very short`, README_FILE);
    }

    for (const marker of RECOMMENDED_README_MARKERS) {
        if (!content.includes(marker)) {
            report.info(`README missing recommended section: ${marker}`, README_FILE);
        }
    }
}
