import { afterEach, describe, it, expect } from 'vitest';
import { validateDocumentation } from './docs.js';
import { ValidationReport } from '../report.js';
import { cleanupTempDirs, createPlugin, GOOD_README } from '../../__tests__/helpers.js';

afterEach(cleanupTempDirs);

function run(files: Record<string, string>): ValidationReport {
    const report = new ValidationReport();
    validateDocumentation(createPlugin(files), report);
    return report;
}

describe('validateDocumentation', () => {
    it('warns once, without errors, when the README is missing', () => {
        const report = run({});
        expect(report.findings).toEqual([{ severity: 'warning', message: 'Missing README.md' }]);
        expect(report.passed).toBe(true);
    });

    it('accepts a complete README', () => {
        expect(run({ 'README.md': GOOD_README }).findings).toEqual([]);
    });

    it('warns about a short README and lists missing sections', () => {
        const report = run({ 'README.md': 'Just a line.' });
        expect(report.findings).toEqual([
            { severity: 'warning', message: 'README.md is very short', file: 'README.md' },
            { severity: 'info', message: 'README missing recommended section: # ', file: 'README.md' },
            { severity: 'info', message: 'README missing recommended section: ## Installation', file: 'README.md' },
            { severity: 'info', message: 'README missing recommended section: ## Usage', file: 'README.md' },
        ]);
    });

    it('counts a second-level heading as a title marker', () => {
        const readme = '## Installation\n\nRun the installer.\n\n## Usage\n\n' + 'Describe how to call each command. '.repeat(3);
        expect(run({ 'README.md': readme }).findings).toEqual([]);
    });
});
