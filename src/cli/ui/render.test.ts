import { beforeAll, describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatFinding, formatReport, formatSize } from './render.js';
import { ValidationReport } from '../../validation/report.js';

beforeAll(() => {
    chalk.level = 0;
});

describe('formatFinding', () => {
    it('includes the file when present', () => {
        expect(formatFinding({ severity: 'error', message: 'Invalid JSON format', file: 'package.json' }))
            .toBe('✗ ERROR [package.json]: Invalid JSON format');
        expect(formatFinding({ severity: 'info', message: 'No command files found' }))
            .toBe('ℹ INFO: No command files found');
    });
});

describe('formatReport', () => {
    it('prints a single line for a clean report', () => {
        expect(formatReport(new ValidationReport().freeze())).toEqual(['✓ Validation passed! No issues found.']);
    });

    it('groups by severity and keeps report order within groups', () => {
        const report = new ValidationReport();
        report.info('first info');
        report.error('first error', 'SKILL.md');
        report.warning('a warning');
        report.error('second error');

        expect(formatReport(report.freeze())).toEqual([
            '',
            'ERRORS:',
            '  ✗ ERROR [SKILL.md]: first error',
            '  ✗ ERROR: second error',
            '',
            'WARNINGS:',
            '  ⚠ WARNING: a warning',
            '',
            'INFO:',
            '  ℹ INFO: first info',
            '',
            '═'.repeat(60),
            'Errors: 2 | Warnings: 1 | Info: 1',
            '',
            '✗ Validation FAILED - fix errors before packaging',
        ]);
    });

    it('says when a report passed with warnings', () => {
        const report = new ValidationReport();
        report.warning('Missing README.md');
        const lines = formatReport(report.freeze());
        expect(lines[lines.length - 1]).toBe('⚠ Validation passed with warnings');
    });

    it('says when a report passed with info only', () => {
        const report = new ValidationReport();
        report.info('No command files found');
        const lines = formatReport(report.freeze());
        expect(lines[lines.length - 1]).toBe('✓ Validation passed');
    });
});

describe('formatSize', () => {
    it('picks a unit', () => {
        expect(formatSize(512)).toBe('512 B');
        expect(formatSize(2048)).toBe('2.0 KB');
        expect(formatSize(3 * 1024 * 1024)).toBe('3.00 MB');
    });
});
