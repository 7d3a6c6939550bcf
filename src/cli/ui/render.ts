import chalk from 'chalk';
import type { Finding, Severity } from '../../validation/types.js';
import type { ValidationReport } from '../../validation/report.js';

const SEPARATOR_WIDTH = 60;

const SEVERITY_LABELS: Record<Severity, string> = {
    error: '✗ ERROR',
    warning: '⚠ WARNING',
    info: 'ℹ INFO',
};

const GROUP_TITLES: Array<{ severity: Severity; title: string }> = [
    { severity: 'error', title: 'ERRORS:' },
    { severity: 'warning', title: 'WARNINGS:' },
    { severity: 'info', title: 'INFO:' },
];

function colorFor(severity: Severity): (text: string) => string {
    switch (severity) {
        case 'error': return chalk.red;
        case 'warning': return chalk.yellow;
        case 'info': return chalk.cyan;
    }
}

/**
 * One finding as a single line, e.g. `✗ ERROR [package.json]: Invalid JSON format`
 */
export function formatFinding(finding: Finding): string {
    const label = colorFor(finding.severity)(SEVERITY_LABELS[finding.severity]);
    const scope = finding.file ? ` [${finding.file}]` : '';
    return `${label}${scope}: ${finding.message}`;
}

/**
 * Report grouped by severity, followed by counts and the verdict.
 * Findings keep their report order inside each group.
 */
export function formatReport(report: ValidationReport): string[] {
    if (report.size === 0) {
        return [chalk.green('✓ Validation passed! No issues found.')];
    }

    const lines: string[] = [];
    for (const group of GROUP_TITLES) {
        const findings = report.bySeverity(group.severity);
        if (findings.length === 0) continue;

        lines.push('', chalk.bold(group.title));
        for (const finding of findings) {
            lines.push(`  ${formatFinding(finding)}`);
        }
    }

    const counts = report.counts();
    lines.push(
        '',
        chalk.dim('═'.repeat(SEPARATOR_WIDTH)),
        `Errors: ${counts.errors} | Warnings: ${counts.warnings} | Info: ${counts.infos}`,
        '',
    );

    if (!report.passed) {
        lines.push(chalk.red.bold('✗ Validation FAILED - fix errors before packaging'));
    } else if (counts.warnings > 0) {
        lines.push(chalk.yellow('⚠ Validation passed with warnings'));
    } else {
        lines.push(chalk.green('✓ Validation passed'));
    }

    return lines;
}

export function renderReport(report: ValidationReport): void {
    for (const line of formatReport(report)) {
        console.log(line);
    }
}

/**
 * Render a section heading with a rule underneath
 */
export function renderHeading(title: string): void {
    console.log(chalk.bold(title));
    console.log(chalk.dim('═'.repeat(SEPARATOR_WIDTH)));
}

/**
 * Render a numbered list of follow-up steps
 */
export function renderSteps(title: string, steps: string[]): void {
    console.log();
    renderHeading(title);
    for (const step of steps) {
        console.log(chalk.dim(`  ${step}`));
    }
    console.log();
}

export function renderError(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
}

export function renderSuccess(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
}

/**
 * Human-readable byte size
 */
export function formatSize(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
