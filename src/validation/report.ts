import type { Finding, Severity } from './types.js';

export interface SeverityCounts {
    errors: number;
    warnings: number;
    infos: number;
}

/**
 * Validation Report — ordered findings from a single run
 *
 * Validators append to the report while the run is in progress; the
 * orchestrator freezes it before handing it back. Findings keep insertion
 * order, the severity views are filters over that order.
 */
export class ValidationReport {
    private readonly items: Finding[] = [];
    private frozen = false;

    /**
     * Append a finding
     */
    add(severity: Severity, message: string, file?: string): void {
        if (this.frozen) {
            throw new Error('Cannot add findings to a frozen validation report');
        }
        const finding: Finding = file === undefined
            ? { severity, message }
            : { severity, message, file };
        this.items.push(Object.freeze(finding));
    }

    error(message: string, file?: string): void {
        this.add('error', message, file);
    }

    warning(message: string, file?: string): void {
        this.add('warning', message, file);
    }

    info(message: string, file?: string): void {
        this.add('info', message, file);
    }

    /**
     * Stop accepting findings. Returns the report for chaining.
     */
    freeze(): this {
        this.frozen = true;
        return this;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /**
     * All findings in insertion order
     */
    get findings(): readonly Finding[] {
        return this.items;
    }

    /**
     * Findings of one severity, in insertion order
     */
    bySeverity(severity: Severity): Finding[] {
        return this.items.filter(f => f.severity === severity);
    }

    get errors(): Finding[] {
        return this.bySeverity('error');
    }

    get warnings(): Finding[] {
        return this.bySeverity('warning');
    }

    get infos(): Finding[] {
        return this.bySeverity('info');
    }

    /**
     * A report passes when it holds no error; warnings and info never fail it
     */
    get passed(): boolean {
        return !this.items.some(f => f.severity === 'error');
    }

    counts(): SeverityCounts {
        return {
            errors: this.errors.length,
            warnings: this.warnings.length,
            infos: this.infos.length,
        };
    }

    get size(): number {
        return this.items.length;
    }
}
