import type { ValidationReport } from '../validation/report.js';

export interface PackageOptions {
    /** Directory the archive is written to (defaults to cwd) */
    outputDir?: string;
    /** Package even when validation would fail */
    skipValidation?: boolean;
    /** Replace an existing archive */
    overwrite?: boolean;
    /** Patterns appended to the default exclusions */
    exclude?: string[];
}

export type PackageFailureReason =
    | 'path-missing'
    | 'not-a-directory'
    | 'validation-failed'
    | 'archive-exists'
    | 'write-failed';

export interface PackageSuccess {
    success: true;
    archivePath: string;
    /** Archived files relative to the plugin root, sorted */
    files: string[];
    sizeBytes: number;
    /** Hints about detected server components */
    notes: string[];
    /** Present when validation ran */
    report?: ValidationReport;
}

export interface PackageFailure {
    success: false;
    reason: PackageFailureReason;
    error: string;
    report?: ValidationReport;
}

export type PackageResult = PackageSuccess | PackageFailure;
