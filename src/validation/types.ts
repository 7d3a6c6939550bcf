/**
 * Validation Engine — Types
 *
 * A validation run inspects one plugin directory and produces an ordered
 * list of findings. Severity is a tag on the finding, not an exception:
 * validation keeps going after anything short of a terminal error.
 */

// ─── Severity ───

export type Severity = 'error' | 'warning' | 'info';

// ─── Finding ───

export interface Finding {
    readonly severity: Severity;
    readonly message: string;
    /** Artifact path relative to the plugin root, `/`-separated */
    readonly file?: string;
}

// ─── Components ───

export type ComponentKind = 'mcp-server' | 'skill' | 'commands';

/**
 * Which components a plugin directory contains, by marker presence only
 */
export interface ComponentPresence {
    readonly hasMcp: boolean;
    readonly hasSkill: boolean;
    readonly hasCommands: boolean;
}

// ─── Orchestrator stages ───

export type ValidationStage =
    | 'start'
    | 'path-checked'
    | 'components-detected'
    | 'components-validated'
    | 'docs-validated'
    | 'done';
