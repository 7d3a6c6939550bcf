import path from 'node:path';
import type { ComponentPresence, ValidationStage } from './types.js';
import { ValidationReport } from './report.js';
import { anyComponent, detectComponents } from './detector.js';
import { validateMcpServer } from './validators/mcp.js';
import { validateSkill } from './validators/skill.js';
import { validateCommands } from './validators/commands.js';
import { validateDocumentation } from './validators/docs.js';
import { statPath } from '../utils/fs.js';

/**
 * Plugin Validator — runs every check that applies to a plugin directory
 *
 * Stages, in order:
 *   start → path-checked → components-detected → components-validated
 *         → docs-validated → done
 *
 * A missing path, a path that is not a directory, or a directory with no
 * recognizable component ends the run right away. Otherwise every detected
 * component is validated (MCP server, skill, commands), then the README.
 */
export class PluginValidator {
    readonly pluginPath: string;
    private currentStage: ValidationStage = 'start';
    private detected?: ComponentPresence;

    constructor(pluginPath: string) {
        this.pluginPath = path.resolve(pluginPath);
    }

    /**
     * Run the validation. Returns a frozen report.
     */
    validate(): ValidationReport {
        const report = new ValidationReport();
        this.currentStage = 'start';
        this.detected = undefined;

        const stats = statPath(this.pluginPath);
        if (!stats) {
            report.error(`Plugin path does not exist: ${this.pluginPath}`);
            return report.freeze();
        }
        if (!stats.isDirectory()) {
            report.error(`Plugin path is not a directory: ${this.pluginPath}`);
            return report.freeze();
        }
        this.currentStage = 'path-checked';

        const presence = detectComponents(this.pluginPath);
        if (!anyComponent(presence)) {
            report.error('No plugin components found (MCP server, skill, or commands)');
            return report.freeze();
        }
        this.detected = presence;
        this.currentStage = 'components-detected';

        if (presence.hasMcp) validateMcpServer(this.pluginPath, report);
        if (presence.hasSkill) validateSkill(this.pluginPath, report);
        if (presence.hasCommands) validateCommands(this.pluginPath, report);
        this.currentStage = 'components-validated';

        validateDocumentation(this.pluginPath, report);
        this.currentStage = 'docs-validated';

        report.freeze();
        this.currentStage = 'done';
        return report;
    }

    /**
     * Last stage the most recent run reached
     */
    get stage(): ValidationStage {
        return this.currentStage;
    }

    /**
     * Components found by the most recent run, once detection has succeeded
     */
    get presence(): ComponentPresence | undefined {
        return this.detected;
    }
}

/**
 * Validate a plugin directory in one call
 */
export function validatePlugin(pluginPath: string): ValidationReport {
    return new PluginValidator(pluginPath).validate();
}
