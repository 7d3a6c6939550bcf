import { Command } from 'commander';
import chalk from 'chalk';
import { PluginValidator } from '../../validation/validator.js';
import { componentKinds } from '../../validation/detector.js';
import { renderHeading, renderReport } from '../ui/render.js';

/**
 * Validate a plugin and print the report. Returns the process exit code.
 */
export function runValidate(pluginPath: string): number {
    const validator = new PluginValidator(pluginPath);

    console.log();
    renderHeading(`Validating plugin: ${pluginPath}`);

    const report = validator.validate();

    if (validator.presence) {
        console.log(chalk.dim(`Components: ${componentKinds(validator.presence).join(', ')}`));
    }

    renderReport(report);
    console.log();

    return report.passed ? 0 : 1;
}

export function createValidateCommand(): Command {
    return new Command('validate')
        .description('Validate plugin structure, configuration, and documentation')
        .argument('<path>', 'Path to the plugin directory')
        .action((pluginPath: string) => {
            const code = runValidate(pluginPath);
            if (code !== 0) process.exit(code);
        });
}
