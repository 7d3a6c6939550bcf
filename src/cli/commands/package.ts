import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigLoader } from '../../config/loader.js';
import { archivePathFor, createPackage } from '../../packaging/packager.js';
import type { PackageResult } from '../../packaging/types.js';
import { PluginValidator } from '../../validation/validator.js';
import { errorMessage } from '../../utils/errors.js';
import { pathExists } from '../../utils/fs.js';
import { formatSize, renderError, renderHeading, renderReport } from '../ui/render.js';
import { withSpinner } from '../ui/spinner.js';

export interface PackageCommandOptions {
    output?: string;
    skipValidation?: boolean;
    force?: boolean;
}

export type ConfirmOverwrite = (archivePath: string) => Promise<boolean>;

async function confirmWithPrompt(archivePath: string): Promise<boolean> {
    const { default: inquirer } = await import('inquirer');
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
        {
            type: 'confirm',
            name: 'overwrite',
            message: `Package already exists: ${archivePath}. Overwrite?`,
            default: false,
        },
    ]);
    return overwrite;
}

/**
 * Validate and package a plugin. Returns the process exit code.
 */
export async function runPackage(
    pluginPath: string,
    opts: PackageCommandOptions,
    confirmOverwrite: ConfirmOverwrite = confirmWithPrompt
): Promise<number> {
    let outputDir: string;
    let exclude: string[];
    try {
        const config = new ConfigLoader().load();
        outputDir = opts.output ?? config.package.outputDir;
        exclude = config.package.exclude;
    } catch (err) {
        renderError(errorMessage(err));
        return 1;
    }

    console.log();
    if (opts.skipValidation) {
        console.log(chalk.yellow('Skipping validation (--skip-validation specified)'));
    } else {
        renderHeading('Running validation...');
        const report = new PluginValidator(pluginPath).validate();
        renderReport(report);
        console.log();
        if (!report.passed) {
            renderError('Validation failed. Use --skip-validation to package anyway.');
            return 1;
        }
    }

    // Only a plugin that is going to be packaged gets the overwrite question
    const archivePath = archivePathFor(pluginPath, outputDir);
    let overwrite = opts.force ?? false;
    if (!overwrite && pathExists(archivePath)) {
        overwrite = await confirmOverwrite(archivePath);
        if (!overwrite) {
            console.log(chalk.dim('Packaging cancelled'));
            return 1;
        }
    }

    const result = withSpinner(
        'Packaging plugin...',
        () => createPackage(pluginPath, { outputDir, skipValidation: true, overwrite, exclude }),
        (res: PackageResult) => res.success
            ? { ok: true, text: `Package created: ${res.archivePath}` }
            : { ok: false, text: 'Packaging failed' }
    );

    if (!result.success) {
        renderError(result.error);
        return 1;
    }

    console.log(chalk.dim(`  Size:  ${formatSize(result.sizeBytes)}`));
    console.log(chalk.dim(`  Files: ${result.files.length}`));
    for (const note of result.notes) {
        console.log(chalk.cyan(`  ℹ ${note}`));
    }
    console.log();
    return 0;
}

export function createPackageCommand(): Command {
    return new Command('package')
        .description('Validate and package a plugin into a zip archive')
        .argument('<path>', 'Path to the plugin directory')
        .option('-o, --output <dir>', 'Output directory for the archive')
        .option('--skip-validation', 'Package without validating first')
        .option('-f, --force', 'Overwrite an existing archive without asking')
        .action(async (pluginPath: string, opts: PackageCommandOptions) => {
            const code = await runPackage(pluginPath, opts);
            if (code !== 0) process.exit(code);
        });
}
