import { Command, Option } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { ConfigLoader } from '../../config/loader.js';
import { createPlugin, isPluginType } from '../../scaffold/creator.js';
import { PLUGIN_TYPES, PLUGIN_TYPE_INFO, type PluginType } from '../../scaffold/types.js';
import { errorMessage } from '../../utils/errors.js';
import { renderError, renderSteps, renderSuccess } from '../ui/render.js';

interface InitOptions {
    type?: string;
    output?: string;
}

/**
 * Ask for a plugin type when none was given on the command line
 */
async function promptForType(): Promise<PluginType> {
    const { default: inquirer } = await import('inquirer');
    const answers = await inquirer.prompt<{ type: PluginType }>([
        {
            type: 'list',
            name: 'type',
            message: 'Select the plugin type:',
            choices: PLUGIN_TYPES.map(type => ({ name: `${PLUGIN_TYPE_INFO[type].label} (${type})`, value: type })),
            default: 'skill',
        },
    ]);
    return answers.type;
}

/**
 * Scaffold a plugin. Returns the process exit code.
 */
export async function runInit(name: string, opts: InitOptions): Promise<number> {
    let type: PluginType;
    if (opts.type === undefined) {
        type = await promptForType();
    } else if (isPluginType(opts.type)) {
        type = opts.type;
    } else {
        renderError(`Unknown plugin type: ${opts.type}`);
        return 1;
    }

    let templatesDir: string | undefined;
    try {
        templatesDir = new ConfigLoader().load().templatesDir;
    } catch (err) {
        renderError(errorMessage(err));
        return 1;
    }

    console.log(chalk.bold.cyan(`\n▶ Creating ${PLUGIN_TYPE_INFO[type].label} plugin: ${name}\n`));

    const result = createPlugin({ name, type, outputDir: opts.output, templatesDir });
    if (!result.success) {
        renderError(result.error);
        return 1;
    }

    console.log(chalk.dim(`  Template: ${result.template}`));
    renderSuccess(`Plugin created: ${path.relative(process.cwd(), result.pluginPath) || result.pluginPath}`);
    renderSteps('NEXT STEPS', result.nextSteps);
    return 0;
}

export function createInitCommand(): Command {
    return new Command('init')
        .description('Create a new plugin from a template')
        .argument('<name>', 'Plugin name (used as the directory name)')
        .addOption(new Option('-t, --type <type>', 'Plugin type').choices([...PLUGIN_TYPES]))
        .option('-o, --output <dir>', 'Parent directory (default: current directory)')
        .action(async (name: string, opts: InitOptions) => {
            const code = await runInit(name, opts);
            if (code !== 0) process.exit(code);
        });
}
