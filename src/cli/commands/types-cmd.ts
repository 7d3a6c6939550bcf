import { Command } from 'commander';
import chalk from 'chalk';
import { PLUGIN_TYPES, PLUGIN_TYPE_INFO } from '../../scaffold/types.js';

export function createTypesCommand(): Command {
    return new Command('types')
        .description('List the plugin types available to init')
        .action(() => {
            console.log(chalk.bold(`\n🧩 Plugin Types (${PLUGIN_TYPES.length})\n`));
            for (const type of PLUGIN_TYPES) {
                const info = PLUGIN_TYPE_INFO[type];
                console.log(`  ${chalk.cyan.bold(type.padEnd(8))} ${info.label} ${chalk.dim(`(${info.template})`)}`);
            }
            console.log();
        });
}
