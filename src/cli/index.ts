import { readFileSync } from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';
import { getPackageRoot } from '../utils/paths.js';
import { createInitCommand } from './commands/init.js';
import { createValidateCommand } from './commands/validate.js';
import { createPackageCommand } from './commands/package.js';
import { createTypesCommand } from './commands/types-cmd.js';

const PackageVersionSchema = z.object({ version: z.string() });

function readVersion(): string {
    const raw = readFileSync(path.join(getPackageRoot(), 'package.json'), 'utf-8');
    return PackageVersionSchema.parse(JSON.parse(raw)).version;
}

/**
 * Build the plugkit command tree
 */
export function createCLI(): Command {
    const program = new Command('plugkit')
        .description('Scaffold, validate, and package plugins (MCP servers, skills, slash commands)')
        .version(readVersion());

    program.addCommand(createInitCommand());
    program.addCommand(createValidateCommand());
    program.addCommand(createPackageCommand());
    program.addCommand(createTypesCommand());

    return program;
}
