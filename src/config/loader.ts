import { readFileSync } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_FILENAMES, PlugkitConfigSchema, type PlugkitConfig } from './schema.js';
import { errorMessage } from '../utils/errors.js';
import { isFile } from '../utils/fs.js';

export class ConfigError extends Error {
    constructor(readonly configPath: string, detail: string) {
        super(`Invalid config at ${configPath}: ${detail}`);
        this.name = 'ConfigError';
    }
}

/**
 * Config Loader — reads plugkit.config.yaml from the working directory
 *
 * A missing file yields the defaults. Relative paths in the file are
 * resolved against the directory the file lives in.
 */
export class ConfigLoader {
    constructor(private readonly workDir: string = process.cwd()) {}

    /**
     * Path of the config file in use, if any
     */
    find(): string | undefined {
        return CONFIG_FILENAMES
            .map(name => path.join(this.workDir, name))
            .find(candidate => isFile(candidate));
    }

    load(): PlugkitConfig {
        const configPath = this.find();
        if (!configPath) {
            return this.resolvePaths(PlugkitConfigSchema.parse({}));
        }

        let raw: unknown;
        try {
            raw = parseYaml(readFileSync(configPath, 'utf-8'));
        } catch (err) {
            throw new ConfigError(configPath, errorMessage(err));
        }

        // An empty file parses to null
        const result = PlugkitConfigSchema.safeParse(raw ?? {});
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
            throw new ConfigError(configPath, `${where}${issue.message}`);
        }

        return this.resolvePaths(result.data);
    }

    private resolvePaths(config: PlugkitConfig): PlugkitConfig {
        return {
            ...config,
            templatesDir: config.templatesDir !== undefined
                ? path.resolve(this.workDir, config.templatesDir)
                : undefined,
            package: {
                ...config.package,
                outputDir: path.resolve(this.workDir, config.package.outputDir),
            },
        };
    }
}
