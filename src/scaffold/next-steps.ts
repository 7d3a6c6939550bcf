import type { PluginType } from './types.js';

/**
 * What to do after scaffolding, per plugin type
 */
export function nextStepsFor(type: PluginType, name: string): string[] {
    switch (type) {
        case 'mcp-ts':
            return [
                `1. Install dependencies:  cd ${name} && npm install`,
                '2. Customize the server: add tools in src/index.ts, update package.json',
                '3. Build and test:        npm run build && npm start',
                '4. Register the server in your MCP client configuration',
            ];
        case 'mcp-py':
            return [
                `1. Install dependencies:  cd ${name} && pip install -e .`,
                '2. Customize the server: add tools in app/main.py, update pyproject.toml',
                '3. Test:                  python -m app.main',
                '4. Register the server in your MCP client configuration',
            ];
        case 'skill':
            return [
                `1. Edit ${name}/SKILL.md with the skill's purpose and workflow`,
                '2. Add helper scripts to scripts/ and reference material to references/',
                '3. Test the skill, then copy the directory into your skills folder',
            ];
        case 'command':
            return [
                `1. Rename ${name}/commands/example-command.md after your command`,
                '2. Write the command body under its ## Prompt section',
                '3. Copy commands/*.md into your commands folder and run /<command-name>',
            ];
        case 'full':
            return [
                `1. Pick a server language: keep ${name}/mcp-server-typescript/ or mcp-server-python/,`,
                '   delete the other, and rename the kept one to mcp-server/',
                '2. Customize each component: server tools, skill workflow, commands',
                '3. Make commands and the skill reference the server tools, then test them together',
                '4. See README.md for details',
            ];
    }
}
