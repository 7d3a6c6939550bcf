/**
 * Scaffolding — Types
 */

export const PLUGIN_TYPES = ['mcp-ts', 'mcp-py', 'skill', 'command', 'full'] as const;

export type PluginType = typeof PLUGIN_TYPES[number];

export interface PluginTypeInfo {
    /** Human-readable label */
    label: string;
    /** Template directory under the templates root */
    template: string;
}

export const PLUGIN_TYPE_INFO: Record<PluginType, PluginTypeInfo> = {
    'mcp-ts': { label: 'MCP Server (TypeScript)', template: 'mcp-server-typescript' },
    'mcp-py': { label: 'MCP Server (Python)', template: 'mcp-server-python' },
    'skill': { label: 'Skill', template: 'skill' },
    'command': { label: 'Slash Command', template: 'slash-command' },
    'full': { label: 'Full Plugin (MCP + Skill + Commands)', template: 'full-plugin' },
};

export interface CreatePluginOptions {
    /** Plugin directory name */
    name: string;
    type: PluginType;
    /** Parent directory for the new plugin (defaults to cwd) */
    outputDir?: string;
    /** Templates root (defaults to the bundled templates) */
    templatesDir?: string;
}

export type CreatePluginResult =
    | { success: true; pluginPath: string; template: string; nextSteps: string[] }
    | { success: false; error: string };
