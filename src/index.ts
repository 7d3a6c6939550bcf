// plugkit — Public API Surface
export { createCLI } from './cli/index.js';
export { PluginValidator, validatePlugin } from './validation/validator.js';
export { ValidationReport } from './validation/report.js';
export { detectComponents, componentKinds } from './validation/detector.js';
export { parseFrontmatter, extractSkillMetadata } from './validation/frontmatter.js';
export { createPlugin } from './scaffold/creator.js';
export { PLUGIN_TYPES, PLUGIN_TYPE_INFO } from './scaffold/types.js';
export { createPackage, collectPackageFiles, archivePathFor } from './packaging/packager.js';
export { DEFAULT_EXCLUDE_PATTERNS, shouldExclude } from './packaging/exclude.js';
export { ConfigLoader, ConfigError } from './config/loader.js';
export { formatReport, formatFinding } from './cli/ui/render.js';

// Types
export type { Finding, Severity, ComponentPresence, ComponentKind, ValidationStage } from './validation/types.js';
export type { ParsedFrontmatter, SkillMetadata } from './validation/frontmatter.js';
export type { PluginType, CreatePluginOptions, CreatePluginResult } from './scaffold/types.js';
export type { PackageOptions, PackageResult } from './packaging/types.js';
export type { PlugkitConfig } from './config/schema.js';
