/**
 * Exclusion patterns for packaging
 *
 * A pattern is matched against every segment of a path relative to the
 * plugin root. `*suffix` matches a segment ending in `suffix`; anything
 * else must equal the segment exactly.
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
    // Version control
    '.git',
    '.gitignore',
    // Dependencies
    'node_modules',
    '__pycache__',
    '*.pyc',
    '.pytest_cache',
    // Build artifacts
    'dist',
    'build',
    '.tsbuildinfo',
    // Editors
    '.vscode',
    '.idea',
    '*.swp',
    // OS
    '.DS_Store',
    'Thumbs.db',
    // Temporary
    '*.tmp',
    '*.log',
];

export function matchesSegment(segment: string, pattern: string): boolean {
    if (pattern.startsWith('*')) {
        return segment.endsWith(pattern.slice(1));
    }
    return segment === pattern;
}

/**
 * Whether a `/`-separated relative path falls under any pattern
 */
export function shouldExclude(relativePath: string, patterns: readonly string[] = DEFAULT_EXCLUDE_PATTERNS): boolean {
    const segments = relativePath.split('/').filter(Boolean);
    return segments.some(segment => patterns.some(pattern => matchesSegment(segment, pattern)));
}
