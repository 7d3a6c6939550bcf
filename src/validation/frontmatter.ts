/**
 * Frontmatter Parser — splits a `---` delimited header from a document
 *
 * ```markdown
 * ---
 * name: code-review
 * description: Reviews staged changes for common defects
 * ---
 * ## Purpose
 * ...
 * ```
 *
 * Fields are read with line patterns, not a YAML parser. Validators only
 * go through `parseFrontmatter` and `extractSkillMetadata`, so a structured
 * parser can replace this module without touching them.
 */

export const FRONTMATTER_DELIMITER = '---';

export interface ParsedFrontmatter {
    /** Text between the first and second delimiter */
    raw: string;
    /** Everything after the second delimiter, including later delimiters */
    body: string;
}

export type FrontmatterResult =
    | { status: 'ok'; frontmatter: ParsedFrontmatter }
    /** Document does not start with the delimiter */
    | { status: 'missing' }
    /** Opening delimiter without a closing one */
    | { status: 'malformed' };

/**
 * Split a document into frontmatter and body.
 * Splits on the delimiter at most twice; the body keeps any further ones.
 */
export function parseFrontmatter(content: string): FrontmatterResult {
    if (!content.startsWith(FRONTMATTER_DELIMITER)) {
        return { status: 'missing' };
    }

    const start = FRONTMATTER_DELIMITER.length;
    const end = content.indexOf(FRONTMATTER_DELIMITER, start);
    if (end === -1) {
        return { status: 'malformed' };
    }

    return {
        status: 'ok',
        frontmatter: {
            raw: content.slice(start, end),
            body: content.slice(end + FRONTMATTER_DELIMITER.length),
        },
    };
}

/**
 * Whether `key:` appears anywhere in the raw frontmatter
 */
export function hasField(raw: string, key: string): boolean {
    return raw.includes(`${key}:`);
}

/**
 * First value written as `key: value`, trimmed.
 * The whitespace after the colon may span a line break, in which case the
 * next non-blank line is taken as the value.
 */
export function extractField(raw: string, key: string): string | undefined {
    const match = new RegExp(`${escapeRegExp(key)}:\\s*(.+)`).exec(raw);
    return match ? match[1].trim() : undefined;
}

export interface SkillMetadata {
    hasName: boolean;
    hasDescription: boolean;
    name?: string;
    description?: string;
    body: string;
}

/**
 * Pull the fields the skill checks need out of parsed frontmatter
 */
export function extractSkillMetadata(frontmatter: ParsedFrontmatter): SkillMetadata {
    return {
        hasName: hasField(frontmatter.raw, 'name'),
        hasDescription: hasField(frontmatter.raw, 'description'),
        name: extractField(frontmatter.raw, 'name'),
        description: extractField(frontmatter.raw, 'description'),
        body: frontmatter.body,
    };
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
