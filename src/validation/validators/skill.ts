import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { ValidationReport } from '../report.js';
import { SKILL_LOCATIONS } from '../detector.js';
import { extractSkillMetadata, parseFrontmatter, type SkillMetadata } from '../frontmatter.js';
import { errorMessage } from '../../utils/errors.js';
import { pathExists, toPosixRelative } from '../../utils/fs.js';

export const SKILL_NAME_PATTERN = /^[a-z0-9-]+$/;
export const MIN_DESCRIPTION_LENGTH = 20;
export const MIN_SKILL_BODY_LENGTH = 100;

const SECOND_PERSON = /\b(?:you|your)\b/i;

const RECOMMENDED_SECTIONS: ReadonlyArray<{ heading: string; label: string }> = [
    { heading: '## Purpose', label: 'Purpose section' },
    { heading: '## When to Use', label: 'When to Use section' },
];

/**
 * Find the skill document; the root location wins over `skill/`
 */
export function locateSkillDocument(pluginRoot: string): string | undefined {
    for (const location of SKILL_LOCATIONS) {
        const candidate = path.join(pluginRoot, location);
        if (pathExists(candidate)) return candidate;
    }
    return undefined;
}

/**
 * Validate the skill document: frontmatter, field conventions, body content.
 *
 * A missing document or unusable frontmatter stops the skill checks.
 * Field checks and body checks are independent of each other.
 */
export function validateSkill(pluginRoot: string, report: ValidationReport): void {
    const skillPath = locateSkillDocument(pluginRoot);
    if (!skillPath) {
        report.error('SKILL.md not found');
        return;
    }

    const file = toPosixRelative(pluginRoot, skillPath);

    let content: string;
    try {
        content = readFileSync(skillPath, 'utf-8');
    } catch (err) {
        report.error(`Error reading SKILL.md: ${errorMessage(err)}`, file);
        return;
    }

    const parsed = parseFrontmatter(content);
    if (parsed.status === 'missing') {
        report.error('Missing YAML frontmatter', file);
        return;
    }
    if (parsed.status === 'malformed') {
        report.error('Invalid YAML frontmatter format', file);
        return;
    }

    const metadata = extractSkillMetadata(parsed.frontmatter);
    checkName(metadata, file, report);
    checkDescription(metadata, file, report);
    checkBody(metadata.body, file, report);
}

function checkName(metadata: SkillMetadata, file: string, report: ValidationReport): void {
    if (!metadata.hasName) {
        report.error("Missing 'name' in frontmatter", file);
    }

    if (metadata.name !== undefined && !SKILL_NAME_PATTERN.test(metadata.name)) {
        report.warning(`Name should be lowercase-with-dashes: ${metadata.name}`, file);
    }
}

function checkDescription(metadata: SkillMetadata, file: string, report: ValidationReport): void {
    if (!metadata.hasDescription) {
        report.error("Missing 'description' in frontmatter", file);
    }

    const description = metadata.description;
    if (description === undefined) return;

    if (description.length < MIN_DESCRIPTION_LENGTH) {
        report.warning('Description is too short (should be 1-3 sentences)', file);
    }

    // Descriptions are read in third person ("Reviews...", not "Helps you...")
    if (SECOND_PERSON.test(description)) {
        report.warning('Description uses second person (prefer third person)', file);
    }
}

function checkBody(body: string, file: string, report: ValidationReport): void {
    if (body.trim().length < MIN_SKILL_BODY_LENGTH) {
        report.warning('Skill body is very short (add more content)', file);
    }

    for (const section of RECOMMENDED_SECTIONS) {
        if (!body.includes(section.heading)) {
            report.info(`Missing recommended ${section.label}`, file);
        }
    }
}
