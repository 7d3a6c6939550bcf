import { z } from 'zod';

/**
 * Project configuration (plugkit.config.yaml)
 */
export const PlugkitConfigSchema = z.object({
    /** Directory holding plugin templates; defaults to the bundled set */
    templatesDir: z.string().min(1).optional(),
    package: z.object({
        /** Where archives are written */
        outputDir: z.string().min(1).default('.'),
        /** Exclusion patterns appended to the defaults */
        exclude: z.array(z.string().min(1)).default([]),
    }).default({}),
}).strict();

export type PlugkitConfig = z.infer<typeof PlugkitConfigSchema>;

export const CONFIG_FILENAMES = ['plugkit.config.yaml', 'plugkit.config.yml'];
