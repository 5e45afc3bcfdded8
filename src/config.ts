/**
 * Runtime configuration.
 *
 * Validated once at startup with zod and frozen; every field has a default so
 * an empty object yields a working configuration.
 */

import { z, type ZodIssue } from 'zod';

export const DEFAULT_OUTPUT_DIR = 'scraped_content';
export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const ScraperConfigSchema = z
    .object({
        /** Destination directory for the markdown files */
        outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
        /** Seconds to wait before each request, drawn uniformly from [min, max] */
        delayRange: z
            .tuple([z.number().nonnegative(), z.number().nonnegative()])
            .default([1, 3])
            .refine(([min, max]) => min <= max, {
                message: 'minimum delay must not exceed maximum delay',
            }),
        /** Per-request timeout in seconds */
        timeout: z.number().positive().default(10),
        userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    })
    .strict();

export type ScraperConfig = z.infer<typeof ScraperConfigSchema>;
export type ScraperConfigInput = z.input<typeof ScraperConfigSchema>;

export interface ConfigIssue {
    path: (string | number)[];
    message: string;
}

export class ConfigError extends Error {
    public readonly issues: ConfigIssue[];

    constructor(message: string, issues: ConfigIssue[]) {
        super(message);
        this.name = 'ConfigError';
        this.issues = issues;
    }

    format(): string {
        const lines = [this.message];
        for (const issue of this.issues) {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            lines.push(`  - ${path}: ${issue.message}`);
        }
        return lines.join('\n');
    }
}

function toIssues(zodIssues: ZodIssue[]): ConfigIssue[] {
    return zodIssues.map((issue) => ({
        path: issue.path.filter(
            (p): p is string | number => typeof p === 'string' || typeof p === 'number',
        ),
        message: issue.message,
    }));
}

/**
 * Validates raw configuration, filling defaults. Throws ConfigError on any issue.
 */
export function loadConfig(input: unknown = {}): Readonly<ScraperConfig> {
    const result = ScraperConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError('Invalid scraper configuration:', toIssues(result.error.issues));
    }
    Object.freeze(result.data.delayRange);
    return Object.freeze(result.data);
}
