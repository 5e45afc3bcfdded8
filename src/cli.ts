/**
 * Command-line options.
 *
 * Usage:
 *   tutorial-scraper [options]
 *
 * Options:
 *   -o, --output-dir <dir>  Destination directory (default: scraped_content)
 *   --min-delay <seconds>   Minimum wait between requests (default: 1)
 *   --max-delay <seconds>   Maximum wait between requests (default: 3)
 *   -t, --timeout <seconds> Per-request timeout (default: 10)
 *   -u, --url <url>         Topic URL to scrape; repeatable, replaces the built-in list
 *   -h, --help              Show help
 */

import { parseArgs } from 'node:util';
import { ConfigError, loadConfig, type ScraperConfig } from './config.js';
import type { TopicEntry } from './types.js';

export const HELP_TEXT = `Usage: tutorial-scraper [options]

Scrapes tutorial topic pages and writes one markdown file per topic.

Options:
  -o, --output-dir <dir>   Destination directory (default: scraped_content)
      --min-delay <s>      Minimum seconds to wait between requests (default: 1)
      --max-delay <s>      Maximum seconds to wait between requests (default: 3)
  -t, --timeout <s>        Per-request timeout in seconds (default: 10)
  -u, --url <url>          Topic URL to scrape; repeatable, replaces the built-in list
  -h, --help               Show this help
`;

export type CliCommand =
    | { kind: 'help' }
    | { kind: 'run'; config: Readonly<ScraperConfig>; urls: TopicEntry[] };

function parseSeconds(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (value.trim() === '' || Number.isNaN(n)) {
        throw new ConfigError('Invalid command-line options:', [
            { path: [flag], message: `expected a number of seconds, got "${value}"` },
        ]);
    }
    return n;
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            options: {
                'output-dir': { type: 'string', short: 'o' },
                'min-delay': { type: 'string' },
                'max-delay': { type: 'string' },
                timeout: { type: 'string', short: 't' },
                url: { type: 'string', short: 'u', multiple: true },
                help: { type: 'boolean', short: 'h', default: false },
            },
            strict: true,
            allowPositionals: false,
        });
    } catch (err) {
        throw new ConfigError('Invalid command-line options:', [
            { path: [], message: err instanceof Error ? err.message : String(err) },
        ]);
    }
}

function isAbsoluteUrl(value: string): boolean {
    try {
        new URL(value);
        return true;
    } catch {
        return false;
    }
}

/**
 * Parses argv (without the node and script entries) into a command.
 * @throws ConfigError for malformed values or an invalid resulting configuration
 */
export function parseCli(argv: string[]): CliCommand {
    const { values } = readArgs(argv);
    if (values.help) return { kind: 'help' };

    const minDelay = parseSeconds('min-delay', values['min-delay']);
    const maxDelay = parseSeconds('max-delay', values['max-delay']);
    const timeout = parseSeconds('timeout', values.timeout);

    const raw: Record<string, unknown> = {};
    if (values['output-dir'] !== undefined) raw.outputDir = values['output-dir'];
    if (minDelay !== undefined || maxDelay !== undefined) {
        // A single bound moves the default of the other one when they would cross.
        const min = minDelay ?? Math.min(1, maxDelay ?? 1);
        const max = maxDelay ?? Math.max(3, min);
        raw.delayRange = [min, max];
    }
    if (timeout !== undefined) raw.timeout = timeout;

    const urls = (values.url ?? []).map((url) => ({ url }));
    for (const { url } of urls) {
        if (!isAbsoluteUrl(url)) {
            throw new ConfigError('Invalid command-line options:', [
                { path: ['url'], message: `not an absolute URL: ${url}` },
            ]);
        }
    }

    return { kind: 'run', config: loadConfig(raw), urls };
}
