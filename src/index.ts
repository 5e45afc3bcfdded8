#!/usr/bin/env node

import { HELP_TEXT, parseCli, type CliCommand } from './cli.js';
import { ConfigError } from './config.js';
import { createFetcher } from './fetcher.js';
import { createLogger } from './logger.js';
import { formatSummary, runScraper } from './scraper.js';
import { buildTopics, DEFAULT_TOPICS } from './topics.js';

const logger = createLogger('scraper');

async function main(): Promise<number> {
    let command: CliCommand;
    try {
        command = parseCli(process.argv.slice(2));
    } catch (err) {
        if (err instanceof ConfigError) {
            process.stderr.write(err.format() + '\n\n' + HELP_TEXT);
            return 1;
        }
        throw err;
    }

    if (command.kind === 'help') {
        process.stdout.write(HELP_TEXT);
        return 0;
    }

    const { config } = command;
    const { topics, duplicates } = buildTopics(command.urls.length > 0 ? command.urls : DEFAULT_TOPICS);
    for (const url of duplicates) {
        logger.warn(`Ignoring duplicate topic URL: ${url}`);
    }

    const fetchPage = createFetcher({
        delayRange: config.delayRange,
        timeout: config.timeout,
        userAgent: config.userAgent,
    });

    const summary = await runScraper(topics, { fetchPage, outputDir: config.outputDir, logger });
    for (const line of formatSummary(summary)) {
        logger.info(line);
    }
    // Topic failures are reported above but do not fail the run.
    return 0;
}

main().then(
    (code) => process.exit(code),
    (error) => {
        console.error('Fatal error:', error);
        process.exit(1);
    },
);
