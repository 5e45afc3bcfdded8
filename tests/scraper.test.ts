/**
 * Test: topic orchestration
 *
 * Drives runScraper with an in-process fetcher and a temporary output
 * directory: failed topics are skipped, later topics still get their file,
 * linked articles are filled in and write errors are surfaced.
 */

import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Fetcher } from '../src/fetcher.js';
import { createLogger } from '../src/logger.js';
import { formatSummary, runScraper } from '../src/scraper.js';
import { buildTopics } from '../src/topics.js';
import type { FetchResult } from '../src/types.js';

console.log('Running scraper tests...\n');

function fakeFetcher(pages: Record<string, FetchResult>, requested: string[] = []): Fetcher {
    return async (url) => {
        requested.push(url);
        return pages[url] ?? { ok: false, reason: 'HTTP 404 Not Found' };
    };
}

function captureLogger() {
    const lines: string[] = [];
    const logger = createLogger('scraper', {
        write: (chunk: string) => lines.push(chunk),
    });
    return { logger, lines };
}

const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'tutorial-scraper-'));

const SORTING_HTML =
    '<title>Sorting</title><div class="section"><h2>Basics</h2><div class="article">' +
    '<h3>Bubble Sort</h3><p>Intro text.</p><pre>code here</pre></div></div>';

try {
    // ── Test 1: Failures are skipped, later topics still written ─────────────
    {
        const outputDir = path.join(tmpRoot, 'run-1');
        const { topics } = buildTopics([
            { url: 'https://tutorials.test/offline', label: 'Offline' },
            { url: 'https://tutorials.test/garbage', label: 'Garbage' },
            { url: 'https://tutorials.test/sorting' },
        ]);
        const { logger, lines } = captureLogger();
        const fetchPage = fakeFetcher({
            'https://tutorials.test/offline': { ok: false, reason: 'fetch failed' },
            'https://tutorials.test/garbage': { ok: true, html: 'not markup at all' },
            'https://tutorials.test/sorting': { ok: true, html: SORTING_HTML },
        });

        const summary = await runScraper(topics, { fetchPage, outputDir, logger });

        assert.equal(summary.written, 1);
        assert.equal(summary.failed, 2);
        assert.deepEqual(summary.outcomes.map((o) => o.status), ['fetch-failed', 'parse-failed', 'written']);
        assert.deepEqual(fs.readdirSync(outputDir), ['sorting.md']);
        assert.equal(
            fs.readFileSync(path.join(outputDir, 'sorting.md'), 'utf-8'),
            '# Sorting\n\n## Basics\n\n### Bubble Sort\n\nIntro text.\n\n```\ncode here\n```\n',
        );
        assert.ok(lines.includes('[scraper] warning: Skipping https://tutorials.test/offline (fetch-failed): fetch failed\n'));
        assert.ok(lines.includes(
            '[scraper] warning: Skipping https://tutorials.test/garbage (parse-failed): document contains no HTML elements\n',
        ));

        assert.deepEqual(formatSummary(summary), [
            'Done: 1 written, 2 failed',
            '- https://tutorials.test/offline (fetch-failed): fetch failed',
            '- https://tutorials.test/garbage (parse-failed): document contains no HTML elements',
        ]);
        console.log('✓ Test 1 passed: fetch and parse failures skipped, good topic written');
    }

    // ── Test 2: Same input twice, byte-identical files ───────────────────────
    {
        const outputDir = path.join(tmpRoot, 'run-2');
        const { topics } = buildTopics([{ url: 'https://tutorials.test/sorting' }]);
        const fetchPage = fakeFetcher({ 'https://tutorials.test/sorting': { ok: true, html: SORTING_HTML } });
        const { logger } = captureLogger();

        await runScraper(topics, { fetchPage, outputDir, logger });
        const first = fs.readFileSync(path.join(outputDir, 'sorting.md'), 'utf-8');
        await runScraper(topics, { fetchPage, outputDir, logger });
        const second = fs.readFileSync(path.join(outputDir, 'sorting.md'), 'utf-8');
        assert.equal(first, second);
        console.log('✓ Test 2 passed: repeated runs produce identical files');
    }

    // ── Test 3: Linked articles are fetched for their content ────────────────
    {
        const outputDir = path.join(tmpRoot, 'run-3');
        const indexUrl = 'https://www.geeksforgeeks.org/greedy-algorithms/';
        const { topics } = buildTopics([{ url: indexUrl }]);
        const requested: string[] = [];
        const fetchPage = fakeFetcher(
            {
                [indexUrl]: {
                    ok: true,
                    html:
                        '<html><body><div class="text"><h1>Greedy Algorithms</h1><h2>Basics</h2><ul>' +
                        '<li><a href="/introduction-to-greedy/">Introduction to Greedy</a></li>' +
                        '<li><a href="https://example.org/activity">Activity Selection</a></li>' +
                        '</ul></div></body></html>',
                },
                'https://www.geeksforgeeks.org/introduction-to-greedy/': {
                    ok: true,
                    html: '<html><body><article><h1>Intro</h1><p>Greedy picks the best option.</p></article></body></html>',
                },
            },
            requested,
        );
        const { logger, lines } = captureLogger();

        const summary = await runScraper(topics, { fetchPage, outputDir, logger });

        assert.equal(summary.written, 1);
        assert.deepEqual(requested, [
            indexUrl,
            'https://www.geeksforgeeks.org/introduction-to-greedy/',
            'https://example.org/activity',
        ]);
        assert.equal(
            fs.readFileSync(path.join(outputDir, 'greedy-algorithms.md'), 'utf-8'),
            '# Greedy Algorithms\n\n## Basics\n\n### Introduction to Greedy\n\nGreedy picks the best option.\n\n### Activity Selection\n',
        );
        assert.ok(lines.includes(
            '[scraper] warning: Could not fetch article https://example.org/activity: HTTP 404 Not Found\n',
        ));
        console.log('✓ Test 3 passed: linked article content filled in, failed link left empty');
    }

    // ── Test 4: Write failures are surfaced ──────────────────────────────────
    {
        const blocker = path.join(tmpRoot, 'blocker');
        fs.writeFileSync(blocker, 'not a directory');
        const outputDir = path.join(blocker, 'out');
        const { topics } = buildTopics([{ url: 'https://tutorials.test/sorting' }]);
        const fetchPage = fakeFetcher({ 'https://tutorials.test/sorting': { ok: true, html: SORTING_HTML } });
        const { logger, lines } = captureLogger();

        const summary = await runScraper(topics, { fetchPage, outputDir, logger });

        assert.equal(summary.failed, 1);
        assert.equal(summary.outcomes[0].status, 'write-failed');
        assert.ok(
            lines.some((l) => l.startsWith('[scraper] error: Could not write sorting.md: ')),
            'A filesystem failure must be logged as an error',
        );
        console.log('✓ Test 4 passed: write failure recorded and logged');
    }

    // ── Test 5: Every linked list item is fetched ────────────────────────────
    {
        const outputDir = path.join(tmpRoot, 'run-5');
        const indexUrl = 'https://www.geeksforgeeks.org/greedy-algorithms/';
        const { topics } = buildTopics([{ url: indexUrl }]);
        const requested: string[] = [];
        const fetchPage = fakeFetcher(
            {
                [indexUrl]: {
                    ok: true,
                    html:
                        '<html><body><div class="text"><h1>Greedy Algorithms</h1><h2>Basics</h2><ul>' +
                        '<li><a href="/intro/">Intro</a><ul><li><a href="/sub/">Sub</a></li></ul></li>' +
                        '</ul></div></body></html>',
                },
                'https://www.geeksforgeeks.org/intro/': {
                    ok: true,
                    html: '<html><body><article><p>Intro body.</p></article></body></html>',
                },
                'https://www.geeksforgeeks.org/sub/': {
                    ok: true,
                    html: '<html><body><article><p>See <a href="/sorting/">sorting</a>.</p></article></body></html>',
                },
            },
            requested,
        );
        const { logger } = captureLogger();

        const summary = await runScraper(topics, { fetchPage, outputDir, logger });

        assert.equal(summary.written, 1);
        assert.deepEqual(requested, [
            indexUrl,
            'https://www.geeksforgeeks.org/intro/',
            'https://www.geeksforgeeks.org/sub/',
        ]);
        assert.equal(
            fs.readFileSync(path.join(outputDir, 'greedy-algorithms.md'), 'utf-8'),
            '# Greedy Algorithms\n\n## Basics\n\n### Intro\n\nIntro body.\n\n' +
                '### Sub\n\nSee [sorting](https://www.geeksforgeeks.org/sorting/).\n',
        );
        console.log('✓ Test 5 passed: nested list items each fetched once, links made absolute');
    }
} finally {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
}

console.log('\n✅ All scraper tests passed!');
