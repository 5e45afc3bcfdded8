import { extractLinkedBlocks, extractPage } from './extractor.js';
import type { Fetcher } from './fetcher.js';
import { createLogger, type Logger } from './logger.js';
import { renderMarkdown } from './markdown.js';
import { getProfile, type SiteProfile } from './profiles.js';
import { saveMarkdown } from './storage.js';
import type { ExtractedPage, Failure, Topic } from './types.js';

export interface ScraperDeps {
    fetchPage: Fetcher;
    outputDir: string;
    logger?: Logger;
    /** Profile lookup by URL. Defaults to the bundled site profiles. */
    profileFor?: (url: string) => SiteProfile;
}

export type TopicOutcome =
    | { status: 'written'; topic: Topic; path: string }
    | { status: 'fetch-failed' | 'parse-failed' | 'write-failed'; topic: Topic; reason: string };

export interface ScrapeSummary {
    written: number;
    failed: number;
    outcomes: TopicOutcome[];
}

type Stage = 'fetch-failed' | 'parse-failed';

// ── Linked articles ────────────────────────────────────────────────────────────

/**
 * Fills linked articles with the content of the page they point to.
 * A linked page that fails to load leaves its article empty.
 */
async function resolveLinkedArticles(
    page: ExtractedPage,
    profile: SiteProfile,
    fetchPage: Fetcher,
    logger: Logger,
): Promise<void> {
    for (const section of page.sections) {
        for (const article of section.articles) {
            if (!article.href) continue;

            logger.info(`Scraping: ${article.title} - ${article.href}`);
            const fetched = await fetchPage(article.href);
            if (!fetched.ok) {
                logger.warn(`Could not fetch article ${article.href}: ${fetched.reason}`);
                continue;
            }
            const linked = extractLinkedBlocks(fetched.html, profile, article.href);
            if (!linked.ok) {
                logger.warn(`No content extracted from ${article.href}: ${linked.reason}`);
                continue;
            }
            article.blocks = linked.blocks;
        }
    }
}

// ── Single topic ───────────────────────────────────────────────────────────────

/**
 * Fetches one topic page and converts it to markdown, following article links
 * where the site profile asks for it. Never throws for fetch or parse problems.
 */
export async function scrapeTopic(
    topic: Topic,
    deps: ScraperDeps,
): Promise<{ ok: true; markdown: string } | (Failure & { stage: Stage })> {
    const logger = deps.logger ?? createLogger('scraper');
    const profile = (deps.profileFor ?? getProfile)(topic.url);

    logger.info(`Fetching main page: ${topic.url}`);
    const fetched = await deps.fetchPage(topic.url);
    if (!fetched.ok) {
        return { ok: false, stage: 'fetch-failed', reason: fetched.reason };
    }

    const extracted = extractPage(fetched.html, {
        fallbackTitle: topic.name,
        profile,
        url: topic.url,
    });
    if (!extracted.ok) {
        return { ok: false, stage: 'parse-failed', reason: extracted.reason };
    }

    await resolveLinkedArticles(extracted.page, profile, deps.fetchPage, logger);
    return { ok: true, markdown: renderMarkdown(extracted.page) };
}

// ── Batch ──────────────────────────────────────────────────────────────────────

/**
 * Processes topics strictly one after another in input order. A failed topic
 * is logged and skipped; it never stops the topics after it.
 */
export async function runScraper(topics: readonly Topic[], deps: ScraperDeps): Promise<ScrapeSummary> {
    const logger = deps.logger ?? createLogger('scraper');
    const outcomes: TopicOutcome[] = [];

    for (const topic of topics) {
        const result = await scrapeTopic(topic, { ...deps, logger });
        if (!result.ok) {
            logger.warn(`Skipping ${topic.url} (${result.stage}): ${result.reason}`);
            outcomes.push({ status: result.stage, topic, reason: result.reason });
            continue;
        }

        const saved = saveMarkdown(deps.outputDir, topic.slug, result.markdown);
        if (!saved.ok) {
            logger.error(`Could not write ${topic.slug}.md: ${saved.reason}`);
            outcomes.push({ status: 'write-failed', topic, reason: saved.reason });
            continue;
        }

        logger.info(`✓ Content saved to ${saved.path}`);
        outcomes.push({ status: 'written', topic, path: saved.path });
    }

    const written = outcomes.filter((o) => o.status === 'written').length;
    return { written, failed: outcomes.length - written, outcomes };
}

/**
 * One summary line plus one line per failed topic.
 */
export function formatSummary(summary: ScrapeSummary): string[] {
    const lines = [`Done: ${summary.written} written, ${summary.failed} failed`];
    for (const outcome of summary.outcomes) {
        if (outcome.status !== 'written') {
            lines.push(`- ${outcome.topic.url} (${outcome.status}): ${outcome.reason}`);
        }
    }
    return lines;
}
