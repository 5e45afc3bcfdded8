import { JSDOM } from 'jsdom';
import { detectLanguage, htmlToMarkdown, renderMarkdown } from './markdown.js';
import { DEFAULT_PROFILE, type ArticleRule, type SiteProfile } from './profiles.js';
import type { Article, ContentBlock, ExtractResult, Failure, Section } from './types.js';

// Node.compareDocumentPosition bit: the argument follows the reference node.
const DOCUMENT_POSITION_FOLLOWING = 4;

export interface ExtractOptions {
    /** Title used when none of the profile's title selectors matches */
    fallbackTitle: string;
    profile?: SiteProfile;
    /** Page URL; relative article links resolve against it */
    url?: string;
}

function fail(reason: string): Failure {
    return { ok: false, reason };
}

function textOf(el: Element): string {
    return (el.textContent ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Parses HTML into a document. Returns null when the input holds no element at
 * all (empty or plain-text bodies), which counts as unparseable.
 */
function parseDocument(html: string, url?: string): Document | null {
    let dom: JSDOM;
    try {
        dom = url ? new JSDOM(html, { url }) : new JSDOM(html);
    } catch {
        return null;
    }
    const document = dom.window.document;
    if (document.querySelector('head *, body *') === null) return null;
    return document;
}

function stripNoise(document: Document, selectors: string[]): void {
    for (const selector of selectors) {
        document.querySelectorAll(selector).forEach((el) => el.remove());
    }
}

/** Rewrites relative link targets against the document URL. */
function resolveLinks(document: Document): void {
    for (const anchor of document.querySelectorAll('a[href]')) {
        const href = anchor.getAttribute('href');
        if (href && !href.startsWith('#')) anchor.setAttribute('href', resolveHref(anchor, href));
    }
}

function firstMatch(scope: ParentNode, selectors: string[]): Element | null {
    for (const selector of selectors) {
        const el = scope.querySelector(selector);
        if (el) return el;
    }
    return null;
}

function findTitle(document: Document, selectors: string[]): string {
    for (const selector of selectors) {
        for (const el of document.querySelectorAll(selector)) {
            const text = textOf(el);
            if (text) return text;
        }
    }
    return '';
}

/** Title for a node without a heading match, or null when it should be skipped. */
function fallbackName(el: Element, kind: 'Section' | 'Article', position: number, skip: boolean): string | null {
    if (skip) return null;
    const labelled = (el.getAttribute('aria-label') ?? el.getAttribute('title') ?? '').trim();
    return labelled || `${kind} ${position}`;
}

// ── Content blocks ─────────────────────────────────────────────────────────────

function codeBlock(el: Element): ContentBlock | null {
    const raw = el.textContent ?? '';
    if (!raw.trim()) return null;
    const code = raw.endsWith('\n') ? raw.slice(0, -1) : raw;
    const inner = el.querySelector('code');
    const language = detectLanguage(el.className, inner?.className ?? '');
    return { kind: 'code', code, language };
}

/**
 * Collects body-text and code nodes inside a container, in document order.
 * A node nested inside another matched node belongs to the outer one.
 */
export function extractBlocks(container: Element, profile: SiteProfile): ContentBlock[] {
    const combined = `${profile.body_text}, ${profile.code_block}`;
    const blocks: ContentBlock[] = [];

    for (const el of container.querySelectorAll(combined)) {
        const outer = el.parentElement?.closest(combined);
        if (outer && container.contains(outer)) continue;

        if (el.matches(profile.code_block)) {
            const block = codeBlock(el);
            if (block) blocks.push(block);
            continue;
        }
        const markdown = htmlToMarkdown(el.outerHTML);
        if (markdown) blocks.push({ kind: 'text', markdown });
    }
    return blocks;
}

// ── Articles and sections ──────────────────────────────────────────────────────

function buildArticle(el: Element, rule: ArticleRule, profile: SiteProfile, position: number): Article | null {
    const headingEl = el.matches(rule.heading) ? el : el.querySelector(rule.heading);
    const heading = headingEl ? textOf(headingEl) : '';
    const title = heading || fallbackName(el, 'Article', position, rule.skip_untitled);
    if (title === null) return null;

    // A followed article's content comes from the linked page, not the link list.
    const article: Article = { title, blocks: rule.follow_links ? [] : extractBlocks(el, profile) };
    if (rule.follow_links) {
        const anchor = el.matches('a[href]') ? el : el.querySelector('a[href]');
        const href = anchor?.getAttribute('href');
        if (anchor && href && !href.startsWith('#') && !href.startsWith('javascript:')) {
            article.href = resolveHref(anchor, href);
        }
    }
    return article;
}

function resolveHref(anchor: Element, href: string): string {
    try {
        return new URL(href, anchor.ownerDocument.baseURI).href;
    } catch {
        return href;
    }
}

function buildArticles(nodes: Element[], profile: SiteProfile): Article[] {
    const articles: Article[] = [];
    for (const node of nodes) {
        const article = buildArticle(node, profile.article, profile, articles.length + 1);
        if (article) articles.push(article);
    }
    return articles;
}

function containerSections(root: ParentNode, profile: SiteProfile): Section[] {
    const rule = profile.section;
    if (rule.scope !== 'container') return [];
    const articleSelector = profile.article.selector;
    const sections: Section[] = [];

    for (const node of root.querySelectorAll(rule.selector)) {
        // The heading must belong to the section, not to one of its articles.
        const headingEl = Array.from(node.querySelectorAll(rule.heading)).find((h) => {
            const owner = h.closest(articleSelector);
            return !owner || !node.contains(owner);
        });
        const heading = headingEl ? textOf(headingEl) : '';
        const title = heading || fallbackName(node, 'Section', sections.length + 1, rule.skip_untitled);
        if (title === null) continue;

        const owned = Array.from(node.querySelectorAll(articleSelector)).filter(
            (a) => a.parentElement?.closest(rule.selector) === node,
        );
        sections.push({ title, articles: buildArticles(owned, profile) });
    }
    return sections;
}

function follows(reference: Element, other: Element): boolean {
    return (reference.compareDocumentPosition(other) & DOCUMENT_POSITION_FOLLOWING) !== 0;
}

function rangeSections(root: ParentNode, profile: SiteProfile): Section[] {
    const rule = profile.section;
    if (rule.scope !== 'range') return [];
    const headings = Array.from(root.querySelectorAll(rule.selector));
    const candidates = Array.from(root.querySelectorAll(profile.article.selector));
    const sections: Section[] = [];

    headings.forEach((heading, i) => {
        const title = textOf(heading) || fallbackName(heading, 'Section', sections.length + 1, rule.skip_untitled);
        // Single-character headings are decoration, not section titles.
        if (title === null || title.length < 2) return;

        const next = headings[i + 1];
        const owned = candidates.filter(
            (a) => follows(heading, a) && !heading.contains(a) && (!next || follows(a, next)),
        );
        sections.push({ title, articles: buildArticles(owned, profile) });
    });
    return sections;
}

// ── Entry points ───────────────────────────────────────────────────────────────

/**
 * Extracts the title → sections → articles → content structure of a tutorial
 * page. Fails only when the HTML yields no element tree or the profile's
 * required root container is absent; missing sections or articles are simply
 * left out.
 */
export function extractPage(html: string, options: ExtractOptions): ExtractResult {
    const profile = options.profile ?? DEFAULT_PROFILE;
    const document = parseDocument(html, options.url);
    if (!document) return fail('document contains no HTML elements');

    stripNoise(document, profile.noise_selectors);
    resolveLinks(document);

    let root: ParentNode = document;
    if (profile.root_selectors.length > 0) {
        const el = firstMatch(document, profile.root_selectors);
        if (!el) return fail(`no content root (${profile.root_selectors.join(', ')}) found`);
        root = el;
    }

    const title = findTitle(document, profile.title_selectors) || options.fallbackTitle;
    const sections = profile.section.scope === 'container'
        ? containerSections(root, profile)
        : rangeSections(root, profile);

    return { ok: true, page: { title, sections } };
}

/**
 * Extracts the content blocks of a linked article page from the profile's
 * linked-article container.
 */
export function extractLinkedBlocks(html: string, profile: SiteProfile, url?: string): { ok: true; blocks: ContentBlock[] } | Failure {
    const document = parseDocument(html, url);
    if (!document) return fail('document contains no HTML elements');

    stripNoise(document, profile.noise_selectors);
    resolveLinks(document);

    const container = firstMatch(document, profile.linked_root_selectors);
    if (!container) return fail('no article container found');
    return { ok: true, blocks: extractBlocks(container, profile) };
}

/**
 * HTML → markdown text in one step. Returns the failure unchanged when the
 * page cannot be extracted.
 */
export function formatMarkdown(
    html: string,
    fallbackTitle: string,
    profile: SiteProfile = DEFAULT_PROFILE,
): { ok: true; markdown: string } | Failure {
    const result = extractPage(html, { fallbackTitle, profile });
    if (!result.ok) return result;
    return { ok: true, markdown: renderMarkdown(result.page) };
}
