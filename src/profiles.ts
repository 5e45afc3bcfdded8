/**
 * Site Profiles
 *
 * Maps the logical roles of a tutorial page (root, title, section, article,
 * body text, code block) to CSS selector rules, so the extractor itself never
 * names a site-specific class.
 *
 * When a URL matches a profile's url_pattern, that profile drives extraction;
 * otherwise the Structured fallback (`.section` / `.article` containers) does.
 */

/** Sections are container nodes holding their own heading and articles. */
export interface ContainerSectionRule {
    scope: 'container';
    selector: string;
    /** Selector for the section title, searched inside the container */
    heading: string;
    skip_untitled: boolean;
}

/**
 * Sections are heading nodes; a section owns the articles that follow its
 * heading up to the next section heading.
 */
export interface RangeSectionRule {
    scope: 'range';
    selector: string;
    skip_untitled: boolean;
}

export type SectionRule = ContainerSectionRule | RangeSectionRule;

export interface ArticleRule {
    selector: string;
    /** Selector for the article title, searched inside the article node */
    heading: string;
    /** Record the article's first link so its page can be fetched for content */
    follow_links: boolean;
    skip_untitled: boolean;
}

export interface SiteProfile {
    /** Human-readable name of the profile */
    name: string;
    /** Regex pattern matched against the full URL */
    url_pattern: RegExp;
    /** Candidate top-level containers; when non-empty, one of them must exist */
    root_selectors: string[];
    /** Tried in order; the first with non-empty text is the page title */
    title_selectors: string[];
    section: SectionRule;
    article: ArticleRule;
    /** Text-bearing content nodes inside an article */
    body_text: string;
    /** Code block nodes inside an article */
    code_block: string;
    /** Containers holding the content of a followed article page */
    linked_root_selectors: string[];
    /** Nodes removed before extraction */
    noise_selectors: string[];
}

const BASE_NOISE = ['script', 'style', 'noscript', 'template'];

export const SITE_PROFILES: SiteProfile[] = [
    // ── GeeksforGeeks topic index pages ─────────────────────────────────────────
    // An index page lists h2/h3 headings, each followed by a <ul> of article
    // links; the article content lives on the linked pages.
    {
        name: 'GeeksforGeeks',
        url_pattern: /geeksforgeeks\.org/i,
        root_selectors: ['div.text', '.entry-content', '.post-content', '.article-content', 'article'],
        title_selectors: ['h1', 'title'],
        section: { scope: 'range', selector: 'h2, h3', skip_untitled: true },
        article: { selector: 'li', heading: 'a', follow_links: true, skip_untitled: true },
        body_text: 'p, ul, ol, table, h2, h3, h4',
        code_block: 'pre, div.code-block, div.code',
        linked_root_selectors: ['article', '.post-content', '.entry-content', '.article-content', 'div.text'],
        noise_selectors: [
            ...BASE_NOISE,
            'nav', 'footer', 'aside',
            '.sidebar', '.header-main', '.article-meta', '.improve-section',
            '.ads', '.advertisement', '.cookie-banner',
        ],
    },

    // ── Structured fallback (matches everything) ────────────────────────────────
    {
        name: 'Structured',
        url_pattern: /.*/,
        root_selectors: [],
        title_selectors: ['h1', 'title'],
        section: { scope: 'container', selector: '.section, section', heading: 'h2', skip_untitled: false },
        article: { selector: '.article, article', heading: 'h3', follow_links: false, skip_untitled: false },
        body_text: 'p, ul, ol, table, blockquote',
        code_block: 'pre',
        linked_root_selectors: ['article', 'main'],
        noise_selectors: BASE_NOISE,
    },
];

export const DEFAULT_PROFILE: SiteProfile = SITE_PROFILES[SITE_PROFILES.length - 1];

/**
 * Returns the first profile whose pattern matches the URL,
 * or the Structured fallback if none match.
 */
export function getProfile(url: string): SiteProfile {
    return SITE_PROFILES.find((profile) => profile.url_pattern.test(url)) ?? DEFAULT_PROFILE;
}
