import type { Topic, TopicEntry } from './types.js';

/** Algorithm tutorial index pages scraped when no URLs are given. */
export const DEFAULT_TOPICS: TopicEntry[] = [
    { url: 'https://www.geeksforgeeks.org/greedy-algorithms/' },
    { url: 'https://www.geeksforgeeks.org/dynamic-programming/' },
    { url: 'https://www.geeksforgeeks.org/graph-data-structure-and-algorithms/' },
    { url: 'https://www.geeksforgeeks.org/pattern-searching/' },
    { url: 'https://www.geeksforgeeks.org/branch-and-bound-algorithm/' },
    { url: 'https://www.geeksforgeeks.org/geometric-algorithms/' },
    { url: 'https://www.geeksforgeeks.org/randomized-algorithms/' },
];

/**
 * Lowercase ASCII slug: accents folded, every other run of characters
 * collapsed to a single dash.
 */
export function slugify(text: string): string {
    const slug = text
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
    return slug || 'topic';
}

/** Last non-empty path segment of a URL, or its hostname for a bare origin. */
export function lastPathSegment(url: string): string {
    const { hostname, pathname } = new URL(url);
    const segments = pathname.split('/').filter(Boolean);
    const last = segments[segments.length - 1];
    return last ? decodeSegment(last).replace(/\.html?$/i, '') : hostname;
}

/** Percent-decodes a path segment, keeping it raw when an escape is malformed. */
function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}

export function titleCase(segment: string): string {
    return segment
        .split(/[-_\s]+/)
        .filter(Boolean)
        .map((word) => word[0].toUpperCase() + word.slice(1))
        .join(' ');
}

function normaliseUrl(url: string): string {
    return url.replace(/\/+$/, '');
}

export interface TopicList {
    topics: Topic[];
    /** URLs dropped because an earlier entry already covers them */
    duplicates: string[];
}

/**
 * Builds topics in input order.
 *
 * A URL that repeats an earlier one (ignoring trailing slashes) is dropped.
 * A slug already taken by another URL gets a `-2`, `-3`, … suffix so no topic
 * overwrites another's file within a run.
 *
 * @throws TypeError when an entry's URL is not an absolute URL.
 */
export function buildTopics(entries: readonly TopicEntry[]): TopicList {
    const seenUrls = new Set<string>();
    const usedSlugs = new Set<string>();
    const topics: Topic[] = [];
    const duplicates: string[] = [];

    for (const entry of entries) {
        const key = normaliseUrl(entry.url);
        if (seenUrls.has(key)) {
            duplicates.push(entry.url);
            continue;
        }
        seenUrls.add(key);

        const segment = lastPathSegment(entry.url);
        const label = entry.label?.trim();
        const base = slugify(label || segment);
        let slug = base;
        for (let n = 2; usedSlugs.has(slug); n++) {
            slug = `${base}-${n}`;
        }
        usedSlugs.add(slug);

        topics.push(Object.freeze({ url: entry.url, slug, name: label || titleCase(segment) }));
    }

    return { topics, duplicates };
}
