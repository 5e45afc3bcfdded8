// ── Topics ─────────────────────────────────────────────────────────────────────

/** One unit of work: a source page and the markdown file it becomes. */
export interface Topic {
    readonly url: string;
    /** Filesystem-safe output filename stem (without `.md`) */
    readonly slug: string;
    /** Display name, used when the page has no title of its own */
    readonly name: string;
}

/** A raw entry of the topic list before slugs are derived. */
export interface TopicEntry {
    url: string;
    label?: string;
}

// ── Results ────────────────────────────────────────────────────────────────────

export interface Failure {
    ok: false;
    /** Diagnostic only — callers never branch on it */
    reason: string;
}

export type FetchResult = { ok: true; html: string } | Failure;

export type ExtractResult = { ok: true; page: ExtractedPage } | Failure;

export type SaveResult = { ok: true; path: string } | Failure;

// ── Extracted page structure ───────────────────────────────────────────────────

export type ContentBlock =
    | { kind: 'text'; markdown: string }
    | { kind: 'code'; code: string; language: string };

export interface Article {
    title: string;
    /** Absolute URL of the linked article page, set only when the profile follows links */
    href?: string;
    blocks: ContentBlock[];
}

export interface Section {
    title: string;
    articles: Article[];
}

export interface ExtractedPage {
    title: string;
    sections: Section[];
}
