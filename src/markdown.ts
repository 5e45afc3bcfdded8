import TurndownService from 'turndown';
import { gfm } from 'turndown-plugin-gfm';
import type { ContentBlock, ExtractedPage } from './types.js';

const turndownService = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
});

// GitHub Flavored Markdown (tables, strikethrough)
turndownService.use(gfm);

turndownService.remove(['script', 'style', 'noscript', 'img', 'iframe']);

// Headings inside an article body must not outrank the article heading itself,
// so they are rendered as bold lines.
turndownService.addRule('inlineHeading', {
    filter: ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'],
    replacement(content) {
        const text = content.trim();
        return text ? `\n\n**${text}**\n\n` : '';
    },
});

function isElement(node: ParentNode): node is Element {
    return node.nodeType === 1;
}

// Compact list items: `- item` / `3. item`, one per line.
turndownService.addRule('compactListItem', {
    filter: 'li',
    replacement(content, node) {
        const parent = node.parentNode;
        let prefix = '- ';
        if (parent && isElement(parent) && parent.nodeName === 'OL') {
            const start = Number.parseInt(parent.getAttribute('start') ?? '1', 10);
            const index = Array.prototype.indexOf.call(parent.children, node);
            prefix = `${(Number.isNaN(start) ? 1 : start) + index}. `;
        }
        const body = content.trim().replace(/\n+/g, '\n  ');
        return prefix + body + (node.nextSibling ? '\n' : '');
    },
});

/**
 * Converts one body-text node (paragraph, list, table, quote) to markdown.
 */
export function htmlToMarkdown(html: string): string {
    return turndownService.turndown(html).trim();
}

// ── Code block language detection ──────────────────────────────────────────────

const LANGUAGE_PATTERNS = [
    /\blanguage-(\w[\w.+#-]*)/i,
    /\blang-(\w[\w.+#-]*)/i,
    /\bprism-(\w[\w.+#-]*)/i,
    /\bhljs-(\w[\w.+#-]*)/i,
    /\bsyntax-(\w[\w.+#-]*)/i,
    /\bbrush:\s*(\w[\w.+#-]*)/i,
];

const LANGUAGE_ALIASES: Record<string, string> = {
    js: 'javascript',
    ts: 'typescript',
    py: 'python',
    python3: 'python',
    rb: 'ruby',
    sh: 'bash',
    yml: 'yaml',
    md: 'markdown',
    'c++': 'cpp',
    'c#': 'csharp',
};

/**
 * Detects the programming language from CSS class strings.
 * Returns '' when no class names a language.
 */
export function detectLanguage(...classNames: string[]): string {
    for (const className of classNames) {
        for (const re of LANGUAGE_PATTERNS) {
            const m = className.match(re);
            if (m) {
                const lang = m[1].toLowerCase();
                return LANGUAGE_ALIASES[lang] ?? lang;
            }
        }
    }
    return '';
}

// ── Rendering ──────────────────────────────────────────────────────────────────

/**
 * Wraps code in a fence longer than any backtick run inside it.
 */
export function fenceCode(code: string, language = ''): string {
    const longestRun = Math.max(0, ...(code.match(/`+/g) ?? []).map((run) => run.length));
    const fence = '`'.repeat(Math.max(3, longestRun + 1));
    return `${fence}${language}\n${code}\n${fence}`;
}

function renderBlock(block: ContentBlock): string {
    switch (block.kind) {
        case 'text':
            return block.markdown;
        case 'code':
            return fenceCode(block.code, block.language);
    }
}

/**
 * Renders an extracted page as markdown blocks in document order:
 * `#` title, `##` per section, `###` per article, then the article's content.
 */
export function toMarkdownBlocks(page: ExtractedPage): string[] {
    const blocks = [`# ${page.title}`];
    for (const section of page.sections) {
        blocks.push(`## ${section.title}`);
        for (const article of section.articles) {
            blocks.push(`### ${article.title}`);
            for (const block of article.blocks) {
                blocks.push(renderBlock(block));
            }
        }
    }
    return blocks;
}

export function renderMarkdown(page: ExtractedPage): string {
    return toMarkdownBlocks(page).join('\n\n') + '\n';
}
