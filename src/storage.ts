import fs from 'fs';
import path from 'path';
import type { SaveResult } from './types.js';

/**
 * Writes `<slug>.md` into outputDir, creating the directory if needed.
 * An existing file of the same name is replaced.
 */
export function saveMarkdown(outputDir: string, slug: string, markdown: string): SaveResult {
    const filePath = path.join(outputDir, `${slug}.md`);
    try {
        if (!fs.existsSync(outputDir)) {
            fs.mkdirSync(outputDir, { recursive: true });
        }
        fs.writeFileSync(filePath, markdown, 'utf-8');
        return { ok: true, path: filePath };
    } catch (err) {
        return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
}
