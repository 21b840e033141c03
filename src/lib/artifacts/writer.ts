import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  ArtifactWriter,
  ConvertedDocument,
  WrittenArtifacts,
} from '../types.js';
import { hostOf } from '../utils.js';

export const FALLBACK_PAGE_NAME = 'index';
export const EXPORT_ERROR_CONTENT = { error: 'Failed to export the document.' };

export function sanitizeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9\-_.]/g, '_');
}

/**
 * File name for a page: its first Markdown heading, sanitized, or `index`
 * when the page has none.
 */
export function getPageTitle(markdown: string): string {
  for (const line of markdown.split(/\r?\n/)) {
    if (line.startsWith('#')) {
      const title = line.replace(/^#+|#+$/g, '').trim();
      if (title) {
        return sanitizeFilename(title);
      }
    }
  }
  return FALLBACK_PAGE_NAME;
}

function structuredContent(document: ConvertedDocument): unknown {
  try {
    return JSON.parse(document.exportToJson());
  } catch {
    try {
      return document.toDict();
    } catch {
      return EXPORT_ERROR_CONTENT;
    }
  }
}

/**
 * Writes `<root>/<host>/<title>.md` and `<root>/<host>/<title>.json`.
 */
export class FileArtifactWriter implements ArtifactWriter {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async write(
    document: ConvertedDocument,
    sourceUrl: string,
    destinationRoot: string,
  ): Promise<WrittenArtifacts> {
    const siteDir = path.join(destinationRoot, hostOf(sourceUrl));
    await fs.mkdir(siteDir, { recursive: true });

    const pageTitle = getPageTitle(document.markdown);
    const markdownPath = path.join(siteDir, `${pageTitle}.md`);
    await fs.writeFile(markdownPath, document.markdown, 'utf-8');

    const jsonData = {
      title: pageTitle,
      source_url: sourceUrl,
      processed_at: this.now().toISOString(),
      content: structuredContent(document),
      markdown: document.markdown,
    };
    const jsonPath = path.join(siteDir, `${pageTitle}.json`);
    await fs.writeFile(jsonPath, JSON.stringify(jsonData, null, 2), 'utf-8');

    console.log(`Files saved in: ${siteDir}`);
    return { siteDir, markdownPath, jsonPath };
  }
}
