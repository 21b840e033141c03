import axios from 'axios';
import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';
import TurndownService from 'turndown';
import { ConversionError, errorMessage } from '../errors.js';
import type { ConvertedDocument, DocumentConverter } from '../types.js';
import { splitSections } from './sections.js';

const MAIN_CONTENT_SELECTOR = 'main, article, .main-content, #main-content';

const turndownService = new TurndownService({
  codeBlockStyle: 'fenced',
  headingStyle: 'atx',
});
turndownService.remove(['script', 'style', 'noscript']);

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36';

export type HtmlFetcher = (url: string) => Promise<string>;

/**
 * Builds the page fetcher used by the converter. A blank user agent falls
 * back to the default one.
 */
export function createPageFetcher(userAgent?: string): HtmlFetcher {
  const http = axios.create({
    headers: {
      'User-Agent': userAgent?.trim() || DEFAULT_USER_AGENT,
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    },
    timeout: 30000,
  });

  return async (url) => {
    const response = await http.get<string>(url, { responseType: 'text' });
    return response.data;
  };
}

interface PageMetadata {
  title: string | null;
  description: string | null;
  lang: string | null;
  siteName: string | null;
}

/**
 * Result of converting one HTML page. The structured export is derived from
 * the Markdown on demand.
 */
export class ConvertedPage implements ConvertedDocument {
  constructor(
    readonly sourceUrl: string,
    readonly markdown: string,
    private readonly metadata: PageMetadata,
    private readonly fetchedAt: Date,
  ) {}

  get title(): string | null {
    return this.metadata.title;
  }

  toDict(): Record<string, unknown> {
    return {
      schema_name: 'ConvertedDocument',
      version: '1.0.0',
      name: this.metadata.title ?? 'index',
      origin: {
        url: this.sourceUrl,
        mimetype: 'text/html',
        fetched_at: this.fetchedAt.toISOString(),
      },
      metadata: {
        title: this.metadata.title,
        description: this.metadata.description,
        lang: this.metadata.lang,
        site_name: this.metadata.siteName,
      },
      sections: splitSections(this.markdown),
    };
  }

  exportToJson(): string {
    return JSON.stringify(this.toDict());
  }
}

function textOf(element: Element | null): string | null {
  const text = element?.textContent?.replace(/\s+/g, ' ').trim();
  return text || null;
}

function metaContent(document: Document, selector: string): string | null {
  return (
    document.querySelector(selector)?.getAttribute('content')?.trim() || null
  );
}

/**
 * Picks the HTML to convert: the main content element when the page has one,
 * otherwise what Readability extracts, otherwise the whole body.
 */
function pickContentHtml(document: Document): string {
  const main = document.querySelector(MAIN_CONTENT_SELECTOR);
  if (main && textOf(main)) {
    return main.innerHTML;
  }

  // Readability mutates the document, so it runs after everything else is read
  const article = new Readability(document).parse();
  if (article?.content) {
    return article.content;
  }

  return document.body?.innerHTML ?? '';
}

export function convertHtml(
  html: string,
  url: string,
  fetchedAt: Date = new Date(),
): ConvertedPage {
  const dom = new JSDOM(html, { url });
  try {
    const { document } = dom.window;
    const metadata: PageMetadata = {
      title:
        textOf(document.querySelector('title')) ??
        textOf(document.querySelector('h1')),
      description:
        metaContent(document, "meta[name='description']") ??
        metaContent(document, "meta[property='og:description']"),
      lang: document.documentElement.getAttribute('lang')?.trim() || null,
      siteName: metaContent(document, "meta[property='og:site_name']"),
    };

    let markdown = turndownService.turndown(pickContentHtml(document)).trim();

    if (!/^#{1,6}\s/m.test(markdown) && metadata.title) {
      markdown = markdown
        ? `# ${metadata.title}\n\n${markdown}`
        : `# ${metadata.title}`;
    }

    if (!markdown) {
      throw new ConversionError('No content extracted', url);
    }

    return new ConvertedPage(url, markdown, metadata, fetchedAt);
  } finally {
    dom.window.close();
  }
}

/**
 * Converts web pages to Markdown plus a structured JSON export.
 */
export class HtmlDocumentConverter implements DocumentConverter {
  constructor(
    private readonly fetchHtml: HtmlFetcher = createPageFetcher(),
  ) {}

  async convert(url: string): Promise<ConvertedDocument> {
    let html: string;
    try {
      html = await this.fetchHtml(url);
    } catch (error) {
      throw new ConversionError(
        `Failed to fetch ${url}: ${errorMessage(error)}`,
        url,
      );
    }

    if (typeof html !== 'string' || !html.trim()) {
      throw new ConversionError(`Empty response from ${url}`, url);
    }

    try {
      return convertHtml(html, url);
    } catch (error) {
      if (error instanceof ConversionError) {
        throw error;
      }
      throw new ConversionError(
        `Failed to convert ${url}: ${errorMessage(error)}`,
        url,
      );
    }
  }
}
