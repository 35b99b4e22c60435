/**
 * Web Reader Tool
 *
 * Fetches a URL and turns it into text the model can read. The response is
 * classified by content type first: HTML is stripped down to readable text,
 * plain text formats pass through, images go to the vision describer, and
 * office/PDF documents get a placeholder. Binary bytes never reach the text
 * path, and bodies over the configured byte ceiling are rejected.
 */
import type { ImageBlock, ImageFormat } from '../llm/types.js';
import { ModelError, ToolError, errorMessage } from '../utils/errors.js';
import { toolLogger, type Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';

export type ContentKind = 'html' | 'text' | 'image' | 'document';

export interface FetchedContent {
  url: string;
  title: string;
  text: string;
  contentType: string;
  kind: ContentKind;
}

/** Anything that can turn an image into a description (the model gateway). */
export interface ImageDescriber {
  describeImage(image: ImageBlock, name: string): Promise<string>;
}

export interface WebReaderOptions {
  maxBytes: number;
  maxContentChars: number;
  describeImages: boolean;
  allowedImageFormats: readonly string[];
  describer?: ImageDescriber;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const USER_AGENT = 'Mozilla/5.0 (compatible; deepreport/1.0)';

const TEXT_TYPES = new Set(['text/plain', 'text/markdown', 'text/csv', 'application/json']);

const DOCUMENT_TYPES: Record<string, string> = {
  'application/pdf': 'PDF',
  'application/msword': 'Word',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'Word',
  'application/vnd.ms-excel': 'Excel',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'Excel',
  'application/vnd.ms-powerpoint': 'PowerPoint',
  'application/vnd.openxmlformats-officedocument.presentationml.presentation': 'PowerPoint',
};

const STRIPPED_ELEMENTS = ['script', 'style', 'noscript', 'nav', 'header', 'footer'];

export function classifyContentType(contentType: string): ContentKind | null {
  if (contentType === 'text/html' || contentType === 'application/xhtml+xml') return 'html';
  if (TEXT_TYPES.has(contentType)) return 'text';
  if (contentType.startsWith('image/')) return 'image';
  if (contentType in DOCUMENT_TYPES) return 'document';
  return null;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function codePoint(code: number): string {
  return Number.isInteger(code) && code <= 0x10ffff ? String.fromCodePoint(code) : '\uFFFD';
}

/** Reads the `charset` parameter of a Content-Type header value. */
export function charsetOf(contentType: string): string | undefined {
  return /charset\s*=\s*["']?([\w.:-]+)/i.exec(contentType)?.[1];
}

function metaCharset(bytes: Uint8Array): string | undefined {
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 2048));
  const meta = /<meta\s[^>]*charset\s*=\s*["']?([\w.:-]+)/i.exec(head);
  return meta?.[1];
}

/** Decodes with the named encoding, or UTF-8 when the label is missing or unknown. */
export function decodeText(bytes: Uint8Array, label: string | undefined): string {
  if (label) {
    try {
      return new TextDecoder(label).decode(bytes);
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
    }
  }
  return new TextDecoder('utf-8').decode(bytes);
}

function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&mdash;/g, '—')
    .replace(/&ndash;/g, '–')
    .replace(/&#(\d+);/g, (_, code: string) => codePoint(Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (_, code: string) => codePoint(Number.parseInt(code, 16)))
    .replace(/&amp;/g, '&');
}

export function extractTitle(html: string): string {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  return match ? decodeEntities(match[1]).replace(/\s+/g, ' ').trim() : '';
}

export function extractTextFromHtml(html: string): string {
  let text = html.replace(/<!--[\s\S]*?-->/g, '');

  // Drop page chrome and code along with its content
  for (const tag of STRIPPED_ELEMENTS) {
    text = text.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}>`, 'gi'), '');
  }
  text = text.replace(/<title[^>]*>[\s\S]*?<\/title>/gi, '');

  // Block-level boundaries become line breaks
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/(p|div|li|tr|h[1-6]|section|article|blockquote|pre|table)>/gi, '\n');

  text = text.replace(/<[^>]+>/g, ' ');
  text = decodeEntities(text);

  return text
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v\r]{2,}/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

function titleFromUrl(url: string): string {
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    return decodeURIComponent(segments.at(-1) ?? url);
  } catch {
    return url;
  }
}

function imageFormatOf(contentType: string): ImageFormat | null {
  const subtype = contentType.slice('image/'.length);
  switch (subtype) {
    case 'jpeg':
    case 'jpg':
      return 'jpeg';
    case 'png':
      return 'png';
    case 'gif':
      return 'gif';
    case 'webp':
      return 'webp';
    default:
      return null;
  }
}

export class WebReader {
  private readonly options: WebReaderOptions;
  private readonly fetch: typeof fetch;
  private readonly logger: Logger;

  constructor(options: WebReaderOptions) {
    this.options = options;
    this.fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? toolLogger;
  }

  async fetchContent(url: string): Promise<Result<FetchedContent, ToolError>> {
    let response: Response;
    try {
      response = await this.fetch(url, {
        headers: { 'User-Agent': USER_AGENT },
        signal: this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined,
      });
    } catch (error) {
      return err(new ToolError('get_content', `Could not fetch ${url}: ${errorMessage(error)}`, { cause: error }));
    }

    if (response.status >= 300) {
      await response.body?.cancel();
      return err(new ToolError('get_content', `Could not fetch ${url}: HTTP ${response.status}`));
    }

    const rawContentType = response.headers.get('content-type') ?? '';
    const contentType = rawContentType.toLowerCase().split(';')[0].trim();
    const kind = classifyContentType(contentType);
    this.logger.debug({ url, contentType, kind }, 'Fetched content');

    if (!kind) {
      await response.body?.cancel();
      return err(
        new ToolError('get_content', `Content type ${contentType || 'unknown'} at ${url} cannot be processed`)
      );
    }

    const declaredLength = Number(response.headers.get('content-length') ?? '0');
    if (declaredLength > this.options.maxBytes) {
      await response.body?.cancel();
      return err(this.oversize(url, declaredLength));
    }

    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      return err(new ToolError('get_content', `Could not read ${url}: ${errorMessage(error)}`, { cause: error }));
    }
    if (bytes.byteLength > this.options.maxBytes) {
      return err(this.oversize(url, bytes.byteLength));
    }

    switch (kind) {
      case 'html': {
        const html = decodeText(bytes, charsetOf(rawContentType) ?? metaCharset(bytes));
        const title = extractTitle(html) || titleFromUrl(url);
        return ok({ url, title, text: this.limit(extractTextFromHtml(html)), contentType, kind });
      }
      case 'text': {
        const text = decodeText(bytes, charsetOf(rawContentType)).trim();
        return ok({ url, title: titleFromUrl(url), text: this.limit(text), contentType, kind });
      }
      case 'image':
        return this.describeImage(url, contentType, bytes);
      case 'document': {
        const label = DOCUMENT_TYPES[contentType];
        const text = `[${label} document (${contentType}, ${formatBytes(bytes.byteLength)}) at ${url}. Binary content was not extracted.]`;
        return ok({ url, title: titleFromUrl(url), text, contentType, kind });
      }
    }
  }

  private async describeImage(
    url: string,
    contentType: string,
    bytes: Uint8Array
  ): Promise<Result<FetchedContent, ToolError>> {
    const title = titleFromUrl(url);
    const format = imageFormatOf(contentType);
    const placeholder = `[Image (${contentType}, ${formatBytes(bytes.byteLength)}) at ${url}. No description available.]`;

    if (!format || !this.options.allowedImageFormats.includes(format) || !this.options.describeImages || !this.options.describer) {
      return ok({ url, title, text: placeholder, contentType, kind: 'image' });
    }

    try {
      const description = await this.options.describer.describeImage(
        { type: 'image', format, data: Buffer.from(bytes).toString('base64') },
        title
      );
      return ok({ url, title, text: `[Image description]\n${description}`, contentType, kind: 'image' });
    } catch (error) {
      if (error instanceof ModelError) throw error;
      return err(new ToolError('get_content', `Could not describe image at ${url}: ${errorMessage(error)}`, { cause: error }));
    }
  }

  private limit(text: string): string {
    const max = this.options.maxContentChars;
    if (text.length <= max) {
      return text;
    }
    return `${text.slice(0, max)}\n\n[Content truncated: ${max} of ${text.length} characters shown]`;
  }

  private oversize(url: string, size: number): ToolError {
    return new ToolError(
      'get_content',
      `Document at ${url} is ${formatBytes(size)}, over the ${formatBytes(this.options.maxBytes)} limit`
    );
  }
}
