/**
 * Image Collector
 *
 * Runs an image search, downloads the hits that pass the format, content-type
 * and size checks into `<reportDir>/images/`, and optionally asks the vision
 * model for a description of each saved file.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ImageFormat } from '../llm/types.js';
import { IMAGE_FORMATS } from '../llm/types.js';
import { ModelError, ToolError, errorMessage } from '../utils/errors.js';
import { toolLogger, type Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';
import type { BraveSearchClient } from './search.js';
import type { ImageDescriber } from './web-reader.js';

export const MAX_IMAGES_PER_SEARCH = 10;

export interface CollectedImage {
  /** Relative to the report directory, so Markdown can link it directly. */
  path: string;
  title: string;
  description: string;
  source_url: string;
  width: number;
  height: number;
  format: string;
}

export interface ImageCollectorOptions {
  search: Pick<BraveSearchClient, 'imageSearch'>;
  reportDir: string;
  defaultMaxResults: number;
  maxBytes: number;
  allowedFormats: readonly string[];
  describeImages: boolean;
  describer?: ImageDescriber;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

function isImageFormat(value: string): value is ImageFormat {
  return (IMAGE_FORMATS as readonly string[]).includes(value);
}

/** Extension from the URL path, with `jpg` folded into `jpeg`. */
export function imageExtension(imageUrl: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(imageUrl).pathname;
  } catch {
    return null;
  }
  const last = pathname.split('/').pop() ?? '';
  if (!last.includes('.')) {
    return null;
  }
  const ext = (last.split('.').pop() ?? '').toLowerCase();
  return ext === 'jpg' ? 'jpeg' : ext;
}

export class ImageCollector {
  private readonly options: ImageCollectorOptions;
  private readonly fetch: typeof fetch;
  private readonly logger: Logger;

  constructor(options: ImageCollectorOptions) {
    this.options = options;
    this.fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? toolLogger;
  }

  async collect(query: string, maxResults?: number): Promise<Result<CollectedImage[], ToolError>> {
    const limit = Math.max(1, Math.min(maxResults ?? this.options.defaultMaxResults, MAX_IMAGES_PER_SEARCH));

    // Ask for extra hits since some will fail the download checks
    const hits = await this.options.search.imageSearch(query, limit * 2);
    if (!hits.ok) {
      return hits;
    }

    const images: CollectedImage[] = [];
    for (const hit of hits.value) {
      if (images.length >= limit) {
        break;
      }

      const ext = imageExtension(hit.imageUrl);
      if (!ext || !this.options.allowedFormats.includes(ext)) {
        continue;
      }

      const saved = await this.download(hit.imageUrl, ext);
      if (!saved.ok) {
        this.logger.warn({ url: hit.imageUrl, error: saved.error.message }, 'Image skipped');
        continue;
      }

      const description = await this.describe(saved.value.bytes, ext, saved.value.fileName);
      images.push({
        path: `./images/${saved.value.fileName}`,
        title: hit.title,
        description,
        source_url: hit.sourceUrl,
        width: hit.width,
        height: hit.height,
        format: ext,
      });
    }

    this.logger.info({ query, saved: images.length }, 'Images collected');
    return ok(images);
  }

  private async download(
    url: string,
    ext: string
  ): Promise<Result<{ fileName: string; bytes: Uint8Array }, ToolError>> {
    try {
      const response = await this.fetch(url, {
        signal: this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined,
      });

      if (response.status >= 300) {
        await response.body?.cancel();
        return err(new ToolError('image_search', `Image download failed: HTTP ${response.status}`));
      }

      const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
      if (!contentType.includes('image/')) {
        await response.body?.cancel();
        return err(new ToolError('image_search', `Not an image: ${contentType || 'unknown content type'}`));
      }

      const declared = Number(response.headers.get('content-length') ?? '0');
      if (declared > this.options.maxBytes) {
        await response.body?.cancel();
        return err(new ToolError('image_search', `Image too large: ${declared} bytes`));
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      if (bytes.byteLength > this.options.maxBytes) {
        return err(new ToolError('image_search', `Image too large: ${bytes.byteLength} bytes`));
      }

      const dir = join(this.options.reportDir, 'images');
      const fileName = `${crypto.randomUUID()}.${ext}`;
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, fileName), bytes);

      return ok({ fileName, bytes });
    } catch (error) {
      return err(new ToolError('image_search', `Image download failed: ${errorMessage(error)}`, { cause: error }));
    }
  }

  private async describe(bytes: Uint8Array, ext: string, fileName: string): Promise<string> {
    const { describer, describeImages } = this.options;
    if (!describeImages || !describer || !isImageFormat(ext)) {
      return '';
    }

    try {
      return await describer.describeImage(
        { type: 'image', format: ext, data: Buffer.from(bytes).toString('base64') },
        fileName
      );
    } catch (error) {
      if (error instanceof ModelError) throw error;
      this.logger.warn({ fileName, error: errorMessage(error) }, 'Image description failed');
      return '';
    }
  }
}
