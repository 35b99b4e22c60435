import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { researchLogger, type Logger } from '../utils/logger.js';
import { renderHtmlDocument, renderMarkdownDocument } from './markdown.js';
import { renderPdf } from './pdf.js';

export interface SaveReportOptions {
  createdAt?: Date;
  pdf?: { enabled: boolean; browserExecutable?: string; renderWaitMs: number };
  logger?: Logger;
}

export interface SavedReport {
  markdownPath: string;
  htmlPath: string;
  pdfPath?: string;
}

/**
 * Writes report.md and report.html into `dir`, and report.pdf when enabled.
 * A failed PDF export is logged and leaves `pdfPath` unset.
 */
export async function saveReport(
  dir: string,
  title: string,
  body: string,
  options: SaveReportOptions = {}
): Promise<SavedReport> {
  const logger = options.logger ?? researchLogger;
  const createdAt = options.createdAt ?? new Date();
  const markdownPath = join(dir, 'report.md');
  const htmlPath = join(dir, 'report.html');

  await mkdir(dir, { recursive: true });
  await writeFile(markdownPath, renderMarkdownDocument(title, createdAt, body), 'utf-8');
  await writeFile(htmlPath, renderHtmlDocument(title, createdAt, body), 'utf-8');
  logger.info({ markdownPath, htmlPath }, 'Report saved');

  if (!options.pdf?.enabled) {
    return { markdownPath, htmlPath };
  }

  const pdf = await renderPdf(htmlPath, join(dir, 'report.pdf'), {
    browserExecutable: options.pdf.browserExecutable,
    renderWaitMs: options.pdf.renderWaitMs,
    logger,
  });
  if (!pdf.ok) {
    logger.warn({ error: pdf.error.message }, 'PDF export skipped');
    return { markdownPath, htmlPath };
  }
  return { markdownPath, htmlPath, pdfPath: pdf.value };
}
