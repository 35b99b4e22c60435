/**
 * PDF Export
 *
 * Prints the HTML report to A4 with a headless Chrome. Mermaid renders in the
 * page, so printing waits until every diagram is processed or the configured
 * wait runs out, whichever comes first.
 *
 * Dependencies:
 * - puppeteer-core: drives an installed Chrome/Chromium (no bundled browser)
 */
import { pathToFileURL } from 'node:url';
import puppeteer from 'puppeteer-core';
import { ReportGenerationError, errorMessage } from '../utils/errors.js';
import { researchLogger, type Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';

export interface PdfOptions {
  browserExecutable?: string;
  renderWaitMs: number;
  logger?: Logger;
}

const MERMAID_DONE = "document.querySelectorAll('pre.mermaid:not([data-processed])').length === 0";

export function resolveBrowserExecutable(
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return configured || env['PUPPETEER_EXECUTABLE_PATH'] || env['CHROME_PATH'] || undefined;
}

export async function renderPdf(
  htmlPath: string,
  pdfPath: string,
  options: PdfOptions
): Promise<Result<string, ReportGenerationError>> {
  const logger = options.logger ?? researchLogger;
  const executablePath = resolveBrowserExecutable(options.browserExecutable);
  if (!executablePath) {
    return err(
      new ReportGenerationError(
        'No browser for PDF export: set pdf.browser_executable, PUPPETEER_EXECUTABLE_PATH or CHROME_PATH'
      )
    );
  }

  try {
    const browser = await puppeteer.launch({ executablePath, headless: true, args: ['--no-sandbox'] });
    try {
      const page = await browser.newPage();
      await page.goto(pathToFileURL(htmlPath).href, { waitUntil: 'networkidle0' });

      try {
        await page.waitForFunction(MERMAID_DONE, { timeout: options.renderWaitMs });
      } catch (error) {
        logger.warn({ htmlPath, error: errorMessage(error) }, 'Diagrams not rendered before PDF export');
      }

      await page.pdf({
        path: pdfPath,
        format: 'A4',
        printBackground: true,
        margin: { top: '15mm', bottom: '15mm', left: '12mm', right: '12mm' },
      });
    } finally {
      await browser.close();
    }
  } catch (error) {
    return err(new ReportGenerationError(`PDF export failed: ${errorMessage(error)}`, { cause: error }));
  }

  logger.info({ pdfPath }, 'PDF exported');
  return ok(pdfPath);
}
