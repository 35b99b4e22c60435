/**
 * Write Tool
 *
 * Appends text to a file inside the report directory. Paths are resolved
 * against the report dir and anything that escapes it is refused.
 */
import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'node:path';
import { ToolError, errorMessage } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';

export async function appendToReportFile(
  reportDir: string,
  content: string,
  path: string
): Promise<Result<string, ToolError>> {
  const problems: string[] = [];
  if (content === '') problems.push('content is empty');
  if (path === '') problems.push('path is empty');
  if (problems.length > 0) {
    return err(new ToolError('write', problems.join(', ')));
  }

  const root = resolve(reportDir);
  const target = resolve(root, path);
  const rel = relative(root, target);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return err(new ToolError('write', `path must stay inside the report directory: ${path}`));
  }

  try {
    await mkdir(dirname(target), { recursive: true });
    await appendFile(target, `${content}\n`, 'utf-8');
    return ok(rel);
  } catch (error) {
    return err(new ToolError('write', `Could not write ${path}: ${errorMessage(error)}`, { cause: error }));
  }
}
