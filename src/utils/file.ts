import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Prepends content to a text file, creating the file (and its directory) when it does not exist.
 *
 * Existing content is kept below the new content, separated by a single blank line. Trailing
 * whitespace of the new content is normalized so repeated runs produce consistent spacing.
 *
 * @param {string} filePath - Absolute path of the file.
 * @param {string} content - Markdown to place at the top of the file.
 */
export function prependToFile(filePath: string, content: string): void {
  const normalized = `${content.trimEnd()}\n`;

  if (!existsSync(filePath)) {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, normalized, 'utf8');
    return;
  }

  const existing = readFileSync(filePath, 'utf8');
  writeFileSync(filePath, existing.trim() === '' ? normalized : `${normalized}\n${existing}`, 'utf8');
}
