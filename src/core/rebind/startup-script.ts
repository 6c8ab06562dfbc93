/**
 * Interpreter start-up script patching.
 *
 * The kernel executes this file on every start. Our snippet lives between
 * two marker comments so later runs replace it instead of stacking copies.
 */

import { STARTUP_MARKERS } from '../../constants/index.js';
import { readTextFileOrEmpty, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export function renderStartupSnippet(sitePackages: string): string {
  const lines = [
    'import sys',
    `sp = ${JSON.stringify(sitePackages)}`,
    'if sp not in sys.path:',
    '    sys.path.insert(0, sp)'
  ];
  return [
    STARTUP_MARKERS.BEGIN,
    'c.InteractiveShellApp.exec_lines = [',
    ...lines.map((line) => `    ${JSON.stringify(line)},`),
    ']',
    STARTUP_MARKERS.END
  ].join('\n');
}

/**
 * Replace the marked block in `content`, or append it
 */
export function upsertMarkedBlock(content: string, block: string): string {
  const begin = content.indexOf(STARTUP_MARKERS.BEGIN);
  const end = begin === -1 ? -1 : content.indexOf(STARTUP_MARKERS.END, begin);

  if (begin !== -1 && end !== -1) {
    return content.slice(0, begin) + block + content.slice(end + STARTUP_MARKERS.END.length);
  }

  if (content.length === 0) {
    return `${block}\n`;
  }
  const separator = content.endsWith('\n') ? '\n' : '\n\n';
  return `${content}${separator}${block}\n`;
}

export async function patchStartupScript(scriptPath: string, sitePackages: string): Promise<void> {
  const current = await readTextFileOrEmpty(scriptPath);
  await writeTextFile(scriptPath, upsertMarkedBlock(current, renderStartupSnippet(sitePackages)));
  logger.debug(`Patched start-up script ${scriptPath}`, { sitePackages });
}
