/**
 * Editing of the greetd configuration file
 */

import * as fs from 'node:fs/promises';

export const GREETD_CONFIG_PATH = '/etc/greetd/config.toml';

/**
 * Remove the `[initial_session]` table: its header and every line up to
 * the next table header.
 */
export function stripInitialSession(content: string): string {
  const kept: string[] = [];
  let skipping = false;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '[initial_session]') {
      skipping = true;
      continue;
    }
    if (skipping && trimmed.startsWith('[')) {
      skipping = false;
    }
    if (!skipping) {
      kept.push(line);
    }
  }

  return kept.join('\n');
}

export async function removeInitialSessionFrom(path: string = GREETD_CONFIG_PATH): Promise<boolean> {
  const content = await fs.readFile(path, 'utf8');
  const stripped = stripInitialSession(content);
  if (stripped === content) {
    return false;
  }
  await fs.writeFile(path, stripped);
  return true;
}
