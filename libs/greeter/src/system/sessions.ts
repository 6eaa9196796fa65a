/**
 * Desktop session discovery
 *
 * Reads the `*.desktop` entries under `wayland-sessions/` and `xsessions/`
 * of every XDG data directory.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseShell } from 'shell-quote';
import { getLogger } from '@modegreet/core';

export type SessionType = 'wayland' | 'x11';

export interface SessionRecord {
  name: string;
  /** File stem of the desktop entry */
  slug: string;
  exec: string;
  command: string[];
  desktopNames: string[];
  sessionType: SessionType;
}

export interface DiscoverSessionsOptions {
  /** Colon separated list, defaults to $XDG_DATA_DIRS */
  dataDirs?: string;
}

const DEFAULT_DATA_DIRS = '/usr/local/share:/usr/share';

const SESSION_DIRS: Array<[string, SessionType]> = [
  ['wayland-sessions', 'wayland'],
  ['xsessions', 'x11'],
];

/**
 * Split an Exec line into argv. Shell operators, globs and variable
 * references are kept as literal words.
 */
export function buildCommand(exec: string): string[] {
  return parseShell(exec, (key) => `$${key}`).map((entry) => {
    if (typeof entry === 'string') return entry;
    if ('op' in entry) return entry.op === 'glob' ? entry.pattern : entry.op;
    return entry.comment;
  });
}

export function buildEnv(session: SessionRecord): string[] {
  const env = [`XDG_SESSION_TYPE=${session.sessionType}`];
  if (session.desktopNames.length > 0) {
    env.push(`XDG_CURRENT_DESKTOP=${session.desktopNames.join(':')}`);
  }
  return env;
}

/**
 * Parse the `[Desktop Entry]` group of a desktop file. Returns null for
 * hidden entries and entries without Name or Exec.
 */
export function parseDesktopEntry(content: string, slug: string, sessionType: SessionType): SessionRecord | null {
  const fields = new Map<string, string>();
  let inEntry = false;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) continue;
    if (line.startsWith('[')) {
      inEntry = line === '[Desktop Entry]';
      continue;
    }
    if (!inEntry) continue;
    const eq = line.indexOf('=');
    if (eq === -1) continue;
    const key = line.slice(0, eq).trim();
    if (!fields.has(key)) {
      fields.set(key, line.slice(eq + 1).trim());
    }
  }

  if (fields.get('Hidden') === 'true' || fields.get('NoDisplay') === 'true') {
    return null;
  }

  const name = fields.get('Name');
  const exec = fields.get('Exec');
  if (!name || !exec) {
    return null;
  }

  const desktopNames = (fields.get('DesktopNames') ?? '')
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  return { name, slug, exec, command: buildCommand(exec), desktopNames, sessionType };
}

async function readSessionDir(dir: string, sessionType: SessionType): Promise<SessionRecord[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch {
    return [];
  }

  const sessions: SessionRecord[] = [];
  for (const entry of entries.filter((e) => e.endsWith('.desktop')).sort()) {
    const file = path.join(dir, entry);
    try {
      const session = parseDesktopEntry(await fs.readFile(file, 'utf8'), path.basename(entry, '.desktop'), sessionType);
      if (session) sessions.push(session);
    } catch (err) {
      getLogger('sessions').warn({ err, file }, 'Skipping unreadable desktop entry');
    }
  }
  return sessions;
}

export async function discoverSessions(options: DiscoverSessionsOptions = {}): Promise<SessionRecord[]> {
  const dataDirs = options.dataDirs || process.env['XDG_DATA_DIRS'] || DEFAULT_DATA_DIRS;

  const found: SessionRecord[] = [];
  for (const base of dataDirs.split(':').filter((d) => d.length > 0)) {
    for (const [subdir, sessionType] of SESSION_DIRS) {
      found.push(...(await readSessionDir(path.join(base, subdir), sessionType)));
    }
  }

  // Stable sort keeps discovery order among equal names, so the first
  // directory wins the slug
  found.sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));

  const seen = new Set<string>();
  return found.filter((session) => {
    if (seen.has(session.slug)) return false;
    seen.add(session.slug);
    return true;
  });
}

/**
 * First session whose name contains `query` (case-insensitive) or whose
 * slug equals it.
 */
export function findSession(sessions: SessionRecord[], query: string): number {
  const needle = query.toLowerCase();
  return sessions.findIndex((s) => s.name.toLowerCase().includes(needle) || s.slug.toLowerCase() === needle);
}
