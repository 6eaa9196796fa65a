/**
 * Login user discovery from /etc/passwd
 */

import * as fs from 'node:fs/promises';
import { getLogger } from '@modegreet/core';

export interface UserRecord {
  username: string;
  displayName?: string;
}

export interface UidRange {
  min: number;
  max: number;
}

export interface DiscoverUsersOptions {
  passwdPath?: string;
  loginDefsPath?: string;
}

export const DEFAULT_UID_RANGE: UidRange = { min: 1000, max: 60000 };

const HIDDEN_USERS = new Set(['nobody', 'nfsnobody', 'greeter']);

export function parseLoginDefs(content: string): UidRange {
  const range = { ...DEFAULT_UID_RANGE };
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line.startsWith('#')) continue;
    const [key, value] = line.split(/\s+/);
    const parsed = Number.parseInt(value ?? '', 10);
    if (Number.isNaN(parsed)) continue;
    if (key === 'UID_MIN') range.min = parsed;
    if (key === 'UID_MAX') range.max = parsed;
  }
  return range;
}

export function parsePasswd(content: string, range: UidRange = DEFAULT_UID_RANGE): UserRecord[] {
  const users: UserRecord[] = [];

  for (const line of content.split('\n')) {
    const fields = line.split(':');
    if (fields.length < 7) continue;

    const [username = '', , uidField = '', , gecos = '', , shell = ''] = fields;
    const uid = Number.parseInt(uidField, 10);
    if (Number.isNaN(uid) || uid < range.min || uid > range.max) continue;
    if (shell.includes('nologin') || shell.includes('false')) continue;
    if (HIDDEN_USERS.has(username)) continue;

    const fullName = (gecos.split(',')[0] ?? '').trim();
    users.push(fullName.length > 0 && fullName !== username ? { username, displayName: fullName } : { username });
  }

  return users.sort((a, b) => a.username.localeCompare(b.username));
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (err) {
    getLogger('users').debug({ err, file }, 'File not readable');
    return null;
  }
}

export async function discoverUsers(options: DiscoverUsersOptions = {}): Promise<UserRecord[]> {
  const loginDefs = await readOptional(options.loginDefsPath ?? '/etc/login.defs');
  const passwd = await readOptional(options.passwdPath ?? '/etc/passwd');
  if (passwd === null) {
    return [];
  }
  return parsePasswd(passwd, loginDefs === null ? DEFAULT_UID_RANGE : parseLoginDefs(loginDefs));
}

export function findUser(users: UserRecord[], query: string): number {
  const needle = query.toLowerCase();
  return users.findIndex((u) => u.username.toLowerCase() === needle);
}
