/**
 * Preference store: the four paths needed to launch everything else.
 * Stored as plain key=value lines; always rewritten in full, in canonical order.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { hasErrorCode } from '../lib/errors.js';

export interface Preferences {
  backendExecutablePath: string;
  modelFilePath: string;
  gatewayExecutablePath: string;
  workspaceDirectory: string;
}

export type PreferenceField = keyof Preferences;

/** Canonical order, also the order missing fields are prompted in */
export const PREFERENCE_FIELDS: readonly PreferenceField[] = [
  'backendExecutablePath',
  'modelFilePath',
  'gatewayExecutablePath',
  'workspaceDirectory',
];

export const PREFERENCE_KEYS: Record<PreferenceField, string> = {
  backendExecutablePath: 'backend_path',
  modelFilePath: 'model_path',
  gatewayExecutablePath: 'gateway_path',
  workspaceDirectory: 'workspace_dir',
};

const FIELD_BY_KEY = new Map<string, PreferenceField>(
  PREFERENCE_FIELDS.map((field) => [PREFERENCE_KEYS[field], field]),
);

/** Strip embedded quote characters (pasted "C:\path with spaces") and outer whitespace */
export function normalizePreferenceValue(raw: string): string {
  return raw.replace(/["']/g, '').trim();
}

export function parsePreferences(text: string): Partial<Preferences> {
  const prefs: Partial<Preferences> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const field = FIELD_BY_KEY.get(line.slice(0, eq).trim());
    if (!field) continue;
    const value = normalizePreferenceValue(line.slice(eq + 1));
    if (value) prefs[field] = value;
  }
  return prefs;
}

export function serializePreferences(prefs: Preferences): string {
  return PREFERENCE_FIELDS.map((field) => `${PREFERENCE_KEYS[field]}=${prefs[field]}`).join('\n') + '\n';
}

/** Load preferences; a missing file leaves all four unset */
export async function loadPreferences(file: string): Promise<Partial<Preferences>> {
  try {
    return parsePreferences(await fs.readFile(file, 'utf-8'));
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return {};
    throw err;
  }
}

export async function savePreferences(file: string, prefs: Preferences): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, serializePreferences(prefs), 'utf-8');
}

export function missingPreferences(prefs: Partial<Preferences>): PreferenceField[] {
  return PREFERENCE_FIELDS.filter((field) => !prefs[field]);
}

export function isComplete(prefs: Partial<Preferences>): prefs is Preferences {
  return missingPreferences(prefs).length === 0;
}
