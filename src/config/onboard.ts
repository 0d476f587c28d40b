/**
 * Interactive capture of missing preferences
 * Uses @clack/prompts for consistent CLI experience
 */

import { text, isCancel } from '@clack/prompts';
import {
  PREFERENCE_FIELDS,
  normalizePreferenceValue,
  type PreferenceField,
  type Preferences,
} from './preferences.js';
import { SetupCancelledError } from '../lib/errors.js';

export type AskFn = (field: PreferenceField, current?: string) => Promise<string>;

export const PREFERENCE_PROMPTS: Record<PreferenceField, { message: string; placeholder: string }> = {
  backendExecutablePath: {
    message: 'Path to the inference backend executable',
    placeholder: 'C:\\llama.cpp\\build\\bin\\llama-server.exe',
  },
  modelFilePath: {
    message: 'Path to the model file',
    placeholder: 'D:\\models\\phi-3.gguf',
  },
  gatewayExecutablePath: {
    message: 'Path to the agent gateway executable',
    placeholder: 'C:\\gateway\\agent-gateway.exe',
  },
  workspaceDirectory: {
    message: 'Agent workspace directory',
    placeholder: 'C:\\clawd',
  },
};

/** Default prompt: a clack text input that refuses blank answers */
export const askWithClack: AskFn = async (field, current) => {
  const { message, placeholder } = PREFERENCE_PROMPTS[field];
  const answer = await text({
    message,
    placeholder: current ?? placeholder,
    defaultValue: current,
    validate: (v) => {
      if (!normalizePreferenceValue(v ?? '') && !current) return 'A path is required';
    },
  });
  if (isCancel(answer)) throw new SetupCancelledError();
  return answer;
};

/**
 * Fill every missing field, prompting in canonical order.
 * Answers are normalized; a blank answer re-prompts the same field.
 */
export async function capturePreferences(
  partial: Partial<Preferences>,
  ask: AskFn = askWithClack,
): Promise<Preferences> {
  const result: Partial<Preferences> = { ...partial };
  for (const field of PREFERENCE_FIELDS) {
    let value = result[field];
    while (!value) {
      value = normalizePreferenceValue(await ask(field));
    }
    result[field] = value;
  }
  return {
    backendExecutablePath: requireField(result, 'backendExecutablePath'),
    modelFilePath: requireField(result, 'modelFilePath'),
    gatewayExecutablePath: requireField(result, 'gatewayExecutablePath'),
    workspaceDirectory: requireField(result, 'workspaceDirectory'),
  };
}

/** Re-prompt all four fields, offering the current values as defaults */
export async function editPreferences(
  current: Partial<Preferences>,
  ask: AskFn = askWithClack,
): Promise<Preferences> {
  const edited: Partial<Preferences> = {};
  for (const field of PREFERENCE_FIELDS) {
    const value = normalizePreferenceValue(await ask(field, current[field]));
    edited[field] = value || current[field];
  }
  return capturePreferences(edited, ask);
}

function requireField(prefs: Partial<Preferences>, field: PreferenceField): string {
  const value = prefs[field];
  if (!value) throw new Error(`Preference ${field} was not captured`);
  return value;
}
