import { EditorConstants } from '../constants';

/**
 * Per-document settings the host persists between sessions.
 */
export interface EditorPreferences {
  fontName: string;
  doubleSpaced: boolean;
  doubleSided: boolean;
  printerName?: string;
}

export type PreferenceKey = keyof EditorPreferences;

/**
 * Host-supplied storage for the serialized preference index.
 */
export interface PreferenceStore {
  read(): string | null;
  write(data: string): void;
}

export const DEFAULT_PREFERENCES: EditorPreferences = {
  fontName: EditorConstants.DEFAULT_FONT_NAME,
  doubleSpaced: false,
  doubleSided: true
};

/**
 * Index key used when no document path is given.
 */
export const DEFAULT_DOCUMENT_KEY = '*';

type PreferenceIndex = Record<string, Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a single stored value. Unknown keys are accepted so newer settings
 * files still load.
 */
export function validatePreference(key: string, value: unknown): boolean {
  switch (key) {
    case 'fontName':
      return typeof value === 'string' && value.trim().length > 0;
    case 'printerName':
      return value === undefined || typeof value === 'string';
    case 'doubleSpaced':
    case 'doubleSided':
      return typeof value === 'boolean';
    default:
      return true;
  }
}

function readIndex(store: PreferenceStore): PreferenceIndex {
  const raw = store.read();
  if (raw === null || raw.trim() === '') {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    console.warn('[Preferences] Could not parse stored preferences, using defaults:', error);
    return {};
  }

  if (!isRecord(data)) {
    console.warn('[Preferences] Stored preferences are not an object, using defaults');
    return {};
  }

  const index: PreferenceIndex = {};
  for (const [path, entry] of Object.entries(data)) {
    if (isRecord(entry)) {
      index[path] = entry;
    } else {
      console.warn(`[Preferences] Settings for "${path}" are not an object, ignoring`);
    }
  }
  return index;
}

function applyEntry(target: EditorPreferences, entry: Record<string, unknown>, path: string): void {
  for (const [key, value] of Object.entries(entry)) {
    if (!validatePreference(key, value)) {
      console.warn(`[Preferences] Ignoring invalid value for "${key}" in "${path}":`, value);
      continue;
    }
    if (key === 'fontName' && typeof value === 'string') {
      target.fontName = value;
    } else if (key === 'printerName' && typeof value === 'string') {
      target.printerName = value;
    } else if (key === 'doubleSpaced' && typeof value === 'boolean') {
      target.doubleSpaced = value;
    } else if (key === 'doubleSided' && typeof value === 'boolean') {
      target.doubleSided = value;
    }
  }
}

/**
 * Load preferences for a document. The `*` entry supplies defaults for every
 * document; the document's own entry overrides it field by field.
 */
export function loadPreferences(store: PreferenceStore, documentPath?: string): EditorPreferences {
  const index = readIndex(store);
  const preferences: EditorPreferences = { ...DEFAULT_PREFERENCES };

  const shared = index[DEFAULT_DOCUMENT_KEY];
  if (shared) {
    applyEntry(preferences, shared, DEFAULT_DOCUMENT_KEY);
  }

  if (documentPath !== undefined && documentPath !== DEFAULT_DOCUMENT_KEY) {
    const own = index[documentPath];
    if (own) {
      applyEntry(preferences, own, documentPath);
    }
  }

  return preferences;
}

/**
 * Store preferences for a document, keeping every other document's entry.
 */
export function savePreferences(store: PreferenceStore, preferences: EditorPreferences, documentPath?: string): void {
  const index = readIndex(store);
  const entry: Record<string, unknown> = {
    fontName: preferences.fontName,
    doubleSpaced: preferences.doubleSpaced,
    doubleSided: preferences.doubleSided
  };
  if (preferences.printerName !== undefined) {
    entry.printerName = preferences.printerName;
  }

  index[documentPath ?? DEFAULT_DOCUMENT_KEY] = entry;
  store.write(JSON.stringify(index, null, 2));
}

/**
 * A PreferenceStore kept in memory.
 */
export class MemoryPreferenceStore implements PreferenceStore {
  private data: string | null;

  constructor(initial: string | null = null) {
    this.data = initial;
  }

  read(): string | null {
    return this.data;
  }

  write(data: string): void {
    this.data = data;
  }
}
