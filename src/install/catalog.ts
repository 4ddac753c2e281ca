/**
 * Package suggestion catalog for the pacstrap step.
 *
 * The catalog is data, read from `data/package-suggestions.json` at the
 * package root and validated field by field.
 *
 * @packageDocumentation
 */

import { fileURLToPath } from 'node:url';
import { safeReadText } from '../utils/safe-fs.js';

/**
 * A suggested package, optionally with a short note shown in parentheses.
 */
export interface PackageSuggestion {
  readonly name: string;
  readonly note?: string;
}

/**
 * One prompt of the package selection.
 */
export interface PackageCategory {
  readonly id: string;
  /** Paragraph shown before the suggestions. */
  readonly intro: string;
  readonly suggestions: readonly PackageSuggestion[];
  /** Pre-filled answer. */
  readonly defaults: readonly string[];
  /** Store config key whose value is appended to the defaults. */
  readonly defaultConfigKey?: string;
  /** Append the microcode package of the detected CPU to the defaults. */
  readonly guessMicrocode?: boolean;
}

/**
 * The whole catalog.
 */
export interface PackageCatalog {
  /** Packages always installed. */
  readonly base: readonly string[];
  readonly categories: readonly PackageCategory[];
}

/** Location of the bundled catalog. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../data/package-suggestions.json', import.meta.url)
);

/**
 * Error thrown when the catalog file is malformed.
 */
export class PackageCatalogError extends Error {
  /** Path of the offending field, e.g. `categories[2].intro`. */
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'PackageCatalogError';
    this.field = field;
  }
}

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, field: string): RawObject {
  if (!isRecord(value)) {
    throw new PackageCatalogError(`Invalid type for '${field}': expected object`, field);
  }
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new PackageCatalogError(`Invalid value for '${field}': expected non-empty string`, field);
  }
  return value;
}

function expectArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new PackageCatalogError(`Invalid type for '${field}': expected array`, field);
  }
  return value;
}

function expectStringArray(value: unknown, field: string): string[] {
  return expectArray(value, field).map((item, index) => expectString(item, `${field}[${String(index)}]`));
}

function parseSuggestion(value: unknown, field: string): PackageSuggestion {
  const raw = expectRecord(value, field);
  const name = expectString(raw.name, `${field}.name`);
  return raw.note === undefined ? { name } : { name, note: expectString(raw.note, `${field}.note`) };
}

function parseCategory(value: unknown, field: string): PackageCategory {
  const raw = expectRecord(value, field);
  const category: PackageCategory = {
    id: expectString(raw.id, `${field}.id`),
    intro: expectString(raw.intro, `${field}.intro`),
    suggestions: expectArray(raw.suggestions, `${field}.suggestions`).map((item, index) =>
      parseSuggestion(item, `${field}.suggestions[${String(index)}]`)
    ),
    defaults: expectStringArray(raw.defaults, `${field}.defaults`),
  };

  const withKey =
    raw.defaultConfigKey === undefined
      ? category
      : { ...category, defaultConfigKey: expectString(raw.defaultConfigKey, `${field}.defaultConfigKey`) };

  if (raw.guessMicrocode === undefined) {
    return withKey;
  }
  if (typeof raw.guessMicrocode !== 'boolean') {
    throw new PackageCatalogError(
      `Invalid type for '${field}.guessMicrocode': expected boolean`,
      `${field}.guessMicrocode`
    );
  }
  return { ...withKey, guessMicrocode: raw.guessMicrocode };
}

/**
 * Validates parsed JSON as a catalog.
 *
 * @param value - Parsed JSON.
 * @throws {PackageCatalogError} On the first malformed field.
 */
export function parsePackageCatalog(value: unknown): PackageCatalog {
  const raw = expectRecord(value, 'catalog');
  return {
    base: expectStringArray(raw.base, 'base'),
    categories: expectArray(raw.categories, 'categories').map((item, index) =>
      parseCategory(item, `categories[${String(index)}]`)
    ),
  };
}

/**
 * Reads and validates a catalog file.
 *
 * @param path - Catalog path; the bundled catalog by default.
 * @throws {PackageCatalogError} If the file is not valid JSON or malformed.
 */
export async function loadPackageCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<PackageCatalog> {
  const text = await safeReadText(path);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PackageCatalogError(`Invalid JSON in '${path}': ${reason}`, 'catalog');
  }
  return parsePackageCatalog(parsed);
}
