import { mkdirSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

const DEFAULT_SEGMENT = 'unknown';

function normaliseDirectory(directory: string | null | undefined): string | null {
  if (directory === null || directory === undefined) {
    return null;
  }
  const trimmed = directory.trim();
  if (!trimmed || trimmed === '.') {
    return null;
  }
  return trimmed;
}

export function ensureDirectorySync(directory: string | null | undefined): string | null {
  const normalised = normaliseDirectory(directory);
  if (!normalised) {
    return null;
  }
  mkdirSync(normalised, { recursive: true });
  return normalised;
}

export async function ensureDirectory(directory: string | null | undefined): Promise<string | null> {
  const normalised = normaliseDirectory(directory);
  if (!normalised) {
    return null;
  }
  await mkdir(normalised, { recursive: true });
  return normalised;
}

export async function ensureDirectoryForFile(filePath: string): Promise<string | null> {
  const directory = dirname(filePath);
  return ensureDirectory(directory);
}

const INVALID_SEGMENT_CHARACTERS = /[^0-9A-Za-z._-]+/g;
const DASH_TRIM = /^-+|-+$/g;
const DASH_DUPLICATES = /-{2,}/g;

/** Convierte un identificador arbitrario en un nombre de archivo seguro. */
export function formatSegmentForFilename(segment: string | null | undefined): string {
  if (segment === null || segment === undefined) {
    return DEFAULT_SEGMENT;
  }
  const raw = segment.trim();
  if (!raw) {
    return DEFAULT_SEGMENT;
  }
  const sanitised = raw
    .replace(/\s+/g, '-')
    .replace(INVALID_SEGMENT_CHARACTERS, '-')
    .replace(DASH_DUPLICATES, '-')
    .replace(DASH_TRIM, '');
  return sanitised || DEFAULT_SEGMENT;
}
