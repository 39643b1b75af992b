import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { CredentialsError } from '../errors.js';

export type Credentials = Readonly<Record<string, string>>;

export type CredentialSourceOptions = {
  /** Archivo de estado guardado por `context.storageState()` de Playwright. */
  readonly storageStatePath?: string;
  /** Cabecera `Cookie` literal (`a=1; b=2`); tiene prioridad sobre el archivo. */
  readonly override?: string;
};

const StorageStateSchema = z.object({
  cookies: z
    .array(
      z
        .object({
          name: z.string(),
          value: z.string(),
          domain: z.string().default(''),
        })
        .passthrough(),
    )
    .default([]),
});

export type StorageState = z.infer<typeof StorageStateSchema>;

/**
 * `.hashdive.com`, `hashdive.com` y `www.hashdive.com` casan con `hashdive.com`;
 * `notahashdive.com` no. La comparación es por etiquetas completas.
 */
export function matchesDomain(cookieDomain: string, domain: string): boolean {
  const normalised = cookieDomain.replace(/^\.+/, '').toLowerCase();
  const target = domain.toLowerCase();
  if (!normalised) {
    return false;
  }
  return normalised === target || normalised.endsWith(`.${target}`) || target.endsWith(`.${normalised}`);
}

export function parseCookieHeader(header: string): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    const name = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (name) {
      cookies[name] = value;
    }
  }
  return cookies;
}

export function selectCookies(
  state: StorageState,
  domain: string,
  names?: readonly string[],
): Record<string, string> {
  const selected: Record<string, string> = {};
  for (const cookie of state.cookies) {
    if (!matchesDomain(cookie.domain, domain)) {
      continue;
    }
    if (names && !names.includes(cookie.name)) {
      continue;
    }
    selected[cookie.name] = cookie.value;
  }
  return selected;
}

async function readStorageState(filePath: string): Promise<StorageState | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch {
    throw new CredentialsError(`Estado de sesión inválido en ${filePath}: no es JSON.`, []);
  }

  const parsed = StorageStateSchema.safeParse(value);
  if (!parsed.success) {
    throw new CredentialsError(`Estado de sesión inválido en ${filePath}: ${parsed.error.message}`, []);
  }
  return parsed.data;
}

/**
 * Devuelve las cookies de `domain` (filtradas por `names` si se indica). Las
 * cookies del override ganan sobre las del archivo de estado.
 */
export async function getCredentials(
  domain: string,
  names: readonly string[] | undefined,
  options: CredentialSourceOptions = {},
): Promise<Credentials> {
  const fromFile = options.storageStatePath ? await readStorageState(options.storageStatePath) : null;
  const cookies = fromFile ? selectCookies(fromFile, domain, names) : {};

  if (options.override) {
    for (const [name, value] of Object.entries(parseCookieHeader(options.override))) {
      if (!names || names.includes(name)) {
        cookies[name] = value;
      }
    }
  }

  return cookies;
}

export function missingCredentials(credentials: Credentials, names: readonly string[]): string[] {
  return names.filter((name) => !credentials[name]);
}

export async function requireCredentials(
  domain: string,
  names: readonly string[],
  options: CredentialSourceOptions = {},
): Promise<Credentials> {
  const credentials = await getCredentials(domain, names, options);
  const missing = missingCredentials(credentials, names);
  if (missing.length) {
    throw new CredentialsError(
      `Faltan cookies de ${domain}: ${missing.join(', ')}. Ejecute "hashdive-stream session" o defina HASHDIVE_COOKIES.`,
      missing,
    );
  }
  return credentials;
}
