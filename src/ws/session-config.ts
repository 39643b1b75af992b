import {
  DEFAULT_USER_AGENT,
  HASHDIVE_ORIGIN,
  HASHDIVE_WS_URL,
  MAX_PAYLOAD_BYTES,
  STREAMLIT_SUBPROTOCOL,
  XSRF_COOKIE,
} from '../config.js';

export type SessionConfig = {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly subprotocols: readonly string[];
  readonly maxPayload: number;
};

export type SessionConfigOptions = {
  readonly url?: string;
  readonly origin?: string;
  readonly userAgent?: string;
  readonly maxPayload?: number;
};

export function toCookieHeader(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * Deriva cabeceras y subprotocolos de la sesión a partir de las cookies. El
 * servidor exige el token XSRF como segundo subprotocolo.
 */
export function createSessionConfig(
  cookies: Readonly<Record<string, string>>,
  options: SessionConfigOptions = {},
): SessionConfig {
  const xsrfToken = cookies[XSRF_COOKIE];
  const subprotocols = [STREAMLIT_SUBPROTOCOL];
  if (xsrfToken) {
    subprotocols.push(xsrfToken);
  }

  return {
    url: options.url ?? HASHDIVE_WS_URL,
    headers: {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      Origin: options.origin ?? HASHDIVE_ORIGIN,
      Cookie: toCookieHeader(cookies),
    },
    subprotocols,
    maxPayload: options.maxPayload ?? MAX_PAYLOAD_BYTES,
  };
}
