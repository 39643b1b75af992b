import { join } from 'node:path';
import process from 'node:process';

export const HASHDIVE_DOMAIN = 'hashdive.com';
export const HASHDIVE_ORIGIN = 'https://hashdive.com';
export const HASHDIVE_WS_URL = 'wss://hashdive.com/_stcore/stream';
export const HASHDIVE_ANALYZE_USER_URL = `${HASHDIVE_ORIGIN}/Analyze_User`;

export const STREAMLIT_SUBPROTOCOL = 'streamlit';
export const XSRF_COOKIE = '_streamlit_xsrf';
export const REQUIRED_COOKIES = ['ajs_anonymous_id', '_streamlit_user', XSRF_COOKIE] as const;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/141.0.0.0 Safari/537.36';

export const REQUEST_SCHEMA = 'BackMsg';
export const RESPONSE_SCHEMA = 'ForwardMsg';
export const SCRIPT_FINISHED_SUCCESSFULLY = 'FINISHED_SUCCESSFULLY';

export const MAX_PAYLOAD_BYTES = 20 * 1024 * 1024;

export interface OpenOptions {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
}

export const DEFAULT_OPEN_OPTIONS: OpenOptions = {
  timeoutMs: 45_000,
  maxRetries: 3,
  backoffBaseMs: 2_000,
};

export interface StreamLimits {
  readonly maxFrames: number;
  readonly perFrameTimeoutMs?: number;
  readonly totalTimeoutMs: number;
}

export const DEFAULT_STREAM_LIMITS: StreamLimits = {
  maxFrames: 300,
  perFrameTimeoutMs: 10_000,
  totalTimeoutMs: 120_000,
};

export const KEEPALIVE_TIMEOUT_MS = 5_000;

export const DEFAULT_POOL_SIZE = 10;
export const DEFAULT_POOL_IDLE_TTL_MS = 300_000;
export const POOL_SWEEP_INTERVAL_MS = 60_000;

export const DEFAULT_CONCURRENCY = 1;
export const DEFAULT_PACE_MS = 1_000;

export const DEFAULT_INPUT_COLUMN = 'user_address';

export const defaultPaths = (baseDir: string = process.cwd()) =>
  ({
    input: join(baseDir, 'data', 'pages', 'users.csv'),
    output: join(baseDir, 'data', 'users'),
    dumps: join(baseDir, 'logs', 'messages'),
    template: join(baseDir, 'templates', 'analyze-user.json'),
    storageState: join(baseDir, 'state', 'storage', 'hashdive.json'),
    protoDir: join(baseDir, 'proto', 'streamlit'),
    logs: join(baseDir, 'logs'),
  }) as const;

export const LOGIN_TIMEOUT_MS = 5 * 60_000;
export const LOGIN_CHECK_INTERVAL_MS = 5_000;
