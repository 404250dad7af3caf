const DEFAULT_PORT = 8700;
const DEFAULT_BIND_HOST = '0.0.0.0';
const DEFAULT_JSON_BODY_LIMIT = '1mb';

export interface ServiceConfig {
  port: number;
  bindHost: string;
  jsonBodyLimit: string;
}

export function parsePort(portRaw: string | undefined, fallbackPort: number): number {
  if (!portRaw) return fallbackPort;
  const parsed = Number.parseInt(portRaw, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    return fallbackPort;
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: parsePort(env.PORT, DEFAULT_PORT),
    bindHost: env.BIND_HOST || env.HOST || DEFAULT_BIND_HOST,
    jsonBodyLimit: env.JSON_BODY_LIMIT?.trim() || DEFAULT_JSON_BODY_LIMIT,
  };
}
