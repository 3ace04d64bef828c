import { loadConfig, type CookieVaultConfig, type Env } from '@cookie-vault/cookies';
import { ConfigError } from '@cookie-vault/crypto';

export interface ServerConfig extends CookieVaultConfig {
  port: number;
  host: string;
  logLevel: string;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const port = parseInt(env.PORT || '3001', 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be between 0 and 65535, got "${env.PORT}"`);
  }

  return {
    ...loadConfig(env),
    port,
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
  };
}
