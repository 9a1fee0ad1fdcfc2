/**
 * Environment configuration.
 *
 *   OP_WALLET_ADDRESS        sender wallet address URL (required)
 *   OP_KEY_ID                id of the registered public key (required)
 *   OP_PRIVATE_KEY_PATH      PEM file holding the Ed25519 private key (required)
 *   OP_AUTH_SERVER_URL       Authorization Server URL (required)
 *   OP_RESOURCE_SERVER_URL   Resource Server URL (required)
 *   OP_CLIENT_ID             client identifier sent in grant requests (default: OP_WALLET_ADDRESS)
 *   OP_REDIRECT_URI          finish URI for interactive grants (optional)
 *   OP_TIMEOUT_MS            per-request timeout (default: 30000)
 *   LOG_LEVEL                pino level (default: info)
 */
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './http.js';

const configSchema = z.object({
  OP_WALLET_ADDRESS: z.string().url(),
  OP_KEY_ID: z.string().min(1),
  OP_PRIVATE_KEY_PATH: z.string().min(1),
  OP_AUTH_SERVER_URL: z.string().url(),
  OP_RESOURCE_SERVER_URL: z.string().url(),
  OP_CLIENT_ID: z.string().min(1).optional(),
  OP_REDIRECT_URI: z.string().url().optional(),
  OP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface ClientConfig {
  walletAddress: string;
  keyId: string;
  privateKeyPath: string;
  authServerUrl: string;
  resourceServerUrl: string;
  clientId: string;
  redirectUri?: string;
  timeoutMs: number;
  logLevel: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ClientConfig {
  // Empty strings count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const cfg = parsed.data;
  return {
    walletAddress: cfg.OP_WALLET_ADDRESS,
    keyId: cfg.OP_KEY_ID,
    privateKeyPath: cfg.OP_PRIVATE_KEY_PATH,
    authServerUrl: cfg.OP_AUTH_SERVER_URL,
    resourceServerUrl: cfg.OP_RESOURCE_SERVER_URL,
    clientId: cfg.OP_CLIENT_ID ?? cfg.OP_WALLET_ADDRESS,
    ...(cfg.OP_REDIRECT_URI !== undefined && { redirectUri: cfg.OP_REDIRECT_URI }),
    timeoutMs: cfg.OP_TIMEOUT_MS,
    logLevel: cfg.LOG_LEVEL,
  };
}
