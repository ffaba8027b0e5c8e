/**
 * Configuration module for the OneDrive client.
 *
 * Settings arrive as the snake_case JSON object users keep in a settings file.
 * They are validated with zod before anything touches the network and mapped
 * to a typed {@link OneDriveConfig}.
 *
 * @module config
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';

/**
 * Retry and heartbeat policy used by the connection guard.
 */
export interface RetryPolicy {
  /** Maximum number of connection attempts (>= 1) */
  readonly maxAttempts: number;

  /** Fixed delay in milliseconds between two failed connection attempts */
  readonly perAttemptDelayMs: number;

  /** Token age in milliseconds after which the heartbeat refreshes it */
  readonly refreshIntervalMs: number;
}

/**
 * Validated client configuration.
 */
export interface OneDriveConfig {
  /** Maximum number of concurrent transfers in one batch */
  readonly maxConcurrency: number;

  /** Refresh token used to obtain the first access token */
  readonly refreshToken: string;

  /** Graph API base URL, always ending with a slash */
  readonly baseUrl: string;

  /** OAuth 2.0 token endpoint */
  readonly authUrl: string;

  /** ID of the registered application */
  readonly clientId: string;

  /** Requested permission scopes */
  readonly permissions: readonly string[];

  /** Redirect URI registered with the application */
  readonly redirectUri: string;

  /** Per-request timeout in milliseconds */
  readonly requestTimeoutMs: number;

  readonly retryPolicy: RetryPolicy;
}

/**
 * Default token refresh interval in seconds (1 hour).
 */
export const DEFAULT_REFRESH_INTERVAL_SECONDS = 3600;

/**
 * Default number of connection attempts.
 */
export const DEFAULT_CONNECTION_ATTEMPTS = 50;

/**
 * Default delay between connection attempts in milliseconds.
 */
export const DEFAULT_RETRY_DELAY_MS = 500;

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 300000;

/**
 * Zod schema for the settings file.
 */
export const SettingsSchema = z.object({
  max_threads: z.number().int().positive('max_threads must be a positive integer'),
  refresh_token: z.string().min(1, 'refresh_token is required'),
  browse_url: z.string().url('browse_url must be a URL'),
  auth_url: z.string().url('auth_url must be a URL'),
  client_id: z.string().min(1, 'client_id is required'),
  permissions: z.array(z.string().min(1)),
  redirect_uri: z.string(),
  refresh_interval: z.number().int().positive().default(DEFAULT_REFRESH_INTERVAL_SECONDS),
  number_retry_connection: z.number().int().positive().default(DEFAULT_CONNECTION_ATTEMPTS),
  retry_delay_ms: z.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS),
  request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
});

/**
 * Raw settings as written in the settings file.
 */
export type Settings = z.input<typeof SettingsSchema>;

/**
 * Validate raw settings and build the client configuration.
 *
 * @param raw - Parsed settings object
 * @throws {ConfigurationError} If a required setting is missing or a setting has the wrong type
 *
 * @example
 * ```typescript
 * const config = parseSettings({
 *   max_threads: 4,
 *   refresh_token: 'your-refresh-token',
 *   browse_url: 'https://graph.microsoft.com/v1.0/',
 *   auth_url: 'https://login.microsoftonline.com/common/oauth2/v2.0/token',
 *   client_id: 'your-client-id',
 *   permissions: ['Files.ReadWrite.All', 'offline_access'],
 *   redirect_uri: 'https://login.microsoftonline.com/common/oauth2/nativeclient',
 * });
 * ```
 */
export function parseSettings(raw: unknown): OneDriveConfig {
  const result = SettingsSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues;
    const missing = issues.some(
      (issue) => issue.code === 'invalid_type' && issue.received === 'undefined'
    );
    const details = issues
      .map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
      .join('; ');

    throw new ConfigurationError(
      `Invalid OneDrive settings: ${details}`,
      missing ? 'MissingRequired' : 'InvalidValue',
      { issues }
    );
  }

  const settings = result.data;

  return {
    maxConcurrency: settings.max_threads,
    refreshToken: settings.refresh_token,
    baseUrl: settings.browse_url.endsWith('/') ? settings.browse_url : `${settings.browse_url}/`,
    authUrl: settings.auth_url,
    clientId: settings.client_id,
    permissions: settings.permissions,
    redirectUri: settings.redirect_uri,
    requestTimeoutMs: settings.request_timeout_ms,
    retryPolicy: {
      maxAttempts: settings.number_retry_connection,
      perAttemptDelayMs: settings.retry_delay_ms,
      refreshIntervalMs: settings.refresh_interval * 1000,
    },
  };
}

/**
 * Read a settings JSON file and validate it.
 *
 * @param path - Path to the settings file
 * @throws {ConfigurationError} If the file cannot be read, is not JSON, or is invalid
 */
export async function loadSettingsFile(path: string): Promise<OneDriveConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Could not read settings file ${path}: ${errorMessage(error)}`,
      'InvalidFile',
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Settings file ${path} is not valid JSON: ${errorMessage(error)}`,
      'InvalidFile',
      { cause: error }
    );
  }

  return parseSettings(raw);
}

/**
 * Type guard distinguishing an already validated config from raw settings.
 */
export function isOneDriveConfig(value: unknown): value is OneDriveConfig {
  return (
    typeof value === 'object' &&
    value !== null &&
    'retryPolicy' in value &&
    'maxConcurrency' in value
  );
}
