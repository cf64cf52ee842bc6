import fp from 'fastify-plugin';
import type { AccessPolicy } from '@promptdeck/shared';

// Type-safe configuration interface
export interface AppConfig {
  port: number;
  host: string;
  databaseUrl: string;
  logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  nodeEnv: string;
  sessionDuration: number; // seconds
  secureCookies: boolean;
  trustProxy: boolean;
  accessPolicy: AccessPolicy;
  adminEmails: string[];
  oidcIssuer?: string;
  oidcClientId?: string;
  oidcClientSecret?: string;
  oidcRedirectUri?: string;
  oidcAllowedDomain?: string;
  oidcEnabled: boolean;
  maxAttachments: number;
  mergeHistorySize: number;
  defaultPageSize: number;
}

// Type augmentation: makes fastify.config available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

const LOG_LEVELS: readonly AppConfig['logLevel'][] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

const ACCESS_POLICIES: readonly AccessPolicy[] = [
  'allowlist_then_approval',
  'allowlist_strict',
  'open',
];

function isLogLevel(value: string): value is AppConfig['logLevel'] {
  return LOG_LEVELS.some((level) => level === value);
}

function isAccessPolicy(value: string): value is AccessPolicy {
  return ACCESS_POLICIES.some((policy) => policy === value);
}

/**
 * Pure function to load and validate configuration from environment variables.
 *
 * @param env - Environment variables object (e.g., process.env)
 * @returns Validated AppConfig
 * @throws Error if configuration is invalid (lists all validation errors)
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const errors: string[] = [];

  // Helper to treat empty strings as undefined
  const getValue = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  const parseBoolean = (key: string, fallback: boolean): boolean => {
    const raw = getValue(key);
    if (raw === undefined) return fallback;
    const normalized = raw.toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    errors.push(`${key} must be 'true' or 'false', got: ${raw}`);
    return fallback;
  };

  const parsePositiveInt = (key: string, fallback: number): number => {
    const raw = getValue(key);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      errors.push(`${key} must be a valid number, got: ${raw}`);
      return fallback;
    }
    if (value <= 0) {
      errors.push(`${key} must be greater than 0, got: ${value}`);
      return fallback;
    }
    return value;
  };

  // Parse and validate PORT
  const portStr = getValue('PORT') ?? '3000';
  let port = Number(portStr);
  if (!Number.isInteger(port)) {
    errors.push(`PORT must be a valid number, got: ${portStr}`);
    port = 3000;
  } else if (port < 0 || port > 65535) {
    errors.push(`PORT must be in range 0-65535, got: ${port}`);
  }

  const host = getValue('HOST') ?? '0.0.0.0';
  const databaseUrl = getValue('DATABASE_URL') ?? '/app/data/promptdeck.db';

  // Parse and validate LOG_LEVEL
  const logLevelStr = (getValue('LOG_LEVEL') ?? 'info').toLowerCase();
  let logLevel: AppConfig['logLevel'] = 'info';
  if (isLogLevel(logLevelStr)) {
    logLevel = logLevelStr;
  } else {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got: ${getValue('LOG_LEVEL')}`);
  }

  const nodeEnv = getValue('NODE_ENV') ?? 'production';
  const sessionDuration = parsePositiveInt('SESSION_DURATION', 604800);
  const secureCookies = parseBoolean('SECURE_COOKIES', true);
  const trustProxy = parseBoolean('TRUST_PROXY', false);

  // Access policy for first-time logins
  const accessPolicyStr = (getValue('ACCESS_POLICY') ?? 'allowlist_then_approval').toLowerCase();
  let accessPolicy: AccessPolicy = 'allowlist_then_approval';
  if (isAccessPolicy(accessPolicyStr)) {
    accessPolicy = accessPolicyStr;
  } else {
    errors.push(
      `ACCESS_POLICY must be one of ${ACCESS_POLICIES.join(', ')}, got: ${getValue('ACCESS_POLICY')}`,
    );
  }

  // ADMINS: comma-separated list of emails that are always admins
  const adminEmails = (getValue('ADMINS') ?? '')
    .split(',')
    .map((email) => email.trim().toLowerCase())
    .filter((email) => email.length > 0);

  // OIDC configuration (all optional)
  const oidcIssuer = getValue('OIDC_ISSUER');
  const oidcClientId = getValue('OIDC_CLIENT_ID');
  const oidcClientSecret = getValue('OIDC_CLIENT_SECRET');
  const oidcRedirectUri = getValue('OIDC_REDIRECT_URI');
  const oidcAllowedDomain = getValue('OIDC_ALLOWED_DOMAIN')?.toLowerCase();

  // OIDC is enabled only when ALL four variables are set
  const oidcEnabled = !!(oidcIssuer && oidcClientId && oidcClientSecret && oidcRedirectUri);

  const maxAttachments = parsePositiveInt('MAX_ATTACHMENTS', 10);
  const mergeHistorySize = parsePositiveInt('MERGE_HISTORY_SIZE', 100);
  const defaultPageSize = parsePositiveInt('DEFAULT_PAGE_SIZE', 20);
  if (defaultPageSize > 100) {
    errors.push(`DEFAULT_PAGE_SIZE must be at most 100, got: ${defaultPageSize}`);
  }

  // If there are any validation errors, throw a single error listing all of them
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }

  return {
    port,
    host,
    databaseUrl,
    logLevel,
    nodeEnv,
    sessionDuration,
    secureCookies,
    trustProxy,
    accessPolicy,
    adminEmails,
    oidcIssuer,
    oidcClientId,
    oidcClientSecret,
    oidcRedirectUri,
    oidcAllowedDomain,
    oidcEnabled,
    maxAttachments,
    mergeHistorySize,
    defaultPageSize,
  };
}

export default fp(
  async function configPlugin(fastify) {
    const config = loadConfig(process.env);

    // Log the configuration (excluding sensitive values like oidcClientSecret)
    fastify.log.info(
      {
        port: config.port,
        host: config.host,
        databaseUrl: config.databaseUrl,
        logLevel: config.logLevel,
        nodeEnv: config.nodeEnv,
        sessionDuration: config.sessionDuration,
        secureCookies: config.secureCookies,
        trustProxy: config.trustProxy,
        accessPolicy: config.accessPolicy,
        adminCount: config.adminEmails.length,
        oidcEnabled: config.oidcEnabled,
        oidcIssuer: config.oidcIssuer,
        maxAttachments: config.maxAttachments,
      },
      'Configuration loaded',
    );

    fastify.decorate('config', config);
  },
  {
    name: 'config',
  },
);
