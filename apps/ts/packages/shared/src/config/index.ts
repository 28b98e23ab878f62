/**
 * Application configuration with environment variable support
 */

export interface RemoteConfig {
  /** GraphQL endpoint that serves layout revisions */
  queryEndpoint: string;
  /** Static metadata document consumed by the desktop configurator */
  metadataEndpoint: string;
  /** Per-request deadline in milliseconds, 0 disables it */
  requestTimeoutMs: number;
}

export interface StoreConfig {
  /** Store location used when no --path is given; `~/` expands to the home directory */
  defaultPath: string;
}

export interface AppConfig {
  remote: RemoteConfig;
  store: StoreConfig;
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: AppConfig = {
  remote: {
    queryEndpoint: 'https://oryx.zsa.io/graphql',
    metadataEndpoint: 'https://configure.zsa.io/metadata.json',
    requestTimeoutMs: 30000,
  },
  store: {
    defaultPath: '~/.config/.keymapp/keymapp.sqlite3',
  },
};

/**
 * Parse numeric environment variable with fallback
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

/**
 * Parse a non-empty string environment variable with fallback
 */
function parseString(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

/**
 * Load configuration from environment variables with defaults
 */
function loadConfig(): AppConfig {
  return {
    remote: {
      queryEndpoint: parseString(process.env.KEYMIRROR_QUERY_ENDPOINT, DEFAULT_CONFIG.remote.queryEndpoint),
      metadataEndpoint: parseString(process.env.KEYMIRROR_METADATA_ENDPOINT, DEFAULT_CONFIG.remote.metadataEndpoint),
      requestTimeoutMs: parseNumber(process.env.KEYMIRROR_REQUEST_TIMEOUT_MS, DEFAULT_CONFIG.remote.requestTimeoutMs),
    },
    store: {
      defaultPath: parseString(process.env.KEYMIRROR_STORE_PATH, DEFAULT_CONFIG.store.defaultPath),
    },
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Override specific configuration values (mainly for testing)
 */
export function setConfig(overrides: Partial<AppConfig>): void {
  configInstance = {
    ...getConfig(),
    ...overrides,
  };
}
