/**
 * Application configuration with environment variable support
 */

/**
 * How source labels are matched against alias entries.
 * - exact: case-insensitive, whitespace-normalized equality
 * - contains: exact first, then a label containing the alias (or contained in it)
 */
export type AliasMatchMode = 'exact' | 'contains';

export interface NormalizerConfig {
  matchMode: AliasMatchMode;
}

export interface DisplayConfig {
  /** Decimals for ratios shown as percentages (ROA, ROE, trend percent change) */
  percentDecimals: number;
  /** Decimals for ratios shown as multiples (Current Ratio) and trend deltas */
  multipleDecimals: number;
}

export interface AppConfig {
  normalizer: NormalizerConfig;
  display: DisplayConfig;
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: AppConfig = {
  normalizer: {
    matchMode: 'exact',
  },
  display: {
    percentDecimals: 2,
    multipleDecimals: 2,
  },
};

/**
 * Parse a non-negative integer environment variable with fallback
 */
function parseDecimals(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 && parsed <= 10 ? parsed : fallback;
}

/**
 * Parse alias match mode with validation
 */
function parseMatchMode(value: string | undefined): AliasMatchMode {
  const mode = value?.trim().toLowerCase();
  if (mode === 'exact' || mode === 'contains') {
    return mode;
  }
  return DEFAULT_CONFIG.normalizer.matchMode;
}

/**
 * Load configuration from environment variables with defaults
 */
function loadConfig(): AppConfig {
  return {
    normalizer: {
      matchMode: parseMatchMode(process.env.RATIO_ALIAS_MATCH),
    },
    display: {
      percentDecimals: parseDecimals(process.env.RATIO_PERCENT_DECIMALS, DEFAULT_CONFIG.display.percentDecimals),
      multipleDecimals: parseDecimals(process.env.RATIO_MULTIPLE_DECIMALS, DEFAULT_CONFIG.display.multipleDecimals),
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
