/**
 * Configuration system for Waystone
 * Handles environment-based settings and removes hardcoded values
 */

import 'dotenv/config';
import { z } from 'zod';
import { configureLogging, parseLogLevel } from './utils/LoggingConfig';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const RefundPolicySchema = z.enum(['none', 'refund']);
export type RefundPolicy = z.infer<typeof RefundPolicySchema>;

export const WaystoneConfigSchema = z.object({
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  dataDir: z.string().min(1),
  logLevel: z.enum(['none', 'error', 'warn', 'info', 'debug', 'trace']),
  travel: z.object({
    defaultPrice: z.number().int().nonnegative(),
    currencyItem: z.string().min(1),
    useTransitionScene: z.boolean(),
    transitionSceneId: z.string().min(1),
    loadTimeoutMs: z.number().int().positive(),
    fadeDurationMs: z.number().int().nonnegative(),
    refundPolicy: RefundPolicySchema,
  }),
});

export type WaystoneConfig = z.infer<typeof WaystoneConfigSchema>;
export type TravelSettings = WaystoneConfig['travel'];

export const DEFAULT_TRAVEL_SETTINGS: TravelSettings = {
  defaultPrice: 200,
  currencyItem: 'Silver',
  useTransitionScene: true,
  transitionSceneId: 'LowMemory_TransitionScene',
  loadTimeoutMs: 30000,
  fadeDurationMs: 300,
  refundPolicy: 'none',
};

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  VITEST: z.string().optional(),
  WAYSTONE_DATA_DIR: z.string().optional(),
  WAYSTONE_LOG_LEVEL: WaystoneConfigSchema.shape.logLevel.optional(),
  WAYSTONE_DEFAULT_PRICE: z.coerce.number().int().nonnegative().optional(),
  WAYSTONE_CURRENCY_ITEM: z.string().min(1).optional(),
  WAYSTONE_USE_TRANSITION_SCENE: booleanFromEnv.optional(),
  WAYSTONE_TRANSITION_SCENE: z.string().min(1).optional(),
  WAYSTONE_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  WAYSTONE_FADE_DURATION_MS: z.coerce.number().int().nonnegative().optional(),
  WAYSTONE_REFUND_POLICY: RefundPolicySchema.optional(),
});

export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): WaystoneConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid Waystone environment configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;

  const nodeEnv = vars.NODE_ENV || 'development';
  const isProduction = nodeEnv === 'production';
  const isDevelopment = nodeEnv === 'development';
  const isTest = nodeEnv === 'test' || vars.VITEST === 'true';

  return WaystoneConfigSchema.parse({
    isProduction,
    isDevelopment,
    isTest,
    dataDir: vars.WAYSTONE_DATA_DIR || './data',
    logLevel: vars.WAYSTONE_LOG_LEVEL || (isProduction ? 'warn' : 'info'),
    travel: {
      defaultPrice: vars.WAYSTONE_DEFAULT_PRICE ?? DEFAULT_TRAVEL_SETTINGS.defaultPrice,
      currencyItem: vars.WAYSTONE_CURRENCY_ITEM ?? DEFAULT_TRAVEL_SETTINGS.currencyItem,
      useTransitionScene: vars.WAYSTONE_USE_TRANSITION_SCENE ?? DEFAULT_TRAVEL_SETTINGS.useTransitionScene,
      transitionSceneId: vars.WAYSTONE_TRANSITION_SCENE ?? DEFAULT_TRAVEL_SETTINGS.transitionSceneId,
      loadTimeoutMs: vars.WAYSTONE_LOAD_TIMEOUT_MS ?? DEFAULT_TRAVEL_SETTINGS.loadTimeoutMs,
      fadeDurationMs: vars.WAYSTONE_FADE_DURATION_MS ?? DEFAULT_TRAVEL_SETTINGS.fadeDurationMs,
      refundPolicy: vars.WAYSTONE_REFUND_POLICY ?? DEFAULT_TRAVEL_SETTINGS.refundPolicy,
    },
  });
}

class ConfigurationManager {
  private static instance: ConfigurationManager;
  private config: WaystoneConfig;

  private constructor() {
    this.config = loadConfiguration();
  }

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  get(): WaystoneConfig {
    return this.config;
  }

  /**
   * Update configuration (mainly for testing)
   */
  update(updates: Partial<Omit<WaystoneConfig, 'travel'>> & { travel?: Partial<TravelSettings> }): void {
    this.config = WaystoneConfigSchema.parse({
      ...this.config,
      ...updates,
      travel: { ...this.config.travel, ...updates.travel },
    });
  }

  /**
   * Reset to default configuration
   */
  reset(): void {
    this.config = loadConfiguration();
  }

  /**
   * Push the configured log level into the logging layer
   */
  applyLogging(): void {
    configureLogging({ level: parseLogLevel(this.config.logLevel) });
  }
}

export const Config = ConfigurationManager.getInstance();
