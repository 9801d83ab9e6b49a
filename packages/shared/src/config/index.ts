/**
 * Configuration management for SensorLink
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Load environment variables - CWD may be a package directory when run through
// npm workspaces, so the monorepo root is checked as well
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [resolve(process.cwd(), '.env'), resolve(monorepoRoot, '.env')];

for (const envPath of envPaths) {
  dotenvConfig({ path: envPath });
}

const unitInterval = z.coerce.number().min(0).max(1);

// Configuration schema
const configSchema = z.object({
  // Capability Registry
  registry: z.object({
    heartbeatWindowMs: z.coerce.number().positive().default(60000),
    recencyHalfLifeMs: z.coerce.number().positive().default(3600000),
    initialReputation: z.coerce.number().min(0).max(1000).default(500),
    authTimeoutMs: z.coerce.number().positive().default(5000),
    ratingCooldownMs: z.coerce.number().min(0).default(60000),
    maxRatingsPerWindow: z.coerce.number().int().positive().default(20),
    ratingWindowMs: z.coerce.number().positive().default(3600000),
  }),

  // Stream Session Manager
  session: z.object({
    sequenceGapTolerance: z.coerce.number().int().min(0).default(8),
    idleTimeoutMs: z.coerce.number().positive().default(5000),
    maxReconnectAttempts: z.coerce.number().int().min(0).default(3),
    reconnectBaseDelayMs: z.coerce.number().positive().default(100),
    reconnectMaxDelayMs: z.coerce.number().positive().default(5000),
    channelCapacity: z.coerce.number().int().positive().default(1024),
    highWatermark: z.coerce.number().int().positive().default(768),
    lowWatermark: z.coerce.number().int().min(0).default(256),
    overflowPolicy: z.enum(['block', 'drop_oldest']).default('block'),
    minSyncScore: unitInterval.default(0.5),
    maxDriftNs: z.coerce.number().min(0).default(1000000),
  }),

  // Correlation Engine
  correlation: z.object({
    localLatencyThresholdMs: z.coerce.number().positive().default(10),
    localDeadlineMs: z.coerce.number().positive().default(10),
    localMaxSamples: z.coerce.number().int().positive().default(4096),
    minSamples: z.coerce.number().int().min(2).default(8),
    maxLagFraction: z.coerce.number().gt(0).max(1).default(0.25),
    privacyMaxLag: z.coerce.number().int().min(0).default(16),
    privacyMinParties: z.coerce.number().int().min(2).default(2),
    coherenceSegment: z.coerce.number().int().min(8).default(256),
  }),

  // Significance Evaluator
  significance: z.object({
    passThreshold: z.coerce.number().int().min(1).max(5).default(2),
    minSamples: z.coerce.number().int().min(16).default(64),
    informationGainRatio: unitInterval.default(0.1),
    maxHistogramBins: z.coerce.number().int().min(4).default(16),
    predictiveAlpha: unitInterval.default(0.05),
    maxPredictiveLag: z.coerce.number().int().positive().default(8),
    stabilityWindows: z.coerce.number().int().min(2).default(8),
    maxStabilityCv: z.coerce.number().positive().default(0.3),
    compressionRatio: unitInterval.default(0.9),
    minPatternMatches: z.coerce.number().int().min(1).default(2),
  }),

  // Pattern Library
  patterns: z.object({
    establishedReplications: z.coerce.number().int().positive().default(10),
    retireFraction: unitInterval.default(0.5),
    falsePositiveDecay: unitInterval.default(0.9),
    lagBucketMs: z.coerce.number().positive().default(1),
    lagToleranceMs: z.coerce.number().min(0).default(1),
  }),

  // Database - unset keeps registry and pattern state in memory
  database: z.object({
    path: z.string().min(1).optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const env = process.env;

  const rawConfig = {
    registry: {
      heartbeatWindowMs: env.REGISTRY_HEARTBEAT_WINDOW_MS,
      recencyHalfLifeMs: env.REGISTRY_RECENCY_HALF_LIFE_MS,
      initialReputation: env.REGISTRY_INITIAL_REPUTATION,
      authTimeoutMs: env.REGISTRY_AUTH_TIMEOUT_MS,
      ratingCooldownMs: env.REGISTRY_RATING_COOLDOWN_MS,
      maxRatingsPerWindow: env.REGISTRY_MAX_RATINGS_PER_WINDOW,
      ratingWindowMs: env.REGISTRY_RATING_WINDOW_MS,
    },

    session: {
      sequenceGapTolerance: env.SESSION_SEQUENCE_GAP_TOLERANCE,
      idleTimeoutMs: env.SESSION_IDLE_TIMEOUT_MS,
      maxReconnectAttempts: env.SESSION_MAX_RECONNECT_ATTEMPTS,
      reconnectBaseDelayMs: env.SESSION_RECONNECT_BASE_DELAY_MS,
      reconnectMaxDelayMs: env.SESSION_RECONNECT_MAX_DELAY_MS,
      channelCapacity: env.SESSION_CHANNEL_CAPACITY,
      highWatermark: env.SESSION_HIGH_WATERMARK,
      lowWatermark: env.SESSION_LOW_WATERMARK,
      overflowPolicy: env.SESSION_OVERFLOW_POLICY,
      minSyncScore: env.SESSION_MIN_SYNC_SCORE,
      maxDriftNs: env.SESSION_MAX_DRIFT_NS,
    },

    correlation: {
      localLatencyThresholdMs: env.CORRELATION_LOCAL_LATENCY_THRESHOLD_MS,
      localDeadlineMs: env.CORRELATION_LOCAL_DEADLINE_MS,
      localMaxSamples: env.CORRELATION_LOCAL_MAX_SAMPLES,
      minSamples: env.CORRELATION_MIN_SAMPLES,
      maxLagFraction: env.CORRELATION_MAX_LAG_FRACTION,
      privacyMaxLag: env.CORRELATION_PRIVACY_MAX_LAG,
      privacyMinParties: env.CORRELATION_PRIVACY_MIN_PARTIES,
      coherenceSegment: env.CORRELATION_COHERENCE_SEGMENT,
    },

    significance: {
      passThreshold: env.SIGNIFICANCE_PASS_THRESHOLD,
      minSamples: env.SIGNIFICANCE_MIN_SAMPLES,
      informationGainRatio: env.SIGNIFICANCE_INFORMATION_GAIN_RATIO,
      maxHistogramBins: env.SIGNIFICANCE_MAX_HISTOGRAM_BINS,
      predictiveAlpha: env.SIGNIFICANCE_PREDICTIVE_ALPHA,
      maxPredictiveLag: env.SIGNIFICANCE_MAX_PREDICTIVE_LAG,
      stabilityWindows: env.SIGNIFICANCE_STABILITY_WINDOWS,
      maxStabilityCv: env.SIGNIFICANCE_MAX_STABILITY_CV,
      compressionRatio: env.SIGNIFICANCE_COMPRESSION_RATIO,
      minPatternMatches: env.SIGNIFICANCE_MIN_PATTERN_MATCHES,
    },

    patterns: {
      establishedReplications: env.PATTERNS_ESTABLISHED_REPLICATIONS,
      retireFraction: env.PATTERNS_RETIRE_FRACTION,
      falsePositiveDecay: env.PATTERNS_FALSE_POSITIVE_DECAY,
      lagBucketMs: env.PATTERNS_LAG_BUCKET_MS,
      lagToleranceMs: env.PATTERNS_LAG_TOLERANCE_MS,
    },

    database: {
      path: env.DATABASE_PATH || undefined,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
