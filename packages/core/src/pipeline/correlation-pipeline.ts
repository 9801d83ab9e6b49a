/**
 * Correlation Pipeline
 *
 * Drives one agent's query end to end:
 *
 *   discover ─▶ authenticate ─▶ subscribe ─▶ bundle ─▶ compute ─▶ evaluate ─▶ publish
 *
 * Every session the run opens is closed before it returns, whether or not
 * the run succeeded.
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'eventemitter3';
import {
  ConfigurationError,
  InsufficientDataError,
  ValidationError,
  createChildLogger,
  getConfig,
  validateConfig,
  type CapabilityLedger,
  type DiscoveryQuery,
  type IdentityProvider,
  type Pattern,
  type PatternStore,
  wrapError,
} from '@sensorlink/shared';
import { capabilityEventRepository, initializeDatabase, patternRepository } from '@sensorlink/database';
import { CorrelationEngine } from '../correlation/correlation-engine.js';
import type { CorrelationResult, CorrelationSource } from '../correlation/types.js';
import { PatternLibrary } from '../patterns/pattern-library.js';
import { formatBridgeUri } from '../protocol/bridge-uri.js';
import { CapabilityRegistry } from '../registry/capability-registry.js';
import { StreamSessionManager } from '../session/session-manager.js';
import type { BridgeConnector } from '../session/types.js';
import { SignificanceEvaluator } from '../significance/significance-evaluator.js';
import type { SignificanceScore } from '../significance/types.js';
import type {
  BridgeDirectory,
  PipelineEvents,
  PipelineOutcome,
  PipelineRequest,
} from './types.js';

export interface CorrelationPipelineDependencies {
  registry: BridgeDirectory;
  sessions: StreamSessionManager;
  engine: CorrelationEngine;
  evaluator: SignificanceEvaluator;
  library: PatternLibrary;
}

export class CorrelationPipeline extends EventEmitter<PipelineEvents> {
  private registry: BridgeDirectory;
  private sessions: StreamSessionManager;
  private engine: CorrelationEngine;
  private evaluator: SignificanceEvaluator;
  private library: PatternLibrary;
  private logger = createChildLogger({ component: 'CorrelationPipeline' });

  constructor(deps: CorrelationPipelineDependencies) {
    super();
    this.registry = deps.registry;
    this.sessions = deps.sessions;
    this.engine = deps.engine;
    this.evaluator = deps.evaluator;
    this.library = deps.library;
  }

  async run(request: PipelineRequest): Promise<PipelineOutcome> {
    if (!request.agentId) {
      throw new ValidationError('agentId is required');
    }
    if (!(request.windowMs > 0)) {
      throw new ValidationError(`windowMs must be positive, got ${request.windowMs}`);
    }

    const runId = randomUUID();
    const startTime = Date.now();
    const sessionIds: string[] = [];
    this.emit('pipeline:started', { runId, agentId: request.agentId });

    try {
      const bridgeIds = request.bridgeIds ?? (await this.selectBridges(request.query ?? {}));
      if (bridgeIds.length < 2) {
        throw new InsufficientDataError(`need at least 2 bridges, got ${bridgeIds.length}`);
      }
      this.emit('pipeline:selected', { runId, bridgeIds });

      if (request.signer) {
        for (const bridgeId of bridgeIds) {
          await this.registry.authenticate(bridgeId, request.agentId, request.signer);
        }
      }

      for (const bridgeId of bridgeIds) {
        const session = await this.sessions.subscribe(this.streamUriFor(bridgeId));
        sessionIds.push(session.id);
      }
      this.emit('pipeline:subscribed', { runId, sessionIds: [...sessionIds] });

      const sources = await this.collect(bridgeIds, sessionIds, request.windowMs);

      const result = await this.engine.compute({
        sources,
        operation: request.operation,
        mode: request.mode ?? 'adaptive',
        constraints: request.constraints,
        custom: request.custom,
        signal: request.signal,
      });
      this.emit('pipeline:computed', { runId, result });

      const [a, b] = this.primarySamples(result, sources);
      const score = await this.evaluator.evaluate(result, a, b);
      this.emit('pipeline:evaluated', { runId, score });

      const outcome: PipelineOutcome = { runId, bridgeIds, result, score };
      if (score.meaningful) {
        outcome.pattern = await this.publish(request.agentId, result, score);
        this.emit('pipeline:published', { runId, pattern: outcome.pattern });
      }

      const durationMs = Date.now() - startTime;
      this.logger.info(
        {
          runId,
          bridgeIds,
          mode: result.mode,
          peakLagMs: result.peakLagMs,
          passCount: score.passCount,
          meaningful: score.meaningful,
          durationMs,
        },
        'Pipeline run completed'
      );
      this.emit('pipeline:completed', { runId, outcome, durationMs });
      return outcome;
    } catch (error) {
      const err = wrapError(error, { runId });
      this.logger.warn({ runId, error: err.message }, 'Pipeline run failed');
      this.emit('pipeline:failed', { runId, error: err });
      throw err;
    } finally {
      await this.release(runId, sessionIds);
    }
  }

  // ===========================================
  // Steps
  // ===========================================

  /**
   * Best-scored bridge per requested domain. With fewer than two domains the
   * two best matches overall are taken.
   */
  private async selectBridges(query: DiscoveryQuery): Promise<string[]> {
    const matches = await this.registry.discover(query);
    const domains = [...new Set(query.domains ?? [])];

    if (domains.length < 2) {
      return matches.slice(0, 2).map((m) => m.capability.bridgeId);
    }

    const selected: string[] = [];
    for (const domain of domains) {
      const best = matches.find(
        (m) => m.capability.domain === domain && !selected.includes(m.capability.bridgeId)
      );
      if (!best) {
        throw new InsufficientDataError(`no fresh bridge matches domain '${domain}'`);
      }
      selected.push(best.capability.bridgeId);
    }
    return selected;
  }

  private streamUriFor(bridgeId: string): string {
    const [registered] = this.registry.listResources(bridgeId);
    if (registered) return registered;

    const capability = this.registry.get(bridgeId);
    return formatBridgeUri({ bridgeId, resourceType: 'stream', streamSpec: capability.domain });
  }

  private async collect(
    bridgeIds: readonly string[],
    sessionIds: readonly string[],
    windowMs: number
  ): Promise<CorrelationSource[]> {
    const bundle = await this.sessions.bundle(sessionIds, windowMs);

    return bundle.streams.map((stream, i) => {
      const bridgeId = bridgeIds[i] ?? stream.streamId;
      const capability = this.registry.get(bridgeId);
      const spec = this.sessions.get(sessionIds[i] ?? '')?.negotiation.streamSpec ?? capability.domain;
      return {
        ref: {
          bridgeId,
          streamId: `${bridgeId}/${spec}`,
          domain: capability.domain,
          owner: capability.owner,
          hostId: capability.hostId,
          sampleRateHz: bundle.sampleRate,
        },
        samples: stream.values,
      };
    });
  }

  private primarySamples(
    result: CorrelationResult,
    sources: readonly CorrelationSource[]
  ): [Float64Array, Float64Array] {
    const find = (streamId: string): Float64Array => {
      const source = sources.find((s) => s.ref.streamId === streamId);
      if (!source) {
        throw new InsufficientDataError(`no samples for stream '${streamId}'`, { streamId });
      }
      return source.samples;
    };
    return [find(result.sources[0].streamId), find(result.sources[1].streamId)];
  }

  private async publish(agentId: string, result: CorrelationResult, score: SignificanceScore): Promise<Pattern> {
    return this.library.publish(
      {
        domains: [result.sources[0].domain, result.sources[1].domain],
        operation: result.operation,
        lagMs: result.peakLagMs,
        mechanism: score.mechanism ?? 'unexplained',
      },
      {
        agentId,
        confidence: score.confidence,
        requestId: result.requestId,
        peakMagnitude: Math.min(1, Math.abs(result.peakMagnitude)),
      }
    );
  }

  private async release(runId: string, sessionIds: readonly string[]): Promise<void> {
    const open = sessionIds.filter((id) => this.sessions.get(id) !== undefined);
    const settled = await Promise.allSettled(open.map((id) => this.sessions.unsubscribe(id)));

    settled.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        this.logger.warn(
          { runId, sessionId: open[i], error: String(outcome.reason) },
          'Failed to close session'
        );
      }
    });
  }
}

// ===========================================
// Factory
// ===========================================

export interface PipelineEnvironment {
  connector: BridgeConnector;
  ledger?: CapabilityLedger;
  identity?: IdentityProvider;
  patternStore?: PatternStore;
  /** Merge the shipped seed patterns into the library */
  seedPatterns?: boolean;
}

export interface AssembledPipeline {
  pipeline: CorrelationPipeline;
  registry: CapabilityRegistry;
  sessions: StreamSessionManager;
  engine: CorrelationEngine;
  evaluator: SignificanceEvaluator;
  library: PatternLibrary;
}

const factoryLogger = createChildLogger({ component: 'PipelineFactory' });

/**
 * Wire every component with thresholds from the environment.
 *
 * With DATABASE_PATH set, a ledger or pattern store the caller leaves out is
 * backed by SQLite, and the registry is rebuilt from the stored events.
 */
export async function createCorrelationPipelineFromEnv(env: PipelineEnvironment): Promise<AssembledPipeline> {
  const validation = validateConfig();
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid configuration: ${(validation.errors ?? []).join('; ')}`);
  }
  const config = getConfig();

  let { ledger, patternStore } = env;
  if (config.database.path) {
    initializeDatabase({ path: config.database.path });
    ledger ??= capabilityEventRepository;
    patternStore ??= patternRepository;
  }

  const registry = new CapabilityRegistry({
    ledger,
    identity: env.identity,
    config: config.registry,
  });
  const sessions = new StreamSessionManager({ registry, connector: env.connector, config: config.session });
  const engine = new CorrelationEngine({ config: config.correlation });
  const library = new PatternLibrary({ store: patternStore, config: config.patterns });
  const evaluator = new SignificanceEvaluator({ config: config.significance, patterns: library });

  const bridges = await registry.hydrate();
  if (env.seedPatterns) {
    await library.seed();
  }
  factoryLogger.info(
    { persistent: config.database.path !== undefined, bridges, seeded: env.seedPatterns ?? false },
    'Correlation pipeline assembled'
  );

  const pipeline = new CorrelationPipeline({ registry, sessions, engine, evaluator, library });
  return { pipeline, registry, sessions, engine, evaluator, library };
}
