/**
 * Mode Router
 * Resolves the execution mode for a request. Hard constraints are never
 * traded away: when nothing satisfies them the request fails.
 */

import type { CorrelationOperation } from '@sensorlink/shared';
import { ConstraintUnsatisfiableError, ModeUnavailableError } from '@sensorlink/shared';
import type { CorrelationConfig, CorrelationRequest, CorrelationSource, RouteDecision } from './types.js';

/**
 * What the router needs to know about the strategies it routes to
 */
export interface RouterCapabilities {
  localSupports(operation: CorrelationOperation): boolean;
  privacySupports(operation: CorrelationOperation): boolean;
  privacyParties(): number;
}

export function hostKey(source: CorrelationSource): string {
  return source.ref.hostId ?? source.ref.bridgeId;
}

/**
 * All sources on one host under one owner
 */
export function isSameSource(sources: readonly CorrelationSource[]): boolean {
  const [first, ...rest] = sources;
  if (!first) return false;
  return rest.every((s) => hostKey(s) === hostKey(first) && s.ref.owner === first.ref.owner);
}

export class ModeRouter {
  constructor(
    private readonly config: Pick<CorrelationConfig, 'localLatencyThresholdMs' | 'privacyMinParties'>,
    private readonly capabilities: RouterCapabilities
  ) {}

  route(request: CorrelationRequest): RouteDecision {
    switch (request.mode) {
      case 'local':
        return this.checkLocal(request);
      case 'remote':
        return this.checkRemote(request);
      case 'privacy_preserving':
        return this.checkPrivacy(request);
      case 'adaptive':
        return this.adaptive(request);
    }
  }

  private adaptive(request: CorrelationRequest): RouteDecision {
    const { operation, requestId } = request;
    const constraints = request.constraints ?? {};
    const sameSource = isSameSource(request.sources);
    const localOk = this.capabilities.localSupports(operation);

    // 1. latency
    const latency = constraints.latencyMs;
    if (latency !== undefined && latency < this.config.localLatencyThresholdMs) {
      if (sameSource && localOk) {
        return { mode: 'local', reason: `latency ${latency}ms below ${this.config.localLatencyThresholdMs}ms, co-located` };
      }
      if (constraints.latencyHard) {
        throw new ConstraintUnsatisfiableError(
          sameSource
            ? `operation '${operation}' cannot run locally within ${latency}ms`
            : `hard ${latency}ms latency bound needs co-located sources`,
          { requestId, latencyMs: latency }
        );
      }
    }

    // 2. privacy
    if (constraints.privacy === 'critical' && !sameSource) {
      if (!this.capabilities.privacySupports(operation)) {
        throw new ConstraintUnsatisfiableError(`operation '${operation}' cannot run on secret-shared data`, {
          requestId,
        });
      }
      if (!this.hasParties()) {
        throw new ConstraintUnsatisfiableError(
          `${this.capabilities.privacyParties()} share holders available, ${this.config.privacyMinParties} required`,
          { requestId }
        );
      }
      return { mode: 'privacy_preserving', reason: 'privacy critical across trust domains' };
    }

    // 3. compute budget
    if (constraints.computeBudget === 'low') {
      return sameSource && localOk
        ? { mode: 'local', reason: 'low compute budget, co-located' }
        : { mode: 'remote', reason: 'low compute budget, not runnable locally' };
    }

    return { mode: 'remote', reason: 'default' };
  }

  private checkLocal(request: CorrelationRequest): RouteDecision {
    const { operation, requestId } = request;
    if (!isSameSource(request.sources)) {
      throw new ModeUnavailableError('local', 'sources are not co-located', { requestId });
    }
    if (!this.capabilities.localSupports(operation)) {
      throw new ModeUnavailableError('local', `operation '${operation}' does not run locally`, { requestId });
    }
    return { mode: 'local', reason: 'requested' };
  }

  private checkRemote(request: CorrelationRequest): RouteDecision {
    if (request.constraints?.privacy === 'critical' && !isSameSource(request.sources)) {
      throw new ConstraintUnsatisfiableError('raw segments may not leave their trust domains', {
        requestId: request.requestId,
      });
    }
    return { mode: 'remote', reason: 'requested' };
  }

  private checkPrivacy(request: CorrelationRequest): RouteDecision {
    const { operation, requestId } = request;
    if (!this.capabilities.privacySupports(operation)) {
      throw new ModeUnavailableError('privacy_preserving', `operation '${operation}' cannot run on shared data`, {
        requestId,
      });
    }
    if (!this.hasParties()) {
      throw new ModeUnavailableError(
        'privacy_preserving',
        `${this.capabilities.privacyParties()} share holders available, ${this.config.privacyMinParties} required`,
        { requestId }
      );
    }
    return { mode: 'privacy_preserving', reason: 'requested' };
  }

  private hasParties(): boolean {
    return this.capabilities.privacyParties() >= this.config.privacyMinParties;
  }
}
