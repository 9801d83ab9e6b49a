/**
 * Correlation Pipeline Types
 */

import type {
  CorrelationOperation,
  DiscoveryQuery,
  ExecutionMode,
  Pattern,
} from '@sensorlink/shared';
import type { CorrelationConstraints, CorrelationResult, CustomOperation } from '../correlation/types.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import type { ChallengeSigner } from '../registry/types.js';
import type { SignificanceScore } from '../significance/types.js';

/** The registry reads and checks one run needs */
export type BridgeDirectory = Pick<CapabilityRegistry, 'discover' | 'get' | 'listResources' | 'authenticate'>;

export interface PipelineRequest {
  agentId: string;
  /** Used when no bridge ids are given; one bridge per listed domain is picked */
  query?: DiscoveryQuery;
  bridgeIds?: string[];
  operation: CorrelationOperation;
  mode?: ExecutionMode;
  constraints?: CorrelationConstraints;
  custom?: CustomOperation;
  /** How much of each stream to read */
  windowMs: number;
  /** When set, every selected bridge must prove it holds its owner's key */
  signer?: ChallengeSigner;
  signal?: AbortSignal;
}

export interface PipelineOutcome {
  runId: string;
  bridgeIds: string[];
  result: CorrelationResult;
  score: SignificanceScore;
  /** Set when the result was meaningful and published */
  pattern?: Pattern;
}

export interface PipelineEvents {
  'pipeline:started': { runId: string; agentId: string };
  'pipeline:selected': { runId: string; bridgeIds: string[] };
  'pipeline:subscribed': { runId: string; sessionIds: string[] };
  'pipeline:computed': { runId: string; result: CorrelationResult };
  'pipeline:evaluated': { runId: string; score: SignificanceScore };
  'pipeline:published': { runId: string; pattern: Pattern };
  'pipeline:completed': { runId: string; outcome: PipelineOutcome; durationMs: number };
  'pipeline:failed': { runId: string; error: Error };
}
