/**
 * Local execution: frequency-domain kernels next to the data, under a hard
 * time budget and a sample cap.
 */

import type { CorrelationOperation } from '@sensorlink/shared';
import { DeadlineExceededError, ModeUnavailableError } from '@sensorlink/shared';
import { maxLagFor, runKernel } from '../kernels.js';
import { tail } from '../signal-math.js';
import type {
  CorrelationConfig,
  CorrelationSource,
  CorrelationStrategy,
  ExecutionContext,
  KernelOutput,
} from '../types.js';

export const LOCAL_OPERATIONS: ReadonlySet<CorrelationOperation> = new Set([
  'cross_correlation',
  'convolution',
  'multiplication',
]);

export type LocalStrategyConfig = Pick<
  CorrelationConfig,
  'localDeadlineMs' | 'localMaxSamples' | 'maxLagFraction' | 'coherenceSegment'
>;

export class LocalStrategy implements CorrelationStrategy {
  readonly mode = 'local' as const;

  constructor(
    private readonly config: LocalStrategyConfig,
    private readonly now: () => number = () => performance.now()
  ) {}

  supports(operation: CorrelationOperation): boolean {
    return LOCAL_OPERATIONS.has(operation);
  }

  /** The request's latency bound, or the configured default */
  deadlineFor(context: ExecutionContext): number {
    return context.request.constraints?.latencyMs ?? this.config.localDeadlineMs;
  }

  async execute(a: CorrelationSource, b: CorrelationSource, context: ExecutionContext): Promise<KernelOutput> {
    const { operation, requestId } = context.request;
    if (!this.supports(operation)) {
      throw new ModeUnavailableError('local', `operation '${operation}' does not run locally`, { requestId });
    }

    const deadline = this.deadlineFor(context);
    const started = this.now();
    const checkpoint = (): void => {
      context.checkpoint();
      const elapsed = this.now() - started;
      if (elapsed > deadline) {
        throw new DeadlineExceededError(deadline, elapsed, { requestId });
      }
    };

    const n = Math.min(a.samples.length, b.samples.length, this.config.localMaxSamples);
    const output = runKernel(operation, tail(a.samples, n), tail(b.samples, n), {
      sampleRateHz: context.sampleRateHz,
      maxLag: maxLagFor(n, this.config.maxLagFraction),
      coherenceSegment: this.config.coherenceSegment,
      checkpoint,
    });
    checkpoint();
    return output;
  }
}
