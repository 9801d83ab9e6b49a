/**
 * Remote execution: raw segments are shipped to a compute node that can run
 * any operation.
 */

import type { CorrelationOperation } from '@sensorlink/shared';
import { CORRELATION_OPERATIONS, CorrelationCancelledError, createChildLogger } from '@sensorlink/shared';
import { maxLagFor, runKernel } from '../kernels.js';
import type {
  CorrelationConfig,
  CorrelationSource,
  CorrelationStrategy,
  CustomOperation,
  ExecutionContext,
  KernelOutput,
} from '../types.js';

export interface ComputeTask {
  requestId: string;
  operation: CorrelationOperation;
  a: Float64Array;
  b: Float64Array;
  sampleRateHz: number;
  maxLag: number;
  custom?: CustomOperation;
}

/**
 * Anything that can run a correlation task away from the bridges
 */
export interface ComputeNode {
  readonly id: string;
  run(task: ComputeTask, signal?: AbortSignal): Promise<KernelOutput>;
}

/**
 * Compute node running in this process. Work is deferred one macrotask so a
 * cancel issued right after dispatch still lands.
 */
export class InProcessComputeNode implements ComputeNode {
  readonly id = 'in-process';

  constructor(private readonly coherenceSegment: number) {}

  async run(task: ComputeTask, signal?: AbortSignal): Promise<KernelOutput> {
    const checkpoint = (): void => {
      if (signal?.aborted) throw new CorrelationCancelledError({ requestId: task.requestId });
    };

    checkpoint();
    await new Promise<void>((resolve) => setImmediate(resolve));
    checkpoint();

    return runKernel(task.operation, task.a, task.b, {
      sampleRateHz: task.sampleRateHz,
      maxLag: task.maxLag,
      coherenceSegment: this.coherenceSegment,
      custom: task.custom,
      checkpoint,
    });
  }
}

export class RemoteStrategy implements CorrelationStrategy {
  readonly mode = 'remote' as const;
  private logger = createChildLogger({ component: 'RemoteStrategy' });

  constructor(
    private readonly node: ComputeNode,
    private readonly config: Pick<CorrelationConfig, 'maxLagFraction'>
  ) {}

  supports(operation: CorrelationOperation): boolean {
    return CORRELATION_OPERATIONS.includes(operation);
  }

  async execute(a: CorrelationSource, b: CorrelationSource, context: ExecutionContext): Promise<KernelOutput> {
    const { request } = context;
    const n = Math.min(a.samples.length, b.samples.length);
    const task: ComputeTask = {
      requestId: request.requestId ?? 'anonymous',
      operation: request.operation,
      a: a.samples.subarray(0, n),
      b: b.samples.subarray(0, n),
      sampleRateHz: context.sampleRateHz,
      maxLag: maxLagFor(n, this.config.maxLagFraction),
      custom: request.custom,
    };

    this.logger.debug({ requestId: task.requestId, node: this.node.id, samples: n }, 'Dispatching to compute node');
    context.checkpoint();
    const output = await this.node.run(task, context.signal);
    context.checkpoint();
    return output;
  }
}
