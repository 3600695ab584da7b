/**
 * Service Layer Exports
 *
 * Central export point for all services. Handlers import from here ONLY.
 */

export { configService } from './configService.js';
export { createUpstreamService } from './upstreamService.js';
export { createCompletionService } from './completionService.js';
export { createModelService } from './model/index.js';
export { HealthService } from './healthService.js';
export { RequestCounters } from './requestCounters.js';
export { RequestMetrics } from './metrics.js';
export { RetryExecutor, RetryExhaustedError } from './retryExecutor.js';

export type {
  CompletionService,
  ConfigService,
  ModelService,
  UpstreamService,
} from './contracts.js';
export type { ChunkStream } from './upstream/chunkStream.js';
