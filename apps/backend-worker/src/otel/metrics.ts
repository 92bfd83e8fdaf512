/**
 * OpenTelemetry metrics for the HTTP API, the embedding workers and semantic search.
 *
 * Product and shop ids are never used as labels (high cardinality); they go to logs and traces.
 */

import { metrics } from '@opentelemetry/api';
import type { Counter, Histogram, UpDownCounter } from '@opentelemetry/api';

const meter = metrics.getMeter('shopsense-backend-worker', '0.1.0');

// ============================================
// HTTP METRICS
// ============================================

/** Total HTTP requests (labels: method, route, status_code) */
export const httpRequestTotal: Counter = meter.createCounter('http_request_total', {
  description: 'Total number of HTTP requests',
});

export const httpRequestDuration: Histogram = meter.createHistogram(
  'http_request_duration_seconds',
  {
    description: 'HTTP request duration in seconds',
    unit: 's',
    advice: {
      explicitBucketBoundaries: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    },
  }
);

export const http5xxTotal: Counter = meter.createCounter('http_5xx_total', {
  description: 'Total number of HTTP 5xx errors',
});

export const httpActiveRequests: UpDownCounter = meter.createUpDownCounter('http_active_requests', {
  description: 'Number of active HTTP requests being processed',
});

// ============================================
// EMBEDDING WORKER METRICS
// ============================================

/** Labels: operation, status */
export const embeddingJobsProcessedTotal: Counter = meter.createCounter(
  'embedding_jobs_processed_total',
  {
    description: 'Embedding jobs completed by the worker',
  }
);

/** Labels: operation, classification (transient | permanent) */
export const embeddingJobsFailedTotal: Counter = meter.createCounter('embedding_jobs_failed_total', {
  description: 'Embedding jobs that threw',
});

export const embeddingChunksEmbeddedTotal: Counter = meter.createCounter(
  'embedding_chunks_embedded_total',
  {
    description: 'Chunks sent to the embedding backend',
  }
);

export const embeddingChunksReusedTotal: Counter = meter.createCounter(
  'embedding_chunks_reused_total',
  {
    description: 'Chunks whose stored vector was reused after change detection',
  }
);

/** Labels: change_type, status */
export const productEventsProcessedTotal: Counter = meter.createCounter(
  'product_events_processed_total',
  {
    description: 'Product change events handed to the dispatcher',
  }
);

// ============================================
// SEARCH METRICS
// ============================================

/** Labels: kind (search | similar) */
export const searchRequestsTotal: Counter = meter.createCounter('search_requests_total', {
  description: 'Semantic search requests',
});

export const searchLatencySeconds: Histogram = meter.createHistogram('search_latency_seconds', {
  description: 'Semantic search latency in seconds, cache lookups included',
  unit: 's',
  advice: {
    explicitBucketBoundaries: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  },
});

export const searchCacheHitTotal: Counter = meter.createCounter('search_cache_hit_total', {
  description: 'Search cache hits',
});

export const searchCacheMissTotal: Counter = meter.createCounter('search_cache_miss_total', {
  description: 'Search cache misses',
});

// ============================================
// HELPERS
// ============================================

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number
): void {
  const baseAttributes = { method, route };

  httpRequestTotal.add(1, { ...baseAttributes, status_code: String(statusCode) });
  httpRequestDuration.record(durationSeconds, baseAttributes);

  if (statusCode >= 500) {
    http5xxTotal.add(1, baseAttributes);
  }
}

export function recordSearch(kind: 'search' | 'similar', durationSeconds: number): void {
  searchRequestsTotal.add(1, { kind });
  searchLatencySeconds.record(durationSeconds, { kind });
}
