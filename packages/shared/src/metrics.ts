/**
 * Prometheus Metrics
 *
 * Metrics for attestation outcomes, outbound service health and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Workflow Metrics
// ============================================================================

export const attestationsProcessedCounter = new promClient.Counter({
  name: 'attestation_documents_processed_total',
  help: 'Total number of attestations processed, by outcome category',
  labelNames: ['category', 'language'],
  registers: [register],
});

export const doctorMatchCounter = new promClient.Counter({
  name: 'attestation_doctor_matches_total',
  help: 'Doctor registry verdicts by match tier',
  labelNames: ['tier'],
  registers: [register],
});

export const fraudCasesCounter = new promClient.Counter({
  name: 'attestation_fraud_cases_total',
  help: 'Total number of fraud cases created',
  labelNames: ['registry_match_status'],
  registers: [register],
});

export const analysisDurationHistogram = new promClient.Histogram({
  name: 'attestation_analysis_duration_seconds',
  help: 'Duration of document analysis calls',
  labelNames: ['status'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Outbound Service Metrics
// ============================================================================

export const serviceFailuresCounter = new promClient.Counter({
  name: 'attestation_service_failures_total',
  help: 'Outbound service call failures by service and kind',
  labelNames: ['service', 'kind'],
  registers: [register],
});

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'attestation_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'attestation_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 120],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'attestation_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
