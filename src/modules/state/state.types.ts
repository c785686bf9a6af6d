/**
 * State API Types
 * Request and response shapes for the state endpoints
 */

import { MetricsSnapshot, NamespaceMetrics, ValueSource } from '../../lib/cache/cache.types';
import { StateManagerStats } from '../../lib/cache/state.manager';

export interface IPutStateRequest {
  value: unknown;
  ttlMs?: number;
}

export interface IGetStateResponse {
  success: true;
  namespace: string;
  key: string;
  value: unknown;
  source: ValueSource;
}

export interface IWriteStateResponse {
  success: true;
  local: boolean;
  remote: boolean;
  warning?: string;
}

export interface IMetricsResponse {
  success: true;
  metrics: Readonly<MetricsSnapshot>;
  namespaces: Record<string, NamespaceMetrics>;
}

export interface IStatsResponse {
  success: true;
  stats: StateManagerStats;
}
