/**
 * deribit-greeks-monitor
 *
 * Polls Deribit option positions and the DVOL index, classifies gamma, vega
 * and DVOL against tiered thresholds, and sends alerts to a Feishu webhook.
 */

// Core types
export * from './types';

// Exchange client
export { DeribitClient, SIZE_EPSILON } from './client/DeribitClient';
export type { CallOutcome, DeribitClientOptions } from './client/DeribitClient';
export { BaseRpcClient } from './client/BaseRpcClient';
export type {
  AuthenticatedEvent,
  BaseRpcClientOptions,
  FetchLike,
  RpcClientEventType,
  RpcEventListener,
} from './client/BaseRpcClient';
export {
  backoffDelayMs,
  classifyTransportError,
  isTerminal,
  transition,
} from './client/callMachine';
export type {
  AttemptOutcome,
  CallEvent,
  CallPolicy,
  CallState,
  TransportFailureKind,
} from './client/callMachine';
export {
  SESSION_SAFETY_MARGIN_SECONDS,
  applyAuthResult,
  createSession,
  nextRequestId,
  shouldRefreshSession,
} from './client/session';
export type { Credentials, Session } from './client/session';
export {
  greeksPolicyFor,
  orderBookPerContractPolicy,
  positionAggregatePolicy,
} from './client/greeksPolicy';
export type { GreeksPolicy, GreeksPolicyInput, GreeksSource } from './client/greeksPolicy';

// Observation store
export { ObservationStore } from './store';
export type { ObservationStoreOptions, Snapshot } from './store';

// Alert evaluation
export { AlertEvaluator, DVOL_KEY } from './alerts/AlertEvaluator';
export type { AlertEvaluatorOptions } from './alerts/AlertEvaluator';
export {
  classifyLevel,
  computeTrend,
  exceedsTrendLimits,
  isCooldownElapsed,
  matchSpecificValue,
} from './alerts/levels';
export * from './alerts/types';

// Notification
export { FeishuNotifier, formatAlert, renderFeishuText } from './notifier';
export type { AlertMessage, Notifier } from './notifier';

// Configuration and runtime
export { loadConfig, parseConfig, ConfigFileSchema } from './config';
export type { ConfigFile, MonitorConfig, MonitorEnv } from './config';
export { MonitorDaemon } from './daemon/MonitorDaemon';
export type { CycleRunner, MonitorDaemonOptions } from './daemon/MonitorDaemon';
export { createMonitor } from './monitor';
export type { Monitor, MonitorOverrides } from './monitor';
