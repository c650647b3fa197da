import { AlertEvaluator } from './alerts/AlertEvaluator';
import { FetchLike } from './client/BaseRpcClient';
import { DeribitClient } from './client/DeribitClient';
import { greeksPolicyFor } from './client/greeksPolicy';
import { MonitorConfig } from './config';
import { MonitorDaemon } from './daemon/MonitorDaemon';
import { FeishuNotifier } from './notifier/FeishuNotifier';
import { Notifier } from './notifier/types';
import { ObservationStore } from './store';

/**
 * Wired components of a running monitor
 */
export interface Monitor {
  client: DeribitClient;
  store: ObservationStore;
  notifier: Notifier;
  evaluator: AlertEvaluator;
  daemon: MonitorDaemon;
}

/**
 * Injection points, mainly for tests
 */
export interface MonitorOverrides {
  fetch?: FetchLike;
  notifier?: Notifier;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Builds the client, store, notifier, evaluator and daemon from a loaded configuration.
 */
export function createMonitor(config: MonitorConfig, overrides: MonitorOverrides = {}): Monitor {
  const client = new DeribitClient({
    clientId: config.credentials.clientId,
    clientSecret: config.credentials.clientSecret,
    baseUrl: config.baseUrl,
    greeksPolicy: greeksPolicyFor(config.greeksSource),
    retryTimes: config.retryTimes,
    connectTimeoutMs: config.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
    verbose: config.verbose,
    fetch: overrides.fetch,
    sleep: overrides.sleep,
  });

  const store = new ObservationStore({
    filePath: config.stateFile,
    retentionMinutes: config.historyMinutes,
    verbose: config.verbose,
  });

  const notifier =
    overrides.notifier ??
    new FeishuNotifier({ webhookUrl: config.feishuWebhookUrl, verbose: config.verbose, fetch: overrides.fetch });

  const evaluator = new AlertEvaluator({
    source: client,
    store,
    notifier,
    settings: { ...config.alerts, currencies: [...config.currencies] },
    verbose: config.verbose,
  });

  const daemon = new MonitorDaemon({
    runner: evaluator,
    intervalSeconds: config.pollIntervalSeconds,
    verbose: config.verbose,
  });

  return { client, store, notifier, evaluator, daemon };
}
