import * as fs from 'node:fs';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import { AlertSettings } from '../alerts/types';
import { GreeksSource } from '../client/greeksPolicy';
import { Credentials } from '../client/session';
import { TieredThresholds } from '../types';
import { ConfigFile, ConfigFileSchema } from './schema';

export { ConfigFileSchema } from './schema';
export type { ConfigFile } from './schema';

/**
 * Validated, read-only runtime configuration
 */
export interface MonitorConfig {
  readonly credentials: Credentials;
  readonly baseUrl: string;
  readonly underlying: string;
  readonly currencies: readonly string[];
  readonly greeksSource: GreeksSource;
  readonly retryTimes: number;
  readonly connectTimeoutMs: number;
  readonly readTimeoutMs: number;
  readonly feishuWebhookUrl: string;
  readonly pollIntervalSeconds: number;
  readonly verbose: boolean;
  readonly stateFile: string;
  readonly historyMinutes: number;
  readonly alerts: Readonly<AlertSettings>;
}

/**
 * Environment variables read by the monitor
 */
export type MonitorEnv = Partial<
  Record<'DERIBIT_CLIENT_ID' | 'DERIBIT_CLIENT_SECRET' | 'DERIBIT_BASE_URL' | 'FEISHU_WEBHOOK_URL', string>
>;

function tiers(raw: { level_1_light: number; level_2_medium: number; level_3_heavy: number }): TieredThresholds {
  return { light: raw.level_1_light, medium: raw.level_2_medium, heavy: raw.level_3_heavy };
}

function describeZodError(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validates a parsed configuration document and merges secrets from the environment.
 *
 * @param document - Parsed YAML (or any plain object)
 * @param env - Environment variables (default: process.env)
 * @throws {Error} When the document fails validation
 */
export function parseConfig(document: unknown, env: MonitorEnv = process.env): MonitorConfig {
  const result = ConfigFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration: ${describeZodError(result.error)}`);
  }
  const file: ConfigFile = result.data;
  const dvol = file.dvol_thresholds.dvol_value;

  const config: MonitorConfig = {
    credentials: {
      clientId: env.DERIBIT_CLIENT_ID ?? '',
      clientSecret: env.DERIBIT_CLIENT_SECRET ?? '',
    },
    baseUrl: env.DERIBIT_BASE_URL || file.deribit.base_url,
    underlying: file.deribit.underlying,
    currencies: file.deribit.currencies,
    greeksSource: file.deribit.greeks_source,
    retryTimes: file.deribit.retry_times,
    connectTimeoutMs: file.deribit.connect_timeout_seconds * 1000,
    readTimeoutMs: file.deribit.read_timeout_seconds * 1000,
    feishuWebhookUrl: env.FEISHU_WEBHOOK_URL ?? '',
    pollIntervalSeconds: file.general.poll_interval_seconds,
    verbose: file.general.verbose,
    stateFile: file.general.state_file,
    historyMinutes: file.general.history_minutes,
    alerts: {
      enabled: file.alert.enable_alert,
      cooldownSeconds: file.alert.cooldown_seconds,
      gamma: tiers(file.option_greeks_thresholds.gamma),
      vega: tiers(file.option_greeks_thresholds.vega),
      dvol: {
        absLevels: dvol.abs_levels
          ? tiers(dvol.abs_levels)
          : { light: dvol.abs_threshold, medium: Infinity, heavy: Infinity },
        pctChange: dvol.pct_change_5m,
        absChange: dvol.abs_change_5m,
        specificValues: dvol.specific_values,
        specificTolerance: dvol.specific_value_tolerance,
        trendWindowMinutes: dvol.trend_window_minutes,
      },
      currencies: file.deribit.currencies,
      underlying: file.deribit.underlying,
    },
  };

  if (!config.credentials.clientId || !config.credentials.clientSecret) {
    console.warn('[Config] DERIBIT_CLIENT_ID / DERIBIT_CLIENT_SECRET not set, private queries will fail');
  }
  if (!config.feishuWebhookUrl) {
    console.warn('[Config] FEISHU_WEBHOOK_URL not set, alerts cannot be delivered');
  }

  return config;
}

/**
 * Loads a YAML configuration file and merges secrets from the environment.
 *
 * @param configPath - Path to the YAML file (default: config.yaml)
 * @param env - Environment variables (default: process.env)
 * @throws {Error} When the file is missing, is not valid YAML or fails validation
 */
export function loadConfig(configPath: string = 'config.yaml', env: MonitorEnv = process.env): MonitorConfig {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Config file ${configPath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(document, env);
}
