import { z } from 'zod';

const tier = (light: number, medium: number, heavy: number) =>
  z
    .object({
      level_1_light: z.number().nonnegative().default(light),
      level_2_medium: z.number().nonnegative().default(medium),
      level_3_heavy: z.number().nonnegative().default(heavy),
    })
    .default({})
    .refine(t => t.level_1_light <= t.level_2_medium && t.level_2_medium <= t.level_3_heavy, {
      message: 'tiers must be ascending (light <= medium <= heavy)',
    });

/**
 * Configuration file document (YAML keys as written by operators)
 */
export const ConfigFileSchema = z.object({
  general: z
    .object({
      poll_interval_seconds: z.number().positive().default(60),
      verbose: z.boolean().default(true),
      state_file: z.string().min(1).default('state_store.json'),
      history_minutes: z.number().positive().default(60),
    })
    .default({}),

  deribit: z
    .object({
      base_url: z.string().url().default('https://www.deribit.com'),
      underlying: z.string().min(1).default('BTC'),
      currencies: z.array(z.string().min(1)).default(['BTC', 'USDC', 'ETH', 'SOL']),
      greeks_source: z.enum(['order_book', 'position']).default('order_book'),
      retry_times: z.number().int().min(1).default(3),
      connect_timeout_seconds: z.number().positive().default(30),
      read_timeout_seconds: z.number().positive().default(60),
    })
    .default({}),

  alert: z
    .object({
      enable_alert: z.boolean().default(true),
      cooldown_seconds: z.number().nonnegative().default(300),
    })
    .default({}),

  option_greeks_thresholds: z
    .object({
      gamma: tier(0.0001, 0.0005, 0.001),
      vega: tier(10, 30, 50),
    })
    .default({}),

  dvol_thresholds: z
    .object({
      dvol_value: z
        .object({
          abs_threshold: z.number().nonnegative().default(60),
          abs_levels: z
            .object({
              level_1_light: z.number().nonnegative(),
              level_2_medium: z.number().nonnegative(),
              level_3_heavy: z.number().nonnegative(),
            })
            .optional(),
          pct_change_5m: z.number().nonnegative().default(0.05),
          abs_change_5m: z.number().nonnegative().default(5),
          specific_values: z.array(z.number()).default([]),
          specific_value_tolerance: z.number().nonnegative().default(0.5),
          trend_window_minutes: z.number().positive().default(5),
        })
        .default({}),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
