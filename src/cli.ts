#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { MonitorConfig, loadConfig } from './config';
import { createMonitor } from './monitor';

interface CliOptions {
  config: string;
  envFile?: string;
  once?: boolean;
}

const program = new Command();

program
  .name('deribit-greeks-monitor')
  .description('Poll Deribit option Greeks and DVOL, alert to Feishu on threshold breaches')
  .version('0.1.0')
  .option('-c, --config <path>', 'YAML configuration file', 'config.yaml')
  .option('-e, --env-file <path>', 'dotenv file holding credentials and webhook URL')
  .option('--once', 'run a single poll cycle and exit')
  .action(async (options: CliOptions) => {
    dotenv.config(options.envFile ? { path: options.envFile } : undefined);

    let config: MonitorConfig;
    try {
      config = loadConfig(options.config);
    } catch (error) {
      console.error(`[Config] ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
      return;
    }

    const { daemon } = createMonitor(config);

    if (options.once) {
      const report = await daemon.runOnce();
      process.exitCode = report ? 0 : 1;
      return;
    }

    const shutdown = (signal: string) => {
      console.log(`[Monitor] ${signal} received, stopping after the current cycle`);
      daemon.stop();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    await daemon.start();
  });

program.parseAsync(process.argv).catch(error => {
  console.error('[Monitor] Fatal error:', error);
  process.exitCode = 1;
});
