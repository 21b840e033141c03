#!/usr/bin/env node
import 'dotenv/config';
import { program } from 'commander';
import { runConversionJob } from './lib/app.js';
import { loadConfig, type AppConfig } from './lib/config/batch.js';
import { ConfigurationError } from './lib/errors.js';
import { ChildProcessRunner } from './lib/jobs/childProcessRunner.js';
import { WebhookNotifier } from './lib/notify/webhook.js';

interface CliOptions {
  input?: string;
  output?: string;
  webhook?: string;
  timeout?: string;
}

program
  .name('url2md')
  .description('Convert a list of URLs into Markdown and JSON files')
  .option('--input <file>', 'line-delimited URL list (overrides URLS_FILE)')
  .option('--output <dir>', 'destination root (overrides DIR_SAVE)')
  .option(
    '--webhook <url>',
    'webhook that receives the report (overrides WEBHOOK_NOTIFICATION)',
  )
  .option(
    '--timeout <ms>',
    'per-URL deadline in milliseconds (overrides CONVERSION_TIMEOUT_MS)',
  )
  .parse(process.argv);

const options = program.opts<CliOptions>();

function resolveConfig(): AppConfig {
  // Flags go through the same validation as the environment
  return loadConfig({
    ...process.env,
    ...(options.input !== undefined ? { URLS_FILE: options.input } : {}),
    ...(options.output !== undefined ? { DIR_SAVE: options.output } : {}),
    ...(options.webhook !== undefined
      ? { WEBHOOK_NOTIFICATION: options.webhook }
      : {}),
    ...(options.timeout !== undefined
      ? { CONVERSION_TIMEOUT_MS: options.timeout }
      : {}),
  });
}

async function main() {
  let config: AppConfig;
  try {
    config = resolveConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Invalid configuration: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const runner = new ChildProcessRunner({
    destinationRoot: config.outputDir,
    userAgent: config.userAgent,
  });
  const notifier = new WebhookNotifier({
    includeFormattedTime: config.reportFormattedTime,
  });

  const gracefulShutdown = async (signal: string) => {
    console.log(`\n${signal} received. Stopping conversion worker...`);
    try {
      await runner.shutdown();
    } catch (error) {
      console.error('Error during shutdown:', error);
    }
    process.exit(1);
  };
  process.once('SIGINT', () => void gracefulShutdown('SIGINT'));
  process.once('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  const report = await runConversionJob(config, { runner, notifier });
  if (report === null) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
