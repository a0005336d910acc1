#!/usr/bin/env node
import { Command } from 'commander';
import * as fs from 'node:fs';
import { loadConfig, saveConfig, defaultConfig, resolveConfigPath, type Config } from '../config.js';
import { createOrchestrator } from '../diagnostics/options.js';
import { summarizeReport } from '../health.js';
import { runWithContext } from '../context.js';
import { configureLogger, logger } from '../logger.js';
import { configureMetrics } from '../metrics.js';
import { shutdownManager } from '../shutdown.js';
import { AppError, errorMessage } from '../errors.js';
import { formatReport, reportToJSON } from './format.js';

const CONFIG_ERROR_EXIT_CODE = 2;

interface RunOptions {
  json?: boolean;
  save?: string;
  config?: string;
  count?: string;
  timeout?: string;
  dns?: string;
  logLevel?: string;
}

const program = new Command();

program
  .name('netcheck')
  .description('Local network self-diagnosis: address, gateway, reachability and DNS')
  .version('0.1.0');

program
  .command('run')
  .description('Run every check and print the report')
  .option('--json', 'Print the report and summary as JSON')
  .option('--save <path>', 'Also save the report JSON to a file')
  .option('--config <path>', 'Config file (default: ./netcheck.config.json)')
  .option('--count <n>', 'Ping probe count')
  .option('--timeout <seconds>', 'Per-probe timeout in seconds')
  .option('--dns <hosts>', 'Comma-separated hostnames to resolve')
  .option('--log-level <level>', 'debug, info, warn or error')
  .action(withErrorHandling(async (opts: RunOptions) => {
    const config = loadConfig({
      configPath: opts.config,
      overrides: {
        network: {
          pingCount: opts.count === undefined ? undefined : Number(opts.count),
          timeoutSeconds: opts.timeout === undefined ? undefined : Number(opts.timeout),
          dnsServers: opts.dns?.split(',').map(s => s.trim()).filter(Boolean),
        },
        logging: { level: opts.logLevel },
      },
    });
    applyRuntimeConfig(config);

    shutdownManager.install();
    const release = shutdownManager.trackOperation('diagnostics');
    try {
      const report = await runWithContext(
        () => createOrchestrator(config).runAllChecks(shutdownManager.signal),
        'run',
      );
      const summary = summarizeReport(report);

      console.log(opts.json ? reportToJSON(report, summary) : formatReport(report, summary));
      if (opts.save) saveOutput(opts.save, reportToJSON(report, summary));

      if (!shutdownManager.isShuttingDown()) {
        process.exitCode = summary.status === 'healthy' ? 0 : 1;
      }
    } finally {
      release();
    }
  }));

const configCommand = program
  .command('config')
  .description('Inspect or create the configuration file');

configCommand
  .command('show')
  .description('Print the effective configuration')
  .option('--config <path>', 'Config file (default: ./netcheck.config.json)')
  .action(withErrorHandling(async (opts: { config?: string }) => {
    const config = loadConfig({ configPath: opts.config });
    console.log(JSON.stringify(config, null, 2));
  }));

configCommand
  .command('init')
  .description('Write a config file with the default settings')
  .option('--config <path>', 'Where to write it (default: ./netcheck.config.json)')
  .option('--force', 'Overwrite an existing file')
  .action(withErrorHandling(async (opts: { config?: string; force?: boolean }) => {
    const { path: filePath } = resolveConfigPath(opts.config, process.env);
    if (fs.existsSync(filePath) && !opts.force) {
      console.error(`${filePath} already exists. Use --force to overwrite.`);
      process.exitCode = 1;
      return;
    }
    saveConfig(filePath, defaultConfig());
    process.stderr.write(`Wrote ${filePath}\n`);
  }));

function applyRuntimeConfig(config: Config): void {
  configureLogger({
    level: config.logging.level,
    file: config.logging.file
      ? { path: config.logging.file, maxBytes: config.logging.maxBytes, backupCount: config.logging.backupCount }
      : null,
  });
  configureMetrics(config.metrics);
}

function saveOutput(filePath: string, content: string): void {
  fs.writeFileSync(filePath, content + '\n', 'utf-8');
  process.stderr.write(`Saved to ${filePath}\n`);
}

function withErrorHandling<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof AppError && err.component === 'config') {
        const cause = err.cause ? `\n  ${err.cause.message}` : '';
        console.error(`${err.message}${cause}`);
        process.exitCode = CONFIG_ERROR_EXIT_CODE;
        return;
      }
      logger.error('Fatal error', { error: errorMessage(err) });
      process.exitCode = 1;
    }
  };
}

program.parseAsync().catch((err: unknown) => {
  logger.error('Fatal error', { error: errorMessage(err) });
  process.exitCode = 1;
});
