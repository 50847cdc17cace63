#!/usr/bin/env node

/**
 * Trackwise: Command Line Interface
 *
 * Ask the pipeline a question, serve it over HTTP, and inspect the
 * telemetry log.
 *
 * @module cli
 * @version 1.0.0
 */

import { Command } from 'commander';
import { ensureDirectories, getConfig, getTelemetryPath } from '../config/config.js';
import { createAgent, type Agent } from '../agent/factory.js';
import { createServer } from '../api/server.js';
import { JsonlTelemetrySink } from '../audit/telemetry-sink.js';
import { formatMarkdown } from '../documents/markdown-renderer.js';
import { InMemoryTracker } from '../integrations/tracker/memory-tracker.js';
import { TelemetryOutcomeSchema, type Config } from '../types/index.js';
import { cliLogger, formatError } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function prepareConfig(): Config {
  const config = getConfig();
  const dirs = ensureDirectories(config);
  if (!dirs.success) {
    process.stderr.write(`Error: ${dirs.error.message}\n`);
    process.exit(1);
  }
  return config;
}

function buildAgent(config: Config, demo: boolean): Agent {
  if (!demo) {
    return createAgent(config);
  }

  const tracker = new InMemoryTracker();
  tracker.seedDemoData(new Date().toISOString().slice(0, 10));
  return createAgent(config, { tracker });
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('trackwise')
  .description('Plain-language questions against a project tracker')
  .version('1.0.0');

// ═══════════════════════════════════════════════════════════════════════════
// ASK
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('ask')
  .description('Run one prompt through the pipeline')
  .argument('<prompt>', 'The request, in plain language')
  .option('--demo', 'Use the in-memory demo tracker', false)
  .option('--json', 'Print the full response as JSON', false)
  .action(async (prompt: string, options: { demo: boolean; json: boolean }) => {
    const config = prepareConfig();
    const agent = buildAgent(config, options.demo);

    try {
      const result = await agent.orchestrator.handlePrompt(prompt);

      if (options.json) {
        process.stdout.write(JSON.stringify(result, null, 2) + '\n');
      } else {
        process.stdout.write(formatMarkdown(result.response));
        if (result.artifact !== null) {
          process.stdout.write(`\nReport: ${result.artifact}${result.cached ? ' (cached)' : ''}\n`);
        }
      }

      if (result.response.kind === 'unavailable') {
        process.exitCode = 1;
      }
    } finally {
      agent.close();
    }
  });

// ═══════════════════════════════════════════════════════════════════════════
// SERVE
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('serve')
  .description('Serve the pipeline over HTTP')
  .option('-p, --port <port>', 'Port to listen on')
  .option('--demo', 'Use the in-memory demo tracker', false)
  .action(async (options: { port?: string; demo: boolean }) => {
    const config = prepareConfig();
    const port = options.port !== undefined ? parseInt(options.port, 10) : config.server.port;
    if (isNaN(port) || port < 1 || port > 65535) {
      process.stderr.write('Error: Port must be between 1 and 65535\n');
      process.exit(1);
    }

    const agent = buildAgent(config, options.demo);
    const server = await createServer(agent);

    try {
      await server.listen({ host: config.server.host, port });
      cliLogger.info({ host: config.server.host, port, demo: options.demo }, 'Server listening');
      process.stdout.write(`Listening on http://${config.server.host}:${port}\n`);
    } catch (error) {
      process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exit(1);
    }

    const shutdown = async () => {
      process.stdout.write('\nShutting down...\n');
      try {
        await server.close();
      } catch (error) {
        cliLogger.error({ err: formatError(error) }, 'Error during shutdown');
      }
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  });

// ═══════════════════════════════════════════════════════════════════════════
// TELEMETRY COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

const telemetryCmd = program.command('telemetry').description('Inspect the telemetry log');

telemetryCmd
  .command('list')
  .description('List telemetry entries')
  .option('-n, --limit <count>', 'Number of entries to show', '20')
  .option('-o, --outcome <outcome>', 'Filter by outcome (success, fallback, error)')
  .option('--since <datetime>', 'Show entries since datetime')
  .action(async (options: { limit: string; outcome?: string; since?: string }) => {
    const sink = new JsonlTelemetrySink(getTelemetryPath(prepareConfig()));

    const queryOptions: Parameters<typeof sink.list>[0] = {
      limit: parseInt(options.limit, 10),
    };
    if (options.outcome !== undefined) {
      const outcome = TelemetryOutcomeSchema.safeParse(options.outcome);
      if (!outcome.success) {
        process.stderr.write(`Error: Unknown outcome "${options.outcome}"\n`);
        process.exit(1);
      }
      queryOptions.outcome = outcome.data;
    }
    if (options.since !== undefined) {
      queryOptions.since = options.since;
    }

    const entries = await sink.list(queryOptions);

    if (entries.length === 0) {
      process.stdout.write('No telemetry entries found.\n');
      return;
    }

    for (const entry of entries) {
      process.stdout.write(
        `[${entry.sequence}] ${entry.timestamp} ${entry.outcome} ${entry.capability}${entry.cached ? ' (cached)' : ''} "${entry.prompt}"\n`,
      );
    }

    process.stdout.write(`\nShowing ${entries.length} entries\n`);
  });

telemetryCmd
  .command('verify')
  .description('Verify telemetry hash chain integrity')
  .action(async () => {
    process.stdout.write('Verifying telemetry log integrity...\n');

    const sink = new JsonlTelemetrySink(getTelemetryPath(prepareConfig()));
    const result = await sink.verify();

    if (result.valid) {
      process.stdout.write(`Telemetry log is valid (${result.entriesChecked} entries checked)\n`);
    } else {
      process.stderr.write(`Telemetry log is INVALID: ${result.error ?? 'unknown error'}\n`);
      process.exit(1);
    }
  });

// ═══════════════════════════════════════════════════════════════════════════
// PARSE & EXECUTE
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
