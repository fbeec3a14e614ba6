#!/usr/bin/env node

import { Command } from 'commander';
import dotenv from 'dotenv';
import { loadConfig, redactConfig } from './config/load-config.js';
import type { LoopwiseConfig } from './config/schema.js';
import { makeLogger, type Logger } from './logging/logger.js';
import { bootstrap } from './core/bootstrap.js';
import { APP_VERSION } from './core/chat-service.js';
import { createApp, startServer } from './server/app.js';
import { runConsole } from './console/repl.js';
import { ConfigurationError, errorMessage } from './core/errors.js';

dotenv.config();

const program = new Command();

program
  .name('loopwise')
  .description('Tool-calling chat agent over an OpenAI-compatible completion API')
  .version(APP_VERSION);

interface ConfigOption {
  config?: string;
}

function resolveConfig(options: ConfigOption): { config: LoopwiseConfig; logger: Logger } {
  try {
    const config = loadConfig({ file: options.config });
    return { config, logger: makeLogger({ level: config.logging.level }) };
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`${err.message}:`);
      for (const issue of err.issues) {
        console.error(`  - ${issue}`);
      }
    } else {
      console.error(`Failed to load config: ${errorMessage(err)}`);
    }
    process.exit(1);
  }
}

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-p, --port <number>', 'Port to listen on (overrides PORT)')
  .option('-H, --host <host>', 'Host to bind (overrides HOST)')
  .action(async (options: ConfigOption & { port?: string; host?: string }) => {
    const { config, logger } = resolveConfig(options);
    const runtime = bootstrap(config, { logger, pruneIdleSessions: true });
    const app = createApp(runtime.service, logger);

    const host = options.host ?? config.server.host;
    const port = options.port ? parseInt(options.port, 10) : config.server.port;
    const server = await startServer(app, host, port, logger);

    logger.info(
      { model: config.transport.model, tools: runtime.service.info().tools, database: runtime.store ? 'enabled' : 'disabled' },
      'loopwise started'
    );

    const shutdown = () => {
      logger.info('shutting down');
      server.close(() => {
        runtime.close();
        process.exit(0);
      });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

program
  .command('chat')
  .description('Start an interactive console conversation')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-s, --stream', 'Start in streaming mode', false)
  .option('--session <id>', 'Session id to use for persistence')
  .action(async (options: ConfigOption & { stream: boolean; session?: string }) => {
    const { config, logger } = resolveConfig(options);
    const runtime = bootstrap(config, { logger });
    try {
      await runConsole({
        service: runtime.service,
        input: process.stdin,
        output: process.stdout,
        sessionId: options.session,
        stream: options.stream,
      });
    } finally {
      runtime.close();
    }
  });

program
  .command('sessions')
  .description('List persisted sessions')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-n, --limit <number>', 'Maximum number of sessions', '100')
  .action((options: ConfigOption & { limit: string }) => {
    const { config, logger } = resolveConfig(options);
    const runtime = bootstrap(config, { logger });
    try {
      const sessions = runtime.service.listSessions(parseInt(options.limit, 10) || 100);
      if (sessions.length === 0) {
        console.log('No sessions found.');
        return;
      }
      for (const s of sessions) {
        console.log(`${s.sessionId}  messages=${s.messageCount}  updated=${s.updatedAt}`);
      }
    } catch (err) {
      console.error(errorMessage(err));
      process.exitCode = 1;
    } finally {
      runtime.close();
    }
  });

program
  .command('tools')
  .description('List the tools a new session gets')
  .option('-c, --config <path>', 'Path to configuration file')
  .action((options: ConfigOption) => {
    const { config, logger } = resolveConfig(options);
    const runtime = bootstrap(config, { logger, store: null });
    for (const tool of runtime.service.listTools()) {
      console.log(`${tool.name} - ${tool.description}`);
    }
    runtime.close();
  });

program
  .command('config')
  .description('Show or validate configuration')
  .option('-v, --validate <path>', 'Validate a configuration file together with the environment')
  .option('-s, --show', 'Show the resolved configuration')
  .action((options: { validate?: string; show?: boolean }) => {
    if (options.validate) {
      const { config } = resolveConfig({ config: options.validate });
      console.log(`Configuration is valid (model ${config.transport.model}).`);
    } else if (options.show) {
      const { config } = resolveConfig({});
      console.log(JSON.stringify(redactConfig(config), null, 2));
    } else {
      console.log('Use --show to display the resolved config or --validate <path> to validate a config file.');
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
