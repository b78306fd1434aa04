#!/usr/bin/env node

/**
 * lvmscope - Entry Point
 * Read-only terminal inspector for LVM volume groups, physical volumes and block devices
 */

import { Inspector } from './app.js';
import { getConfig } from './config/index.js';
import { ConfigurationError, TerminalError, toError } from './errors/index.js';
import { CommandGateway } from './inventory/index.js';
import { LifecycleManager } from './lifecycle/index.js';
import { getLogger, type Logger } from './logger/index.js';
import { BlessedTerminal } from './terminal/screen.js';

async function main(): Promise<void> {
  let terminal: BlessedTerminal | null = null;
  let log: Logger | null = null;
  try {
    // Load configuration
    const config = getConfig();

    // Initialize logger
    const logger = getLogger(config.logging);
    log = logger;

    logger.info('Starting lvmscope', {
      refreshIntervalMs: config.ui.refreshIntervalMs,
      probePartitions: config.commands.probePartitions,
    });
    const uid = process.getuid?.();
    if (uid !== undefined && uid !== 0) {
      logger.warn('Not running as root, LVM reports may be incomplete', { uid });
    }

    const lifecycle = new LifecycleManager(logger);
    const screen = BlessedTerminal.open('lvmscope');
    terminal = screen;
    const inspector = new Inspector(config, logger, screen, new CommandGateway(config.commands, logger));

    lifecycle.onStartup('initial-refresh', () => inspector.start());
    lifecycle.onShutdown('flush-logger', () => logger.close());
    lifecycle.onShutdown('restore-terminal', async () => {
      inspector.stop();
      screen.destroy();
    });
    inspector.onQuit(() => {
      void lifecycle.shutdown('quit');
    });

    await lifecycle.startup();
  } catch (error) {
    terminal?.destroy();
    log?.error('Inspector failed to start', toError(error));

    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }
    if (error instanceof TerminalError) {
      console.error('Terminal error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

// Start the inspector
void main();
