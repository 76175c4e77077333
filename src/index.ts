#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { loadConfig } from './config';
import type { CliFlags } from './config';
import { runDaemon, startDaemon, stopDaemon } from './daemon';
import { errorMessage } from './errors';

dotenv.config();

function withDaemonOptions(command: Command): Command {
  return command
    .option('-l, --log <path>', 'log file location (default: ~/daemon.log)')
    .option('-i, --ip_address <host>', 'IP address or hostname of the WLED device (default: cctwled.local)')
    .option('-v, --verbose', 'enable verbose logging')
    .option('--pid-file <path>', 'PID file location')
    .option('--socket <path>', 'spacenavd socket path');
}

function fail(error: unknown): void {
  console.error(`[Main] ${errorMessage(error)}`);
  process.exitCode = 1;
}

const program = new Command();

program
  .name('spacelightd')
  .description('Daemon for controlling WLED lights with a SpaceNavigator');

withDaemonOptions(program.command('start'))
  .description('start the daemon in the background')
  .action((flags: CliFlags) => {
    try {
      const config = loadConfig(flags);
      const pid = startDaemon(config, { scriptPath: __filename });
      console.log(`Daemon started (PID ${pid}), logging to ${config.logFile}`);
    } catch (error) {
      fail(error);
    }
  });

withDaemonOptions(program.command('stop'))
  .description('stop a running daemon')
  .action((flags: CliFlags) => {
    try {
      stopDaemon(loadConfig(flags).pidFile);
    } catch (error) {
      fail(error);
    }
  });

withDaemonOptions(program.command('run'))
  .description('run the daemon in the foreground')
  .action(async (flags: CliFlags) => {
    try {
      await runDaemon(loadConfig(flags));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
