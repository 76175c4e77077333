import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { toCliArgs } from './config';
import { run } from './coordinator';
import { LineLogger, taggedLogger } from './logger';
import { RunFlag } from './run-flag';
import { SpaceNavDevice } from './spacenav';
import type { DaemonConfig, FixtureClient, InputDevice, Logger, LoopTiming } from './types';
import { WledClient } from './wled-client';

export type StopResult = 'stopped' | 'stale' | 'missing';

export function readPidFile(pidFile: string): number | null {
  let content: string;
  try {
    content = fs.readFileSync(pidFile, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  const pid = Number.parseInt(content.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

export function writePidFile(pidFile: string, pid: number = process.pid): void {
  fs.mkdirSync(path.dirname(pidFile), { recursive: true });
  fs.writeFileSync(pidFile, `${pid}`);
}

/** Removes the PID file, but only while it still names `pid`. */
export function removePidFile(pidFile: string, pid: number = process.pid): void {
  if (readPidFile(pidFile) === pid) {
    fs.rmSync(pidFile, { force: true });
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

export interface StartOptions {
  /** Entry script of the CLI; the child runs `<script> run ...`. */
  scriptPath: string;
  execArgv?: string[];
  spawnProcess?: typeof spawn;
}

/**
 * Launches `run` as a detached background process and returns its PID.
 * The child writes its own PID file; stdout and stderr go to the log file.
 */
export function startDaemon(config: DaemonConfig, options: StartOptions): number {
  const existing = readPidFile(config.pidFile);
  if (existing !== null && isProcessAlive(existing)) {
    throw new Error(`Daemon already running (PID ${existing})`);
  }

  fs.mkdirSync(path.dirname(config.logFile), { recursive: true });
  const logFd = fs.openSync(config.logFile, 'a');
  const spawnOptions: SpawnOptions = {
    detached: true,
    stdio: ['ignore', logFd, logFd],
  };

  try {
    const spawnProcess = options.spawnProcess ?? spawn;
    const child = spawnProcess(
      process.execPath,
      [...(options.execArgv ?? process.execArgv), options.scriptPath, 'run', ...toCliArgs(config)],
      spawnOptions,
    );
    if (child.pid === undefined) {
      throw new Error('Failed to spawn daemon process');
    }
    child.unref();
    return child.pid;
  } finally {
    fs.closeSync(logFd);
  }
}

export function stopDaemon(pidFile: string, print: (message: string) => void = console.log): StopResult {
  const pid = readPidFile(pidFile);
  if (pid === null) {
    print('PID file does not exist. Daemon may not be running.');
    return 'missing';
  }

  try {
    process.kill(pid, 'SIGTERM');
    print('Daemon stopped successfully.');
    return 'stopped';
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') {
      print('PID file exists but no process running. Removing stale PID file.');
      return 'stale';
    }
    throw error;
  } finally {
    fs.rmSync(pidFile, { force: true });
  }
}

export interface RunDaemonOptions {
  logger?: Logger;
  device?: InputDevice;
  createClient?: (fixtureAddress: string) => FixtureClient;
  flag?: RunFlag;
  timing?: Partial<LoopTiming>;
  signals?: NodeJS.Signals[];
}

/**
 * Foreground body of the daemon: owns the PID file and turns SIGINT/SIGTERM
 * into a cooperative shutdown of both loops.
 */
export async function runDaemon(config: DaemonConfig, options: RunDaemonOptions = {}): Promise<void> {
  const logger = options.logger ?? new LineLogger({ file: config.logFile, verbose: config.verbose });
  const flag = options.flag ?? new RunFlag();
  const signals: NodeJS.Signals[] = options.signals ?? ['SIGINT', 'SIGTERM'];

  const onSignal = (signal: NodeJS.Signals) => {
    logger.log(`[Main] Received ${signal}, shutting down...`);
    flag.stop();
  };

  writePidFile(config.pidFile);
  for (const signal of signals) {
    process.on(signal, onSignal);
  }
  try {
    await run(config.fixtureAddress, {
      device: options.device ?? new SpaceNavDevice(config.spacenavSocket),
      createClient:
        options.createClient ?? ((address) => new WledClient(address, { logger: taggedLogger(logger, 'WLED') })),
      logger,
      flag,
      timing: options.timing,
    });
  } finally {
    for (const signal of signals) {
      process.off(signal, onSignal);
    }
    removePidFile(config.pidFile);
  }
}
