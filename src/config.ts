import * as os from 'os';
import * as path from 'path';
import { DEFAULT_SPNAV_SOCKET } from './spacenav';
import type { DaemonConfig } from './types';

export const DEFAULT_FIXTURE_ADDRESS = 'cctwled.local';
export const DEFAULT_LOG_FILE = '~/daemon.log';
export const DEFAULT_PID_FILE = path.resolve(__dirname, '..', '.spacelightd.pid');

/** Values given on the command line; anything unset falls back to the environment. */
export interface CliFlags {
  log?: string;
  ip_address?: string;
  verbose?: boolean;
  pidFile?: string;
  socket?: string;
}

export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === '~') return home;
  if (filePath.startsWith('~/')) return path.join(home, filePath.slice(2));
  return filePath;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(flags: CliFlags = {}, env: NodeJS.ProcessEnv = process.env): DaemonConfig {
  const fixtureAddress =
    nonEmpty(flags.ip_address) ?? nonEmpty(env.SPACELIGHT_FIXTURE_ADDRESS) ?? DEFAULT_FIXTURE_ADDRESS;
  const logFile = nonEmpty(flags.log) ?? nonEmpty(env.SPACELIGHT_LOG_FILE) ?? DEFAULT_LOG_FILE;
  const pidFile = nonEmpty(flags.pidFile) ?? nonEmpty(env.SPACELIGHT_PID_FILE) ?? DEFAULT_PID_FILE;

  return {
    fixtureAddress,
    logFile: path.resolve(expandHome(logFile)),
    pidFile: path.resolve(expandHome(pidFile)),
    spacenavSocket: nonEmpty(flags.socket) ?? nonEmpty(env.SPACENAV_SOCKET) ?? DEFAULT_SPNAV_SOCKET,
    verbose: flags.verbose || parseBoolean(env.SPACELIGHT_VERBOSE) || false,
  };
}

/** CLI flags that reproduce `config` in a child process. */
export function toCliArgs(config: DaemonConfig): string[] {
  const args = [
    '--log',
    config.logFile,
    '--ip_address',
    config.fixtureAddress,
    '--pid-file',
    config.pidFile,
    '--socket',
    config.spacenavSocket,
  ];
  if (config.verbose) {
    args.push('--verbose');
  }
  return args;
}
