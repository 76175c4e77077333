import { InputEventLoop } from './input-loop';
import { SharedLightState } from './light-state';
import { taggedLogger } from './logger';
import { OutputSyncLoop } from './output-loop';
import { RunFlag } from './run-flag';
import type { FixtureClient, InputDevice, Logger, LoopTiming } from './types';

export interface RunOptions {
  device: InputDevice;
  createClient: (fixtureAddress: string) => FixtureClient;
  logger: Logger;
  flag: RunFlag;
  state?: SharedLightState;
  timing?: Partial<LoopTiming>;
}

/**
 * Runs the input and output loops side by side until `flag` is stopped.
 * Both loops always end together: if one fails, the flag is stopped for the
 * other and the failure is rethrown once both have exited.
 */
export async function run(fixtureAddress: string, options: RunOptions): Promise<void> {
  const { flag, logger } = options;
  const state = options.state ?? new SharedLightState();

  const input = new InputEventLoop({
    device: options.device,
    state,
    flag,
    logger: taggedLogger(logger, 'Input'),
    timing: options.timing,
  });
  const output = new OutputSyncLoop({
    createClient: () => options.createClient(fixtureAddress),
    state,
    flag,
    logger: taggedLogger(logger, 'Output'),
    timing: options.timing,
  });

  logger.log('Daemon started');

  const stopOnFailure = (loop: Promise<void>) =>
    loop.catch((error: unknown) => {
      flag.stop();
      throw error;
    });

  const results = await Promise.allSettled([stopOnFailure(input.run()), stopOnFailure(output.run())]);

  logger.log('Daemon stopped');

  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }
}
