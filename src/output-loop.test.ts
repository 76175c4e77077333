import { vi } from 'vitest';
import { ConnectTimeoutError } from './errors';
import { SharedLightState } from './light-state';
import { OutputSyncLoop, withTimeout } from './output-loop';
import { RunFlag } from './run-flag';
import type { FixtureClient } from './types';

class FakeFixture implements FixtureClient {
  connected = false;
  connect = vi.fn(async () => {
    this.connected = true;
  });
  setMaster = vi.fn(async (_on: boolean, _brightness: number) => {});
  setSegment = vi.fn(async (_index: number, _brightness: number, _colorTemperature: number) => {});
  close = vi.fn(async () => {
    this.connected = false;
  });
}

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should pass through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 100)).resolves.toBe('ok');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should reject with ConnectTimeoutError when the promise hangs', async () => {
    const pending = withTimeout(new Promise<void>(() => {}), 5000);
    const assertion = expect(pending).rejects.toBeInstanceOf(ConnectTimeoutError);

    await vi.advanceTimersByTimeAsync(5000);
    await assertion;
  });
});

describe('OutputSyncLoop', () => {
  let state: SharedLightState;
  let flag: RunFlag;
  let logger: { log: ReturnType<typeof vi.fn>; debug: ReturnType<typeof vi.fn> };
  let clients: FakeFixture[];
  let createClient: () => FixtureClient;

  function makeLoop(): OutputSyncLoop {
    return new OutputSyncLoop({ createClient, state, flag, logger });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    state = new SharedLightState();
    state.write({ on: true, brightness: 255, colorTemperature: 127 });
    flag = new RunFlag();
    logger = { log: vi.fn(), debug: vi.fn() };
    clients = [new FakeFixture(), new FakeFixture()];
    let created = 0;
    createClient = () => clients[Math.min(created++, clients.length - 1)];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('syncOnce', () => {
    it('should push only when the state differs from the last push', async () => {
      const loop = makeLoop();
      const [fixture] = clients;

      expect(await loop.syncOnce(fixture)).toBe(true);
      expect(await loop.syncOnce(fixture)).toBe(false);
      expect(await loop.syncOnce(fixture)).toBe(false);

      state.write({ colorTemperature: 90 });
      expect(await loop.syncOnce(fixture)).toBe(true);

      expect(fixture.setMaster.mock.calls).toEqual([
        [true, 255],
        [true, 255],
      ]);
      expect(fixture.setSegment.mock.calls).toEqual([
        [0, 255, 127],
        [0, 255, 90],
      ]);
    });

    it('should not record a baseline when a push fails', async () => {
      const loop = makeLoop();
      const [fixture] = clients;
      fixture.setSegment.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(loop.syncOnce(fixture)).rejects.toThrow('socket hang up');
      expect(await loop.syncOnce(fixture)).toBe(true);
    });
  });

  describe('run', () => {
    it('should push once after the settle delay and stay quiet while nothing changes', async () => {
      const loop = makeLoop();
      const [fixture] = clients;

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(499);
      expect(loop.status).toBe('connected');
      expect(fixture.setMaster).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1501);
      expect(fixture.setMaster).toHaveBeenCalledTimes(1);
      expect(fixture.setMaster).toHaveBeenCalledWith(true, 255);
      expect(fixture.setSegment).toHaveBeenCalledTimes(1);
      expect(fixture.setSegment).toHaveBeenCalledWith(0, 255, 127);

      state.write({ on: false });
      await vi.advanceTimersByTimeAsync(10);
      expect(fixture.setMaster).toHaveBeenCalledTimes(2);
      expect(fixture.setMaster).toHaveBeenLastCalledWith(false, 255);
      expect(fixture.setSegment).toHaveBeenLastCalledWith(0, 255, 127);

      flag.stop();
      await running;
      expect(fixture.close).toHaveBeenCalledTimes(1);
      expect(fixture.setMaster).toHaveBeenCalledTimes(2);
      expect(loop.status).toBe('disconnected');
      expect(logger.log).not.toHaveBeenCalled();
    });

    it('should retry after a connect timeout and push the latest state', async () => {
      const [hanging, healthy] = clients;
      hanging.connect.mockImplementation(() => new Promise<void>(() => {}));
      const loop = makeLoop();

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(4999);
      expect(loop.status).toBe('connecting');
      expect(logger.log).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(logger.log).toHaveBeenCalledWith('Connection to WLED timed out. Retrying...');
      expect(hanging.close).toHaveBeenCalledTimes(1);
      expect(loop.status).toBe('disconnected');

      state.write({ brightness: 40 });
      await vi.advanceTimersByTimeAsync(1000);
      expect(healthy.connect).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(500);
      expect(healthy.setMaster).toHaveBeenCalledWith(true, 255);
      expect(healthy.setSegment).toHaveBeenCalledWith(0, 40, 127);
      expect(hanging.setMaster).not.toHaveBeenCalled();

      flag.stop();
      await running;
    });

    it('should treat connect errors like timeouts', async () => {
      const [refused, healthy] = clients;
      refused.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const loop = makeLoop();

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(0);
      expect(logger.log).toHaveBeenCalledWith('An error occurred while connecting to WLED: ECONNREFUSED');
      expect(refused.close).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1500);
      expect(healthy.setSegment).toHaveBeenCalledWith(0, 255, 127);

      flag.stop();
      await running;
    });

    it('should reject a client that resolves connect without opening', async () => {
      const [silent] = clients;
      silent.connect.mockResolvedValueOnce(undefined);
      const loop = makeLoop();

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(0);

      expect(logger.log).toHaveBeenCalledWith('An error occurred while connecting to WLED: WLED connection did not open');

      flag.stop();
      await running;
    });

    it('should reconnect after losing the link and resynchronize', async () => {
      const [first, second] = clients;
      const loop = makeLoop();

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(1000);
      expect(first.setMaster).toHaveBeenCalledTimes(1);

      first.connected = false;
      await vi.advanceTimersByTimeAsync(10);
      expect(logger.log).toHaveBeenCalledWith('An error occurred while connecting to WLED: WLED connection lost');
      expect(first.close).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1500);
      expect(second.setMaster).toHaveBeenCalledTimes(1);
      expect(second.setMaster).toHaveBeenCalledWith(true, 255);
      expect(second.setSegment).toHaveBeenCalledWith(0, 255, 127);

      flag.stop();
      await running;
    });

    it('should reconnect after a failed push', async () => {
      const [first, second] = clients;
      first.setSegment.mockRejectedValueOnce(new Error('socket hang up'));
      const loop = makeLoop();

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(500);
      expect(logger.log).toHaveBeenCalledWith('An error occurred while connecting to WLED: socket hang up');

      await vi.advanceTimersByTimeAsync(1500);
      expect(second.setSegment).toHaveBeenCalledTimes(1);

      flag.stop();
      await running;
    });

    it('should log close failures and keep going', async () => {
      const [first] = clients;
      first.close.mockRejectedValueOnce(new Error('already closed'));
      const loop = makeLoop();

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(600);
      flag.stop();
      await running;

      expect(logger.log).toHaveBeenCalledWith('Failed to close WLED connection: already closed');
    });

    it('should let a pending connect attempt finish before exiting', async () => {
      const [hanging] = clients;
      hanging.connect.mockImplementation(() => new Promise<void>(() => {}));
      const loop = makeLoop();

      const running = loop.run();
      await vi.advanceTimersByTimeAsync(100);
      flag.stop();
      await vi.advanceTimersByTimeAsync(4900);
      await running;

      expect(hanging.close).toHaveBeenCalledTimes(1);
      expect(hanging.connect).toHaveBeenCalledTimes(1);
    });
  });
});
