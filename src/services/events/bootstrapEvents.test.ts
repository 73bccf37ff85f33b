import { describe, it, expect, vi, afterEach } from 'vitest';
import { bootstrapEvents } from './bootstrapEvents.js';

describe('bootstrapEvents', () => {
  afterEach(() => {
    bootstrapEvents.removeAllListeners();
  });

  it('delivers log events to log listeners only', () => {
    const onLog = vi.fn();
    const onStatus = vi.fn();
    bootstrapEvents.onLog(onLog);
    bootstrapEvents.onStatus(onStatus);

    const event = { timestamp: new Date(), message: 'Solving environment', level: 'info' as const, step: 'install-cuda' };
    bootstrapEvents.emitLog(event);

    expect(onLog).toHaveBeenCalledWith(event);
    expect(onStatus).not.toHaveBeenCalled();
  });

  it('delivers status events to status listeners', () => {
    const onStatus = vi.fn();
    bootstrapEvents.onStatus(onStatus);

    const event = { state: 'FAILED' as const, timestamp: new Date(), step: 'prepare', error: 'boom' };
    bootstrapEvents.emitStatus(event);

    expect(onStatus).toHaveBeenCalledTimes(1);
    expect(onStatus).toHaveBeenCalledWith(event);
  });

  it('stops delivering after a listener is removed', () => {
    const onLog = vi.fn();
    const onStatus = vi.fn();
    bootstrapEvents.onLog(onLog);
    bootstrapEvents.onStatus(onStatus);
    bootstrapEvents.removeLogListener(onLog);
    bootstrapEvents.removeStatusListener(onStatus);

    bootstrapEvents.emitLog({ timestamp: new Date(), message: 'ignored', level: 'info' });
    bootstrapEvents.emitStatus({ state: 'IN_PROGRESS', timestamp: new Date() });

    expect(onLog).not.toHaveBeenCalled();
    expect(onStatus).not.toHaveBeenCalled();
  });
});
