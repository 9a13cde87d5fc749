import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createSilentLogger, type Logger } from '@broker-daemon/shared';
import { GatewayEvent, type EmissionSink } from './gateway-event.js';

describe('GatewayEvent', () => {
  let logger: Logger;
  let event: GatewayEvent;

  beforeEach(() => {
    logger = createSilentLogger();
    event = new GatewayEvent('orderStatusEvent', logger);
  });

  it('should notify subscribers in subscription order', () => {
    const calls: string[] = [];
    event.connect(() => calls.push('first'));
    event.connect(() => calls.push('second'));

    event.emit();

    expect(calls).toEqual(['first', 'second']);
  });

  it('should notify a listener once per subscription', () => {
    const listener = vi.fn();
    event.connect(listener);
    event.connect(listener);

    event.emit('trade');

    expect(listener).toHaveBeenCalledTimes(2);
    expect(event.listenerCount()).toBe(2);
  });

  it('should keep notifying after a subscriber throws', () => {
    const error = vi.spyOn(logger, 'error');
    const after = vi.fn();
    event.connect(function failing() {
      throw new Error('handler bug');
    });
    event.connect(after);

    event.emit(42);

    expect(after).toHaveBeenCalledWith(42);
    expect(error).toHaveBeenCalledWith('Subscriber of orderStatusEvent failed', {
      event: 'orderStatusEvent',
      listener: 'failing',
      error: 'handler bug',
    });
  });

  it('should remove one subscription on disconnect', () => {
    const listener = vi.fn();
    event.connect(listener);

    expect(event.disconnect(listener)).toBe(true);
    expect(event.disconnect(listener)).toBe(false);

    event.emit();
    expect(listener).not.toHaveBeenCalled();
  });

  it('should pass emissions to sinks after subscribers', () => {
    const calls: string[] = [];
    const sink: EmissionSink = (source, args) => calls.push(`sink:${source.name}:${args.join(',')}`);
    event.connect(() => calls.push('subscriber'));

    GatewayEvent.addSink(sink);
    try {
      event.emit(1, 2);
    } finally {
      GatewayEvent.removeSink(sink);
    }

    expect(calls).toEqual(['subscriber', 'sink:orderStatusEvent:1,2']);
    expect(GatewayEvent.hasSink(sink)).toBe(false);
  });
});
