import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SignalHub } from './signal-hub.js';

describe('SignalHub', () => {
  let hub: SignalHub;

  beforeEach(() => {
    hub = SignalHub.getInstance();
    hub.reset();
  });

  it('should be a singleton', () => {
    expect(SignalHub.getInstance()).toBe(SignalHub.getInstance());
  });

  it('should return the same signal for the same name', () => {
    expect(hub.signal('barUpdateEvent')).toBe(hub.signal('barUpdateEvent'));
  });

  it('should deliver sender and payload to receivers', () => {
    const receiver = vi.fn();
    const sender = { name: 'orderStatusEvent' };

    hub.signal('orderStatusEvent').connect(receiver);
    const delivered = hub.signal('orderStatusEvent').send(sender, 1, { status: 'Filled' });

    expect(delivered).toBe(true);
    expect(receiver).toHaveBeenCalledWith(sender, 1, { status: 'Filled' });
  });

  it('should keep signals independent', () => {
    const receiver = vi.fn();

    hub.signal('a').connect(receiver);
    hub.signal('b').send(null, 'payload');

    expect(receiver).not.toHaveBeenCalled();
  });

  it('should stop delivering after disconnect', () => {
    const receiver = vi.fn();
    const signal = hub.signal('positionEvent');

    signal.connect(receiver);
    signal.disconnect(receiver);

    expect(signal.send(null)).toBe(false);
    expect(receiver).not.toHaveBeenCalled();
    expect(signal.receiverCount()).toBe(0);
  });

  it('should not throw when a signal named error has no receivers', () => {
    expect(hub.signal('error').send(null, new Error('boom'))).toBe(false);
  });

  it('should propagate receiver errors to the sender', () => {
    hub.signal('errorEvent').connect(() => {
      throw new Error('receiver failed');
    });

    expect(() => hub.signal('errorEvent').send(null)).toThrow('receiver failed');
  });
});
