import { EventEmitter } from 'events';

import { describe, expect, it } from 'vitest';
import { abortOnDisconnect } from './messages.js';

class FakeResponse extends EventEmitter {
  writableEnded = false;
}

describe('abortOnDisconnect', () => {
  it('aborts when the connection closes before the response is written', () => {
    const response = new FakeResponse();
    const signal = abortOnDisconnect(response);

    response.emit('close');

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toEqual(new Error('Client disconnected'));
  });

  it('stays quiet when the response finished first', () => {
    const response = new FakeResponse();
    const signal = abortOnDisconnect(response);

    response.writableEnded = true;
    response.emit('close');

    expect(signal.aborted).toBe(false);
  });
});
