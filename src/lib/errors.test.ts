import { describe, it, expect } from 'vitest';
import { ConfigError, ProtocolError, RelayError, TransportError, errorMessage } from './errors.js';

describe('RelayError subclasses', () => {
  it('carry their code and class name', () => {
    const err = new ProtocolError('bad frame');
    expect(err).toBeInstanceOf(RelayError);
    expect(err.code).toBe('PROTOCOL_ERROR');
    expect(err.name).toBe('ProtocolError');
    expect(err.message).toBe('bad frame');
  });

  it('keeps the cause', () => {
    const cause = new Error('EPIPE');
    const err = new TransportError('write failed', { cause });
    expect(err.cause).toBe(cause);
    expect(err.code).toBe('TRANSPORT_ERROR');
  });

  it('ConfigError joins its problems', () => {
    const err = new ConfigError(['port out of range', 'chat.minMs > chat.maxMs']);
    expect(err.problems).toEqual(['port out of range', 'chat.minMs > chat.maxMs']);
    expect(err.message).toBe('Invalid configuration: port out of range; chat.minMs > chat.maxMs');
  });
});

describe('errorMessage', () => {
  it('unwraps Error instances', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
