import { describe, it, expect, beforeEach } from 'vitest';
import { EntityRegistry } from '../registry/entities.js';
import { CALLBACK_KINDS, CallbackRegistry, defaultHandlers } from './registry.js';

function makeRegistry(): EntityRegistry {
  return new EntityRegistry([
    {
      id: '1',
      name: 'alpha',
      requiresAuth: false,
      isDefault: true,
      members: [{ id: 'm1', username: 'ada', presence: 'online', roleColor: '#010203' }],
    },
  ]);
}

describe('CallbackRegistry', () => {
  let entities: EntityRegistry;
  let callbacks: CallbackRegistry;
  let clientIds: Map<string, string>;

  beforeEach(() => {
    entities = makeRegistry();
    clientIds = new Map();
    callbacks = new CallbackRegistry(defaultHandlers(entities, clientIds, 'fallback-client'));
  });

  describe('defaults', () => {
    it('resolves every kind to something callable', () => {
      for (const kind of CALLBACK_KINDS) {
        expect(typeof callbacks.resolve(kind)).toBe('function');
        expect(callbacks.isOverridden(kind)).toBe(false);
      }
    });

    it('serves servers and members from the entity registry', async () => {
      expect(Object.keys(await callbacks.resolve('server_data')())).toEqual(['1']);
      expect(await callbacks.resolve('server_data')('missing')).toEqual({});
      expect(Object.keys(await callbacks.resolve('user_data')('1'))).toEqual(['m1']);
    });

    it('denies every user', async () => {
      expect(await callbacks.resolve('validate_user')('test-token', { id: 'u1' }, '1')).toBe(false);
    });

    it('serves no static content', async () => {
      expect(await callbacks.resolve('static_request')('/index.html')).toBeUndefined();
    });

    it('prefers a per-server client id over the fallback', async () => {
      expect(await callbacks.resolve('client_id')('1')).toBe('fallback-client');
      clientIds.set('1', 'server-client');
      expect(await callbacks.resolve('client_id')('1')).toBe('server-client');
    });
  });

  describe('register', () => {
    it('overrides the default', async () => {
      callbacks.register('validate_user', (token) => token === 'test-secret');
      expect(callbacks.isOverridden('validate_user')).toBe(true);
      expect(await callbacks.resolve('validate_user')('test-secret', null, '1')).toBe(true);
      expect(await callbacks.resolve('validate_user')('wrong', null, '1')).toBe(false);
    });

    it('last registration wins on the very next resolve', async () => {
      callbacks.register('user_data', () => ({
        a: { id: 'a', username: 'from-a', presence: 'online', roleColor: '#000000' },
      }));
      expect(Object.keys(await callbacks.resolve('user_data')('1'))).toEqual(['a']);

      callbacks.register('user_data', async () => ({
        b: { id: 'b', username: 'from-b', presence: 'idle', roleColor: '#000000' },
      }));
      expect(Object.keys(await callbacks.resolve('user_data')('1'))).toEqual(['b']);
    });

    it('unregister restores the default', async () => {
      callbacks.register('server_data', () => ({}));
      expect(callbacks.unregister('server_data')).toBe(true);
      expect(Object.keys(await callbacks.resolve('server_data')())).toEqual(['1']);
      expect(callbacks.unregister('server_data')).toBe(false);
    });
  });
});
