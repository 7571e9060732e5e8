import { describe, it, expect, beforeEach } from 'vitest';
import { EntityRegistry, type ServerSeed } from './entities.js';
import { loadMockServers, parseMockServers } from './mock-data.js';
import { PRESENCES, ROLE_COLOR_RE } from './types.js';

function seed(): ServerSeed[] {
  return [
    {
      id: '1',
      name: 'alpha',
      requiresAuth: false,
      isDefault: true,
      members: [
        { id: 'm1', username: 'ada', presence: 'online', roleColor: '#112233' },
        { id: 'm2', username: 'bo', presence: 'idle', roleColor: '#445566' },
      ],
    },
    { id: '2', name: 'beta', requiresAuth: true, isDefault: false, members: [] },
  ];
}

describe('EntityRegistry', () => {
  let registry: EntityRegistry;

  beforeEach(() => {
    registry = new EntityRegistry(seed());
  });

  describe('queries', () => {
    it('lists every server', () => {
      expect(registry.listServers()).toEqual({
        '1': { id: '1', name: 'alpha', requiresAuth: false, isDefault: true },
        '2': { id: '2', name: 'beta', requiresAuth: true, isDefault: false },
      });
    });

    it('filters servers by id', () => {
      expect(Object.keys(registry.listServers('2'))).toEqual(['2']);
      expect(registry.listServers('nope')).toEqual({});
    });

    it('lists members of a server', () => {
      expect(registry.listMembers('1')).toEqual({
        m1: { id: 'm1', username: 'ada', presence: 'online', roleColor: '#112233' },
        m2: { id: 'm2', username: 'bo', presence: 'idle', roleColor: '#445566' },
      });
    });

    it('returns an empty map for an unknown server', () => {
      expect(registry.listMembers('missing')).toEqual({});
    });

    it('hands out copies', () => {
      const members = registry.listMembers('1');
      members.m1.presence = 'dnd';
      expect(registry.getMember('1', 'm1')?.presence).toBe('online');
    });
  });

  describe('addServer', () => {
    it('rejects a second default server', () => {
      expect(() => registry.addServer({ id: '3', name: 'gamma', requiresAuth: false, isDefault: true }))
        .toThrow(/already is/);
    });

    it('rejects a duplicate id', () => {
      expect(() => registry.addServer({ id: '1', name: 'again', requiresAuth: false, isDefault: false }))
        .toThrow(/already registered/);
    });

    it('replaces an invalid seed colour with the default', () => {
      registry.addServer(
        { id: '3', name: 'gamma', requiresAuth: false, isDefault: false },
        [{ id: 'x', username: 'x', presence: 'online', roleColor: 'red' }],
      );
      expect(registry.getMember('3', 'x')?.roleColor).toBe('#ffffff');
    });
  });

  describe('applyPresence', () => {
    it('updates an existing member', () => {
      const outcome = registry.applyPresence('1', 'm1', 'dnd', { roleColor: '#abcdef' });
      expect(outcome).toEqual({
        status: 'updated',
        member: { id: 'm1', username: 'ada', presence: 'dnd', roleColor: '#abcdef' },
      });
    });

    it('ignores an invalid colour', () => {
      registry.applyPresence('1', 'm1', 'idle', { roleColor: '#12345' });
      expect(registry.getMember('1', 'm1')?.roleColor).toBe('#112233');
    });

    it('adds an unknown member', () => {
      const outcome = registry.applyPresence('1', 'm9', 'online', { username: 'newbie' });
      expect(outcome.status).toBe('added');
      expect(registry.getMember('1', 'm9')).toEqual({
        id: 'm9', username: 'newbie', presence: 'online', roleColor: '#ffffff',
      });
    });

    it('falls back to the id as username', () => {
      registry.applyPresence('1', 'm9', 'idle');
      expect(registry.getMember('1', 'm9')?.username).toBe('m9');
    });

    it('evicts on removal', () => {
      const outcome = registry.applyPresence('1', 'm2', 'idle', { removed: true });
      expect(outcome).toEqual({
        status: 'removed',
        member: { id: 'm2', username: 'bo', presence: 'offline', roleColor: '#445566' },
      });
      expect(registry.hasMember('1', 'm2')).toBe(false);
    });

    it('evicts when going offline even without the removed flag', () => {
      registry.applyPresence('1', 'm1', 'offline');
      expect(registry.listMembers('1').m1).toBeUndefined();
    });

    it('reports not_found for an unknown server instead of throwing', () => {
      expect(registry.applyPresence('nope', 'm1', 'online')).toEqual({ status: 'not_found' });
    });

    it('reports not_found when removing an unknown member', () => {
      expect(registry.applyPresence('1', 'ghost', 'offline', { removed: true })).toEqual({ status: 'not_found' });
    });
  });

  describe('setRequiresAuth', () => {
    it('flips the flag on a known server', () => {
      expect(registry.setRequiresAuth('1', true)).toBe(true);
      expect(registry.getServer('1')?.requiresAuth).toBe(true);
    });

    it('returns false for an unknown server', () => {
      expect(registry.setRequiresAuth('nope', true)).toBe(false);
    });
  });
});

describe('mock data', () => {
  it('loads the bundled servers with exactly one default', () => {
    const servers = loadMockServers();
    expect(servers.length).toBeGreaterThan(0);
    expect(servers.filter((s) => s.isDefault)).toHaveLength(1);
    expect(servers.some((s) => s.requiresAuth)).toBe(true);
  });

  it('seeds valid members for the default server', () => {
    const registry = new EntityRegistry(loadMockServers());
    const members = Object.values(registry.listMembers('232769614004748288'));
    expect(members.length).toBeGreaterThan(0);
    for (const m of members) {
      expect(m.id).not.toBe('');
      expect(m.username).not.toBe('');
      expect(PRESENCES).toContain(m.presence);
      expect(m.roleColor).toMatch(ROLE_COLOR_RE);
    }
  });

  it('rejects malformed seed data', () => {
    expect(() => parseMockServers({ servers: [{ id: '1', name: 'x' }] })).toThrow();
  });
});
