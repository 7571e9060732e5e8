/**
 * Built-in mock servers, read from data/mock-servers.json
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { PRESENCES, ROLE_COLOR_RE } from './types.js';
import type { ServerSeed } from './entities.js';

const MOCK_SERVERS_FILE = new URL('../../data/mock-servers.json', import.meta.url);

const MemberSeedSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
  presence: z.enum(PRESENCES),
  roleColor: z.string().regex(ROLE_COLOR_RE),
});

const ServerSeedSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  requiresAuth: z.boolean(),
  isDefault: z.boolean(),
  members: z.array(MemberSeedSchema),
});

export const MockDataSchema = z.object({
  servers: z.array(ServerSeedSchema),
});

export function parseMockServers(raw: unknown): ServerSeed[] {
  return MockDataSchema.parse(raw).servers;
}

export function loadMockServers(file: URL | string = MOCK_SERVERS_FILE): ServerSeed[] {
  return parseMockServers(JSON.parse(readFileSync(file, 'utf-8')));
}
