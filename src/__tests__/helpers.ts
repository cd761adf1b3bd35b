/**
 * Shared fixtures for the test suites
 */
import { createServer } from 'http';
import type { Socket } from 'net';
import { vi } from 'vitest';
import { LoggerService } from '../services/logger';
import type { Persona, PersonaSource } from '../types';

/**
 * Logger whose output is swallowed; spies stay inspectable
 */
export function createSilentLogger(): LoggerService {
  const logger = new LoggerService({ level: 'DEBUG', timezone: 'UTC' });
  vi.spyOn(logger, 'debug').mockImplementation(() => {});
  vi.spyOn(logger, 'info').mockImplementation(() => {});
  vi.spyOn(logger, 'warn').mockImplementation(() => {});
  vi.spyOn(logger, 'error').mockImplementation(() => {});
  return logger;
}

export function makePersona(id: string, overrides: Partial<Persona> = {}): Persona {
  return {
    id,
    name: `${id} name`,
    icon: '🎭',
    color: 0x123456,
    description: `${id} description`,
    systemPrompt: `You are ${id}.`,
    examples: [],
    ...overrides,
  };
}

/**
 * In-memory persona registry
 */
export function createPersonaSource(personas: Persona[]): PersonaSource {
  const byId = new Map(personas.map((persona) => [persona.id, persona]));
  return {
    getPersona: (id) => byId.get(id),
    listPersonas: () => [...byId.values()].sort((a, b) => a.id.localeCompare(b.id)),
    listPersonaIds: () => [...byId.keys()].sort(),
  };
}

/**
 * Records the status and JSON body written by a route handler
 */
export class MockResponse {
  statusCode = 200;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }
}

export interface StalledServer {
  url: string;
  close(): Promise<void>;
}

/**
 * Local server that sends headers and part of a body, then never finishes
 */
export async function startStalledServer(
  contentType: string,
  partialBody: string
): Promise<StalledServer> {
  const sockets = new Set<Socket>();
  const server = createServer((_req, res) => {
    res.writeHead(200, { 'content-type': contentType });
    res.write(partialBody);
  });
  server.on('connection', (socket) => sockets.add(socket));

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve) => {
        sockets.forEach((socket) => socket.destroy());
        server.close(() => resolve());
      }),
  };
}
