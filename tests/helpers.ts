// =============================================================================
// RAMPART — HTTP Test Helpers
//
// Starts the app in-process on an ephemeral port and signs bearer tokens
// with the test secret. Nothing leaves the process.
// =============================================================================

import type { Express } from 'express';
import type { Server } from 'http';
import jwt from 'jsonwebtoken';

export const TEST_SECRET = 'test-secret';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Listen on port 0 and resolve once the socket is bound */
export function startServer(app: Express): Promise<TestServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1');
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done()))),
      });
    });
  });
}

/** Bearer token for a user scoped to one tenant */
export function tokenFor(
  userId: string,
  tenantId: string,
  options: { name?: string; secret?: string; expiresIn?: number } = {}
): string {
  return jwt.sign(
    { sub: userId, tenant: tenantId, ...(options.name ? { name: options.name } : {}) },
    options.secret ?? TEST_SECRET,
    { expiresIn: options.expiresIn ?? 300 }
  );
}

/**
 * Make an API request to the test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  path: string,
  body?: unknown,
  token?: string
): Promise<Response> {
  const headers: Record<string, string> = {};
  if (token) headers['Authorization'] = `Bearer ${token}`;
  if (body !== undefined) headers['Content-Type'] = 'application/json';

  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/**
 * Parse JSON response with error context.
 */
export async function json(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

/** Reads a nested field out of a parsed body, or undefined */
export function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}
