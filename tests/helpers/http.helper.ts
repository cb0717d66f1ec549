import { request, type IncomingHttpHeaders, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import type { Express } from 'express';

export interface TestResponse {
  status: number;
  headers: IncomingHttpHeaders;
  body: unknown;
}

export interface TestClient {
  get(path: string): Promise<TestResponse>;
  post(path: string, body?: unknown): Promise<TestResponse>;
  put(path: string, body?: unknown): Promise<TestResponse>;
  delete(path: string): Promise<TestResponse>;
  close(): Promise<void>;
}

const listen = (app: Express): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => resolve(server));
    server.once('error', reject);
  });

/**
 * Levanta la app en un puerto efímero local y devuelve un cliente mínimo sobre
 * `node:http`. Sin keep-alive, para que `close` no deje sockets abiertos.
 */
export async function startTestClient(app: Express): Promise<TestClient> {
  const server = await listen(app);
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('El servidor de test no expone un puerto TCP');
  }
  const { port }: AddressInfo = address;

  const send = (method: string, path: string, body?: unknown): Promise<TestResponse> =>
    new Promise((resolve, reject) => {
      const payload = body === undefined ? undefined : JSON.stringify(body);

      const req = request(
        {
          host: '127.0.0.1',
          port,
          path,
          method,
          agent: false,
          headers: payload
            ? { 'content-type': 'application/json', 'content-length': Buffer.byteLength(payload) }
            : {}
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('error', reject);
          res.on('end', () => {
            const text = Buffer.concat(chunks).toString('utf8');
            const isJson = (res.headers['content-type'] ?? '').includes('application/json');

            try {
              resolve({
                status: res.statusCode ?? 0,
                headers: res.headers,
                body: isJson && text ? JSON.parse(text) : text || null
              });
            } catch (error) {
              reject(error);
            }
          });
        }
      );

      req.on('error', reject);
      if (payload) {
        req.write(payload);
      }
      req.end();
    });

  return {
    get: (path) => send('GET', path),
    post: (path, body) => send('POST', path, body),
    put: (path, body) => send('PUT', path, body),
    delete: (path) => send('DELETE', path),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
