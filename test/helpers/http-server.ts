/**
 * In-process HTTP server for tests.
 * Serves fixture files, or answers with scripted backend responses while
 * recording every request it receives.
 */

import fs from 'fs';
import http from 'http';
import path from 'path';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface StubResponse {
  status: number;
  body?: string;
  headers?: Record<string, string>;
  delayMs?: number;
  /** Written one at a time after the headers, `chunkIntervalMs` apart */
  chunks?: string[];
  chunkIntervalMs?: number;
}

export type StubHandler = (request: RecordedRequest) => StubResponse;

export function fixtureHandler(fixturesPath: string): StubHandler {
  const root = path.resolve(process.cwd(), fixturesPath);
  return (request) => {
    const pathName = decodeURIComponent(new URL(request.url, 'http://localhost').pathname.replace(/^\//, ''));
    const filePath = path.join(root, pathName);
    if (!fs.existsSync(filePath)) {
      return { status: 404, body: `Not found: ${pathName}` };
    }
    const contentType = filePath.endsWith('.json')
      ? 'application/json'
      : filePath.endsWith('.yaml') || filePath.endsWith('.yml') ? 'text/yaml' : 'text/plain';
    return { status: 200, body: fs.readFileSync(filePath, 'utf-8'), headers: { 'Content-Type': contentType } };
  };
}

export class TestHttpServer {
  readonly requests: RecordedRequest[] = [];
  private server: http.Server | null = null;
  private port = 0;
  private readonly timers = new Set<NodeJS.Timeout>();

  constructor(private handler: StubHandler) {}

  respondWith(handler: StubHandler): void {
    this.handler = handler;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.server) {
        resolve();
        return;
      }

      const server = http.createServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => {
          const recorded: RecordedRequest = {
            method: req.method ?? 'GET',
            url: req.url ?? '/',
            headers: req.headers,
            body: Buffer.concat(chunks).toString('utf-8'),
          };
          this.requests.push(recorded);

          const reply = this.handler(recorded);
          const drip = (pending: string[]): void => {
            const timer = setTimeout(() => {
              this.timers.delete(timer);
              if (res.destroyed) return;
              const [next, ...rest] = pending;
              if (next === undefined) {
                res.end();
                return;
              }
              res.write(next);
              drip(rest);
            }, reply.chunkIntervalMs ?? 0);
            this.timers.add(timer);
          };
          const send = (): void => {
            res.writeHead(reply.status, reply.headers ?? {});
            if (reply.chunks) {
              drip(reply.chunks);
            } else {
              res.end(reply.body ?? '');
            }
          };
          if (reply.delayMs) {
            const timer = setTimeout(() => {
              this.timers.delete(timer);
              if (!res.destroyed) send();
            }, reply.delayMs);
            this.timers.add(timer);
          } else {
            send();
          }
        });
      });

      server.on('error', reject);
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
        }
        this.server = server;
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      for (const timer of this.timers) clearTimeout(timer);
      this.timers.clear();
      server.closeAllConnections();
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        resolve();
      });
    });
  }

  getBaseUrl(): string {
    return `http://127.0.0.1:${this.port}`;
  }

  getFileUrl(filePath: string): string {
    return `${this.getBaseUrl()}/${filePath}`;
  }
}

/**
 * A port that was open a moment ago and is now closed
 */
export async function closedPort(): Promise<number> {
  const scratch = new TestHttpServer(() => ({ status: 204 }));
  await scratch.start();
  const port = Number(new URL(scratch.getBaseUrl()).port);
  await scratch.stop();
  return port;
}
