import http from 'http';
import type { AddressInfo } from 'net';

export interface TestServer {
  url(path: string): string;
  requests(path: string): number;
  setStatus(path: string, status: number): void;
  close(): Promise<void>;
}

/**
 * In-process HTTP stand-in for service health endpoints. Unknown paths answer
 * 404; a status of 0 holds the request open without responding.
 */
export async function startTestServer(routes: Record<string, number> = {}): Promise<TestServer> {
  const statuses = new Map(Object.entries(routes));
  const counts = new Map<string, number>();

  const server = http.createServer((req, res) => {
    const path = req.url ?? '/';
    counts.set(path, (counts.get(path) ?? 0) + 1);

    const status = statuses.get(path) ?? 404;
    if (status === 0) {
      return;
    }
    res.writeHead(status, { 'Content-Type': 'text/plain' });
    res.end(String(status));
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const { port } = addressOf(server);

  return {
    url: path => `http://127.0.0.1:${port}${path}`,
    requests: path => counts.get(path) ?? 0,
    setStatus: (path, status) => {
      statuses.set(path, status);
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * A URL on a port that nothing listens on.
 */
export async function unusedUrl(path = '/health'): Promise<string> {
  const server = http.createServer();
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const { port } = addressOf(server);
  await new Promise<void>(resolve => server.close(() => resolve()));
  return `http://127.0.0.1:${port}${path}`;
}

function addressOf(server: http.Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  return address;
}
