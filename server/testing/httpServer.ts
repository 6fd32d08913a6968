import type { Server } from 'node:http';
import type { Express } from 'express';

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

export async function listenOnEphemeralPort(app: Express): Promise<RunningServer> {
  const server: Server = await new Promise((resolve) => {
    const instance = app.listen(0, () => resolve(instance));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
