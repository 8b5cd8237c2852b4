import type { Server } from 'node:net';
import { serve } from '@hono/node-server';
import { createLogger, type Logger } from '@workspace/logger';
import { createApp, type AppOptions } from './app.js';

type StartServerOptions = AppOptions & {
  host: string;
  port: number;
};

type RunningServer = {
  server: Server;
  address: string;
  close: () => Promise<void>;
};

/**
 * Starts listening and resolves once the port is bound. A client that
 * disconnects mid-request aborts the request signal handed to the app.
 */
async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const logger: Logger = options.logger ?? createLogger('http');
  const app = createApp({ ...options, logger });

  const { server, address } = await new Promise<{
    server: Server;
    address: string;
  }>((resolve, reject) => {
    const listening: Server = serve(
      { fetch: app.fetch, port: options.port, hostname: options.host },
      (info) => {
        listening.off('error', reject);
        resolve({ server: listening, address: `${info.address}:${info.port}` });
      },
    );
    listening.once('error', reject);
  });

  logger.info('Server listening', { address });

  return {
    server,
    address,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }

          logger.info('Server closed', { address });
          resolve();
        });
      }),
  };
}

export { startServer };
export type { RunningServer, StartServerOptions };
