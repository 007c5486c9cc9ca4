/**
 * TCP and HTTP probes used by the readiness predicates
 */

import { createConnection } from 'node:net';

export interface NetworkProber {
  /** Resolves once a TCP connection to host:port is established */
  tcp(host: string, port: number, timeoutMs: number): Promise<void>;
  /** Resolves with the response status of a GET request */
  http(url: string, timeoutMs: number): Promise<number>;
}

export class DefaultNetworkProber implements NetworkProber {
  tcp(host: string, port: number, timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });
      socket.setTimeout(timeoutMs);
      socket.once('connect', () => {
        socket.end();
        resolve();
      });
      socket.once('timeout', () => {
        socket.destroy();
        reject(new Error(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
      });
      socket.once('error', (error) => {
        socket.destroy();
        reject(error);
      });
    });
  }

  async http(url: string, timeoutMs: number): Promise<number> {
    const response = await fetch(url, {
      method: 'GET',
      redirect: 'manual',
      signal: AbortSignal.timeout(timeoutMs),
    });
    // Drain the body so the connection is released
    await response.arrayBuffer();
    return response.status;
  }
}
