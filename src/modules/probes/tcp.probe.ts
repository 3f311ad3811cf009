// src/modules/probes/tcp.probe.ts

import { connect } from 'node:net';
import type { ProbeCheck, TcpProbe } from './probes.types.js';

/**
 * Open a TCP connection to the probe's host and port and close it again.
 * The socket is destroyed as soon as the signal aborts.
 */
export function checkTcp(probe: TcpProbe, signal: AbortSignal): Promise<ProbeCheck> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve({ ok: false, diagnostic: 'aborted' });
      return;
    }

    const socket = connect({ host: probe.host, port: probe.port });

    const onAbort = () => {
      socket.destroy();
      resolve({ ok: false, diagnostic: 'aborted' });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    socket.once('connect', () => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve({ ok: true });
    });
    socket.once('error', (error) => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve({ ok: false, diagnostic: error.message });
    });
  });
}
