import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { WS_EVENTS } from '@shared/constants';
import type { WsMessage } from '@shared/types';

const HEARTBEAT_MS = 30_000;

let wss: WebSocketServer | null = null;

function encode(event: WsMessage['event'], data: unknown): string {
  const message: WsMessage = { event, data, timestamp: new Date().toISOString() };
  return JSON.stringify(message);
}

export function initWebSocket(server: Server): WebSocketServer {
  wss = new WebSocketServer({ server, path: '/ws' });
  const alive = new WeakMap<WebSocket, boolean>();

  wss.on('connection', (socket) => {
    alive.set(socket, true);
    socket.on('pong', () => alive.set(socket, true));
    socket.on('error', (err) => console.error('[WS] Client error:', err.message));
    socket.send(encode(WS_EVENTS.CONNECTION_ESTABLISHED, { clients: wss?.clients.size ?? 0 }));
  });

  const heartbeat = setInterval(() => {
    for (const socket of wss?.clients ?? []) {
      if (!alive.get(socket)) {
        socket.terminate();
        continue;
      }
      alive.set(socket, false);
      socket.ping();
      socket.send(encode(WS_EVENTS.HEARTBEAT, null));
    }
  }, HEARTBEAT_MS);

  wss.on('close', () => clearInterval(heartbeat));
  console.warn('[WS] WebSocket server ready on /ws');
  return wss;
}

export function broadcast(event: WsMessage['event'], data: unknown): void {
  if (!wss) return;
  const payload = encode(event, data);
  for (const socket of wss.clients) {
    if (socket.readyState === WebSocket.OPEN) socket.send(payload);
  }
}
