import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Server as HttpServer } from 'http';
import type { Logger } from '../logger.js';
import { ClientMessageSchema, type ServerMessage, type StreamStatus } from './schemas.js';

export type StatusHub = {
  broadcast: () => void;
  clientCount: () => number;
  close: () => Promise<void>;
};

export function handleClientMessage(data: RawData | string, getStatus: () => StreamStatus): ServerMessage {
  let parsedMessage: unknown;
  try {
    parsedMessage = JSON.parse(data.toString());
  } catch {
    return { type: 'error', code: 'invalid_json', message: 'Invalid JSON.' };
  }

  const result = ClientMessageSchema.safeParse(parsedMessage);
  if (!result.success) {
    return { type: 'error', code: 'invalid_message', message: 'Message failed validation.' };
  }

  const message = result.data;
  switch (message.type) {
    case 'ping':
      return { type: 'pong', t_ms: message.t_ms, server_ms: Date.now() };
    case 'request_status':
      return getStatus();
  }
}

export function createStatusHub(params: {
  server: HttpServer;
  path: string;
  intervalMs: number;
  getStatus: () => StreamStatus;
  logger: Logger;
}): StatusHub {
  const wss = new WebSocketServer({ server: params.server, path: params.path });

  const send = (ws: WebSocket, message: ServerMessage) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  };

  const broadcast = () => {
    if (wss.clients.size === 0) return;
    const status = params.getStatus();
    for (const client of wss.clients) {
      send(client, status);
    }
  };

  wss.on('connection', (ws) => {
    params.logger.debug({ clients: wss.clients.size }, 'status client connected');
    send(ws, params.getStatus());

    ws.on('message', (data) => {
      send(ws, handleClientMessage(data, params.getStatus));
    });

    ws.on('error', (error) => {
      params.logger.warn({ err: error }, 'status socket error');
    });
  });

  const timer = setInterval(broadcast, params.intervalMs);
  timer.unref();

  return {
    broadcast,
    clientCount: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(timer);
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
