import { WebSocketServer, type WebSocket } from 'ws';
import type { Server as HttpServer } from 'node:http';
import type { EventLog } from '../engine/event-log.js';
import type { LoggedEvent, WsEventFrame } from '../shared/events.js';
import { bigintReplacer } from '../engine/codec.js';

export interface WsSetupResult {
  wss: WebSocketServer;
  /** Stop broadcasting and close every client. */
  close: () => Promise<void>;
}

/**
 * Set up the WebSocket server that streams committed events to clients.
 * A client connecting with `?since=<sequence>` first receives the
 * retained entries after that sequence.
 */
export function setupWebSocket(httpServer: HttpServer, eventLog: EventLog): WsSetupResult {
  const wss = new WebSocketServer({ server: httpServer, path: '/ws' });
  const clients = new Set<WebSocket>();

  wss.on('connection', (ws, req) => {
    clients.add(ws);
    console.log(`[WS] Client connected (${clients.size} total)`);

    const since = sinceParam(req.url);
    if (since !== null) {
      for (const entry of eventLog.since(since)) {
        ws.send(serialize(toWsFrame(entry)));
      }
    }

    ws.on('close', () => {
      clients.delete(ws);
      console.log(`[WS] Client disconnected (${clients.size} total)`);
    });

    ws.on('error', (err) => {
      console.error('[WS] Client error:', err.message);
      clients.delete(ws);
    });
  });

  function broadcast(frame: WsEventFrame): void {
    const data = serialize(frame);
    for (const client of clients) {
      if (client.readyState === client.OPEN) {
        client.send(data);
      }
    }
  }

  const unsubscribe = eventLog.subscribe((entry) => broadcast(toWsFrame(entry)));

  function close(): Promise<void> {
    unsubscribe();
    for (const client of clients) {
      client.terminate();
    }
    clients.clear();
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  return { wss, close };
}

export function toWsFrame(entry: LoggedEvent): WsEventFrame {
  return { type: 'event', sequence: entry.sequence, recordedAt: entry.recordedAt, event: entry.event };
}

function serialize(frame: WsEventFrame): string {
  return JSON.stringify(frame, bigintReplacer);
}

function sinceParam(url: string | undefined): number | null {
  if (!url) return null;
  const raw = new URL(url, 'http://localhost').searchParams.get('since');
  if (raw === null) return null;
  const value = Number.parseInt(raw, 10);
  return Number.isInteger(value) && value >= 0 ? value : null;
}
