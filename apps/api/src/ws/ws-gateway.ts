import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type {
  AnomalyEvent,
  SessionEventPublisherPort,
  SessionState,
  SessionSummary,
  SessionTransition,
  StatisticsReport,
} from '@evsim/domain';

type WsMessage =
  | { type: 'sessionState'; sessionId: string; state: SessionState; transition: SessionTransition }
  | { type: 'statistics'; sessionId: string; data: StatisticsReport }
  | { type: 'anomaly'; sessionId: string; data: AnomalyEvent }
  | { type: 'summary'; sessionId: string; data: SessionSummary };

let _instance: WsGateway | null = null;

export class WsGateway implements SessionEventPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    _instance = this;
    console.log('[ws-gateway] listening on /ws');
  }

  static getInstance(): WsGateway | null {
    return _instance;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishState(sessionId: string, state: SessionState, transition: SessionTransition): Promise<void> {
    this.broadcast({ type: 'sessionState', sessionId, state, transition });
  }

  async publishStatistics(sessionId: string, report: StatisticsReport): Promise<void> {
    this.broadcast({ type: 'statistics', sessionId, data: report });
  }

  async publishAnomaly(sessionId: string, event: AnomalyEvent): Promise<void> {
    this.broadcast({ type: 'anomaly', sessionId, data: event });
  }

  async publishSummary(sessionId: string, summary: SessionSummary): Promise<void> {
    this.broadcast({ type: 'summary', sessionId, data: summary });
  }

  close(): void {
    for (const client of this.clients) client.terminate();
    this.wss.close();
  }
}
