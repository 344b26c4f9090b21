import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type {
  LoggerPort,
  StatusChange,
  StreamPublisherPort,
  Subscription,
  TelemetryAlert,
  TelemetryCorePort,
  TelemetryFrame,
} from '@agri-telemetry/domain';

type WsMessage =
  | { type: 'telemetry'; data: TelemetryFrame }
  | { type: 'alert'; data: TelemetryAlert }
  | { type: 'status'; data: StatusChange };

/** Fans core notifications out to every client connected on /ws. */
export class WsGateway implements StreamPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();
  private readonly subscriptions: Subscription[] = [];

  constructor(server: Server, private readonly logger: LoggerPort) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    this.logger.info('listening on /ws');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** Forwards frames, alerts and status changes of `core` to clients. */
  attach(core: TelemetryCorePort): void {
    this.subscriptions.push(
      core.subscribeData((frame) => this.forward(this.publishTelemetry(frame))),
      core.subscribeAlert((alert) => this.forward(this.publishAlert(alert))),
      core.subscribeStatus((change) => this.forward(this.publishStatus(change))),
    );
  }

  close(): Promise<void> {
    for (const sub of this.subscriptions.splice(0)) sub.unsubscribe();
    for (const client of this.clients) client.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((cause) => (cause ? reject(cause) : resolve()));
    });
  }

  private forward(pending: Promise<void>): void {
    pending.catch((cause: unknown) => {
      this.logger.warn(`broadcast failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    });
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  async publishTelemetry(frame: TelemetryFrame): Promise<void> {
    this.broadcast({ type: 'telemetry', data: frame });
  }

  async publishAlert(alert: TelemetryAlert): Promise<void> {
    this.broadcast({ type: 'alert', data: alert });
  }

  async publishStatus(change: StatusChange): Promise<void> {
    this.broadcast({ type: 'status', data: change });
  }
}
