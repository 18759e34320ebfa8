import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * /healthz が返す状態。healthy が false なら 503 を返す。
 */
export interface HealthReport {
  healthy: boolean;
  [key: string]: unknown;
}

export type HealthProvider = () => HealthReport;

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics で Prometheus 形式のメトリクスを、/healthz で接続と板の状態を公開
 */
export class MetricsServer {
  private server: Server | null = null;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger,
    private readonly healthProvider?: HealthProvider
  ) {}

  /**
   * HTTP サーバーを起動
   */
  start(): void {
    this.server = createServer((req, res) => {
      void this.handle(req, res);
    });

    this.server.listen(this.port, () => {
      this.logger.info('Metrics server started', { port: this.port });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method !== 'GET') {
      res.statusCode = 405;
      res.end('Method Not Allowed');
      return;
    }

    if (req.url === '/metrics') {
      try {
        const metrics = await this.metricsCollector.getMetrics();
        res.setHeader('Content-Type', this.metricsCollector.getRegistry().contentType);
        res.statusCode = 200;
        res.end(metrics);
      } catch (error) {
        this.logger.error('Failed to get metrics', { err: error });
        res.statusCode = 500;
        res.end('Internal Server Error');
      }
      return;
    }

    if (req.url === '/healthz' && this.healthProvider) {
      const report = this.healthProvider();
      res.setHeader('Content-Type', 'application/json');
      res.statusCode = report.healthy ? 200 : 503;
      res.end(JSON.stringify(report));
      return;
    }

    res.statusCode = 404;
    res.end('Not Found');
  }
}
