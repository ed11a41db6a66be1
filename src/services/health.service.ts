import http from 'node:http';
import { logger } from '../utils/logger';
import type { LoopStatus } from './poll-loop.service';

export interface HealthServerOptions {
  port: number;
  host?: string;
  getStatus: () => LoopStatus;
  storeName: () => string;
}

export interface HealthServer {
  port: number;
  close(): Promise<void>;
}

function sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.setHeader('content-type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(body));
}

/**
 * 헬스 체크 서버 (GET /healthz)
 * 포트 바인딩이 필요한 호스팅 환경용, ENABLE_HEALTH=true일 때만 실행
 */
export async function startHealthServer(options: HealthServerOptions): Promise<HealthServer> {
  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method === 'GET' && url.pathname === '/healthz') {
      const status = options.getStatus();
      sendJson(res, 200, {
        status: 'ok',
        state: status.state,
        passes: status.passes,
        lastPassAt: status.lastPassAt,
        lastPass: status.lastReport,
        store: options.storeName(),
      });
      return;
    }

    sendJson(res, 404, { status: 'not_found' });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host ?? '0.0.0.0', () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = address && typeof address === 'object' ? address.port : options.port;
  logger.info(`헬스 체크 서버 시작: 포트 ${port}`);

  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };
}
