import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { IHttpServer } from '../../domain/interfaces/services.interface';
import { HttpResult, ScanController } from './scan.controller';

export function createHttpApp(controller: ScanController): express.Express {
  const app = express();
  const logger = new Logger('HttpServer');

  const send = (res: Response, result: HttpResult) => {
    res.status(result.status).json(result.body);
  };

  app.get('/health', (_req: Request, res: Response) => send(res, controller.health()));
  app.get('/api/surface', (req: Request, res: Response) => {
    const kind = typeof req.query.kind === 'string' ? req.query.kind : undefined;
    send(res, controller.surface(kind));
  });
  app.get('/api/scans/:mode', (req: Request, res: Response) => send(res, controller.latest(req.params.mode)));
  app.get('/api/scans/:mode/history', (req: Request, res: Response, next: NextFunction) => {
    controller
      .history(req.params.mode)
      .then((result) => send(res, result))
      .catch(next);
  });

  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Request failed:', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

@Injectable()
export class HttpServer implements IHttpServer {
  private readonly logger = new Logger(HttpServer.name);
  private server: Server | null = null;

  constructor(private readonly controller: ScanController) {}

  public listen(port: number): Promise<void> {
    const app = createHttpApp(this.controller);
    return new Promise((resolve, reject) => {
      const server = app.listen(port, '0.0.0.0', () => {
        this.logger.info(`Results API listening on port ${port}`);
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  public close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
