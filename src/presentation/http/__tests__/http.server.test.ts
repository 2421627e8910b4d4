import { Server } from 'http';
import { createHttpApp, HttpServer } from '../http.server';
import { ScanController } from '../scan.controller';
import { GetCycleSurfaceUseCase } from '../../../application/use-cases/get-cycle-surface.use-case';
import { GetLatestScanUseCase } from '../../../application/use-cases/get-latest-scan.use-case';
import { GetScanHistoryUseCase } from '../../../application/use-cases/get-scan-history.use-case';
import { InMemoryScanResultRepository } from '../../../application/__tests__/fakes';
import { UptimeService } from '../../../infrastructure/services/uptime.service';
import { ScanRun } from '../../../domain/entities/scan-run.entity';
import { ScanMode } from '../../../domain/types/scan-mode.type';

class BrokenHistoryRepository extends InMemoryScanResultRepository {
  async findLatestRun(_mode: ScanMode): Promise<ScanRun | null> {
    throw new Error('database is locked');
  }
}

function controllerFor(repository: InMemoryScanResultRepository): ScanController {
  return new ScanController(
    new GetLatestScanUseCase(repository),
    new GetScanHistoryUseCase(repository),
    new GetCycleSurfaceUseCase(repository),
    new UptimeService(),
    1.451,
  );
}

describe('createHttpApp', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const app = createHttpApp(controllerFor(new BrokenHistoryRepository()));
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('serves health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok' });
  });

  it('rejects an unknown scan mode with 400', async () => {
    const response = await fetch(`${baseUrl}/api/scans/bogus`);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Unknown scan mode: bogus' });
  });

  it('answers 404 for the surface before any rolling scan', async () => {
    const response = await fetch(`${baseUrl}/api/surface?kind=spectrum`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'No rolling scan has completed yet' });
  });

  it('rejects an unknown surface kind with 400', async () => {
    const response = await fetch(`${baseUrl}/api/surface?kind=heat`);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Unknown surface kind: heat' });
  });

  it('turns a failing history lookup into a 500', async () => {
    const response = await fetch(`${baseUrl}/api/scans/rolling/history`);
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal server error' });
  });
});

describe('HttpServer', () => {
  it('closes cleanly when it was never started', async () => {
    const server = new HttpServer(controllerFor(new InMemoryScanResultRepository()));
    await expect(server.close()).resolves.toBeUndefined();
  });
});
