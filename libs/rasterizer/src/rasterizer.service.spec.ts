import { mkdir, mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { RasterizerService } from './rasterizer.service';
import {
  InvalidRasterRequestError,
  RasterEngineFailureError,
} from './rasterizer.errors';
import { RasterizeRequest, RasterizerOptions } from './rasterizer.interfaces';
import { FakeRasterEngine } from './testing/fake-raster-engine';

const OPTIONS: RasterizerOptions = {
  binary: 'pdftoppm',
  timeoutMs: 5_000,
  maxConcurrency: 2,
  jpegQuality: 95,
};

describe('RasterizerService', () => {
  let root: string;
  let engine: FakeRasterEngine;
  let service: RasterizerService;

  async function newRequest(name: string): Promise<RasterizeRequest> {
    const outputDir = join(root, name);
    await mkdir(outputDir);
    const documentPath = join(outputDir, 'source.pdf');
    await writeFile(documentPath, '%PDF-1.7\n');
    return { documentPath, outputDir, format: 'png', dpi: 300 };
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'rasterizer-spec-'));
    engine = new FakeRasterEngine();
    service = new RasterizerService(engine, OPTIONS);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('delegates to the engine, which writes one file per page', async () => {
    const request = await newRequest('job');

    await service.rasterize(request);

    expect(engine.calls).toEqual([request]);
    expect((await readdir(request.outputDir)).sort()).toEqual([
      'page-1.png',
      'page-2.png',
      'page-3.png',
      'source.pdf',
    ]);
  });

  it('rejects a dpi outside 72..600 without calling the engine', async () => {
    const request = await newRequest('job');

    await expect(service.rasterize({ ...request, dpi: 601 })).rejects.toThrow(
      InvalidRasterRequestError,
    );
    await expect(service.rasterize({ ...request, dpi: 72.5 })).rejects.toThrow(
      'dpi must be an integer between 72 and 600',
    );
    expect(engine.calls).toHaveLength(0);
  });

  it('rejects a document that does not exist', async () => {
    const request = await newRequest('job');

    await expect(
      service.rasterize({ ...request, documentPath: join(root, 'missing.pdf') }),
    ).rejects.toThrow(InvalidRasterRequestError);
    expect(engine.calls).toHaveLength(0);
  });

  it('rejects a missing output directory', async () => {
    const request = await newRequest('job');

    await expect(
      service.rasterize({ ...request, outputDir: join(root, 'nowhere') }),
    ).rejects.toThrow(`Output directory ${join(root, 'nowhere')} does not exist`);
  });

  it('propagates engine failures unchanged', async () => {
    const request = await newRequest('job');
    const failure = new RasterEngineFailureError('Incorrect password', 1);
    engine.failure = failure;

    await expect(service.rasterize(request)).rejects.toBe(failure);
  });

  it('never runs more engine processes than maxConcurrency', async () => {
    engine.delayMs = 20;
    const requests = await Promise.all(
      ['a', 'b', 'c', 'd', 'e'].map((name) => newRequest(name)),
    );

    await Promise.all(requests.map((request) => service.rasterize(request)));

    expect(engine.calls).toHaveLength(5);
    expect(engine.maxObservedConcurrency).toBe(2);
    expect(service.activeCount).toBe(0);
    expect(service.pendingCount).toBe(0);
  });

  it('reports engine availability without throwing', async () => {
    await expect(service.isEngineAvailable()).resolves.toBe(true);

    engine.available = false;
    await expect(service.probe()).resolves.toEqual({
      available: false,
      detail: 'fake engine offline',
    });

    jest.spyOn(engine, 'probe').mockRejectedValueOnce(new Error('boom'));
    await expect(service.probe()).resolves.toEqual({
      available: false,
      detail: 'boom',
    });
  });
});
