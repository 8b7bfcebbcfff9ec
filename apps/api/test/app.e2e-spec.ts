import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import {
  RASTER_ENGINE,
  RasterEngineFailureError,
  RasterizationTimeoutError,
} from '@pdfimg/rasterizer';
import { FakeRasterEngine, PNG_SIGNATURE } from '@pdfimg/rasterizer/testing';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';

const PDF = Buffer.from('%PDF-1.7\n% three page test document\n%%EOF\n');

describe('PDF to images API (e2e)', () => {
  let root: string;
  let engine: FakeRasterEngine;
  let app: INestApplication;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'api-e2e-'));
    process.env.WORKSPACE_ROOT = root;
    process.env.RETENTION_SWEEP_INTERVAL_MS = '0';
    process.env.UPLOAD_MAX_FILE_SIZE_MB = '1';
    engine = new FakeRasterEngine();

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(RASTER_ENGINE)
      .useValue(engine)
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    delete process.env.WORKSPACE_ROOT;
    delete process.env.RETENTION_SWEEP_INTERVAL_MS;
    delete process.env.UPLOAD_MAX_FILE_SIZE_MB;
    await rm(root, { recursive: true, force: true });
  });

  function convert(query = '') {
    return request(app.getHttpServer())
      .post(`/pdf-to-images${query}`)
      .attach('pdf', PDF, 'report.pdf');
  }

  it('converts, serves, and cleans up a three page document', async () => {
    const res = await convert('?fmt=png&dpi=150').expect(200);

    const jobId: string = res.body.job_id;
    expect(res.body).toEqual({
      ok: true,
      job_id: jobId,
      format: 'png',
      dpi: 150,
      count: 3,
      files: ['page-1.png', 'page-2.png', 'page-3.png'],
      download_base: `/download/${jobId}/`,
    });

    const page = await request(app.getHttpServer())
      .get(`/download/${jobId}/page-2.png`)
      .responseType('blob')
      .expect(200)
      .expect('Content-Type', 'image/png');
    const body: Buffer = page.body;
    expect(body.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)).toBe(true);
    expect(body.subarray(PNG_SIGNATURE.length).toString()).toBe('png@150dpi page 2');

    await request(app.getHttpServer())
      .delete(`/cleanup/${jobId}`)
      .expect(200, { ok: true, message: `Job ${jobId} cleaned up` });

    await request(app.getHttpServer())
      .get(`/download/${jobId}/page-2.png`)
      .expect(404, { ok: false, error: 'File not found' });
    await request(app.getHttpServer())
      .delete(`/cleanup/${jobId}`)
      .expect(404, { ok: false, error: `Job ${jobId} not found` });
  });

  it('applies the default format and resolution', async () => {
    const res = await convert().expect(200);

    expect(res.body.format).toBe('png');
    expect(res.body.dpi).toBe(300);
  });

  it('names jpeg pages with the .jpg extension', async () => {
    const res = await convert('?fmt=jpeg').expect(200);

    expect(res.body.files).toEqual(['page-1.jpg', 'page-2.jpg', 'page-3.jpg']);
    await request(app.getHttpServer())
      .get(`/download/${res.body.job_id}/page-1.jpg`)
      .expect(200)
      .expect('Content-Type', 'image/jpeg');
  });

  it('rejects an out of range dpi before creating a workspace', async () => {
    const res = await convert('?dpi=1000').expect(400);

    expect(res.body).toEqual({ ok: false, error: 'dpi must not be greater than 600' });
    expect(await readdir(root)).toEqual([]);
    expect(engine.calls).toHaveLength(0);
  });

  it('rejects a request without a document', async () => {
    const res = await request(app.getHttpServer()).post('/pdf-to-images').expect(400);

    expect(res.body.ok).toBe(false);
  });

  it('refuses an upload above the configured size limit', async () => {
    const res = await request(app.getHttpServer())
      .post('/pdf-to-images')
      .attach('pdf', Buffer.alloc(1024 * 1024 + 1), 'large.pdf')
      .expect(413);

    expect(res.body).toEqual({ ok: false, error: 'File too large' });
    expect(await readdir(root)).toEqual([]);
    expect(engine.calls).toHaveLength(0);
  });

  it('reports a document the engine cannot read and leaves nothing behind', async () => {
    engine.failure = new RasterEngineFailureError(
      "Syntax Error: Couldn't find trailer dictionary",
      1,
    );

    const res = await convert().expect(422);

    expect(res.body.ok).toBe(false);
    expect(res.body.error).toContain("Couldn't find trailer dictionary");
    expect(await readdir(root)).toEqual([]);
  });

  it('reports a timed out conversion as 504', async () => {
    engine.failure = new RasterizationTimeoutError(300_000);

    const res = await convert().expect(504);

    expect(res.body.ok).toBe(false);
    expect(await readdir(root)).toEqual([]);
  });

  it('answers traversal attempts with 404', async () => {
    const res = await convert().expect(200);
    const jobId: string = res.body.job_id;

    await request(app.getHttpServer())
      .get(`/download/${jobId}/..%2F..%2Fetc%2Fpasswd`)
      .expect(404, { ok: false, error: 'File not found' });
    await request(app.getHttpServer())
      .get(`/download/..%2F${jobId}/page-1.png`)
      .expect(404, { ok: false, error: 'File not found' });
  });

  describe('health', () => {
    it('reports a healthy service', async () => {
      await request(app.getHttpServer())
        .get('/health')
        .expect(200, { status: 'healthy', engine_available: true, workspace_root: root });
      await request(app.getHttpServer()).get('/health/ready').expect(200);
    });

    it('degrades when the engine is unavailable', async () => {
      engine.available = false;

      await request(app.getHttpServer())
        .get('/health')
        .expect(200, { status: 'degraded', engine_available: false, workspace_root: root });
      await request(app.getHttpServer())
        .get('/health/ready')
        .expect(503, { ok: false, error: 'rasterEngine down (fake engine offline)' });
    });
  });
});
