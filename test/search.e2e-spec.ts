import { INestApplication, Logger, ValidationPipe } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { CacheModule } from '../src/search/cache/cache.module';
import { CACHE_BACKEND } from '../src/search/cache/cache-backend.interface';
import { MemoryCacheBackend } from '../src/search/cache/memory-cache.backend';
import { SEARCH_ENGINE } from '../src/search/engine/search-engine.interface';
import { EMBEDDINGS_MODEL } from '../src/search/services/embedding-gateway.service';
import { SearchModule } from '../src/search/search.module';
import { RequestIdMiddleware } from '../src/shared/middleware/request-id.middleware';
import { FakeEmbeddings } from './support/fake-embeddings';
import { FakeSearchEngine, makeRecords } from './support/fake-search-engine';
import { TEST_CONFIG } from './support/search-testing';

describe('Search HTTP API (e2e)', () => {
  let app: INestApplication;
  let engine: FakeSearchEngine;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    engine = new FakeSearchEngine(makeRecords(30));

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => TEST_CONFIG],
        }),
        CacheModule,
        SearchModule,
      ],
    })
      .overrideProvider(CACHE_BACKEND)
      .useValue(new MemoryCacheBackend())
      .overrideProvider(EMBEDDINGS_MODEL)
      .useValue(new FakeEmbeddings(4))
      .overrideProvider(SEARCH_ENGINE)
      .useValue(engine)
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    const requestId = new RequestIdMiddleware();
    app.use(requestId.use.bind(requestId));
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /search', () => {
    it('returns engine results and then serves the repeat from cache', async () => {
      const first = await request(app.getHttpServer())
        .post('/search')
        .send({ query: '3 bed in Austin', size: 5 })
        .expect(200);

      expect(first.body.servedFrom).toBe('search_engine');
      expect(first.body.performance.method).toBe('hybrid_semantic');
      expect(first.body.hits).toHaveLength(5);
      expect(first.body.totalMatches).toBe(30);

      const second = await request(app.getHttpServer())
        .post('/search')
        .send({ query: '3 bed in Austin', size: 5 })
        .expect(200);

      expect(second.body.servedFrom).toBe('result_cache');
      expect(engine.queries).toHaveLength(1);
    });

    it('rejects an empty query', async () => {
      await request(app.getHttpServer())
        .post('/search')
        .send({ query: '' })
        .expect(400);
    });

    it('rejects a page size above 100', async () => {
      await request(app.getHttpServer())
        .post('/search')
        .send({ query: 'homes', size: 500 })
        .expect(400);
    });

    it('rejects unknown fields', async () => {
      await request(app.getHttpServer())
        .post('/search')
        .send({ query: 'homes', topK: 5 })
        .expect(400);
    });

    it('maps engine failures to 502', async () => {
      engine.failWith = 'query timed out';

      const response = await request(app.getHttpServer())
        .post('/search')
        .send({ query: 'homes in Austin' })
        .expect(502);

      expect(response.body.message).toBe('Search failed');
    });
  });

  describe('admin', () => {
    it('reports cache statistics', async () => {
      await request(app.getHttpServer())
        .post('/search')
        .send({ query: 'condo in Miami' })
        .expect(200);

      const response = await request(app.getHttpServer())
        .get('/admin/cache/stats')
        .expect(200);

      expect(response.body.backend).toBe('memory');
      expect(response.body.namespaces.result).toEqual({
        hits: 0,
        misses: 1,
        hitRate: 0,
        ttlSeconds: 300,
      });
      expect(response.body.popularQueries).toEqual([
        { query: 'condo in Miami', count: 1 },
      ]);
    });

    it('clears one namespace', async () => {
      await request(app.getHttpServer())
        .post('/search')
        .send({ query: 'condo in Miami' })
        .expect(200);

      const response = await request(app.getHttpServer())
        .post('/admin/cache/clear')
        .send({ scope: 'result' })
        .expect(200);

      expect(response.body).toEqual({ scope: 'result', cleared: 1 });
    });

    it('rejects an unknown scope', async () => {
      await request(app.getHttpServer())
        .post('/admin/cache/clear')
        .send({ scope: 'everything' })
        .expect(400);
    });

    it('warms popular queries on demand', async () => {
      await request(app.getHttpServer())
        .post('/search')
        .send({ query: 'condo in Miami' })
        .expect(200);

      const response = await request(app.getHttpServer())
        .post('/admin/cache/warm')
        .send({ limit: 5 })
        .expect(200);

      expect(response.body).toMatchObject({ requested: 1, warmed: 1, failed: 0 });
    });

    it('runs the expiry sweep', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/cache/cleanup')
        .expect(200);

      expect(response.body).toEqual({ removed: 0 });
    });
  });

  it('GET /health reports both dependencies', async () => {
    const response = await request(app.getHttpServer())
      .get('/health')
      .expect(200);

    expect(response.body.status).toBe('healthy');
    expect(response.body.cache.backend).toBe('memory');
    expect(response.body.searchEngine).toEqual({ connected: true });
  });

  describe('request ids', () => {
    it('echoes the caller X-Request-ID', async () => {
      await request(app.getHttpServer())
        .get('/health')
        .set('X-Request-ID', 'req-test-1')
        .expect('X-Request-ID', 'req-test-1');
    });

    it('assigns one when absent', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.headers['x-request-id']).toMatch(/^req-[0-9a-f-]{36}$/);
    });
  });
});
