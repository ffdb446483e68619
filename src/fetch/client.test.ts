import { Headers, MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HTTPError } from '../error/httpError.js';
import { FetchClient } from './client.js';

const ORIGIN = 'https://catalog.test';

describe('FetchClient', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  describe('url', () => {
    it('appends a slash to the base URL and strips leading slashes from endpoints', () => {
      const client = new FetchClient(`${ORIGIN}/api`);

      expect(client.baseUrl).toBe(`${ORIGIN}/api/`);
      expect(client.url('/products')).toBe(`${ORIGIN}/api/products`);
      expect(client.url('')).toBe(`${ORIGIN}/api/`);
    });
  });

  describe('config', () => {
    it('merges headers into the defaults', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/products', method: 'GET', headers: { 'x-base': '1', 'x-extra': '2' } })
        .reply(200, '[]');

      const client = new FetchClient(ORIGIN, { headers: { 'X-Base': '1' }, dispatcher: mockAgent });
      client.config({ headers: { 'X-Extra': '2' } });

      const [err, response] = await client.get('/products');
      expect(err).toBeNull();
      expect(response?.status).toBe(200);
      expect(client.headers.get('x-extra')).toBe('2');
    });

    it('allows removing headers via config', () => {
      const client = new FetchClient(ORIGIN, { headers: { 'X-Base': '1', 'X-Extra': '2' } });

      client.config({ headers: { 'X-Base': null } });

      expect([...client.headers.entries()]).toEqual([['x-extra', '2']]);
    });

    it('reads a shared Headers instance at request time', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/', method: 'GET', headers: { 'x-change-comment': 'late' } })
        .reply(200, '{}');

      const shared = new Headers();
      const client = new FetchClient(ORIGIN, { headers: shared, dispatcher: mockAgent });
      shared.set('X-Change-Comment', 'late');

      const [err] = await client.get('');
      expect(err).toBeNull();
    });
  });

  describe('GET', () => {
    it('requests the endpoint with its query string', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/products?brand=acme', method: 'GET' }).reply(200, '[{"id":1}]');

      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });

      const [err, response] = await client.get('products?brand=acme');
      expect(err).toBeNull();
      expect(await response?.text()).toBe('[{"id":1}]');
    });
  });

  describe('POST', () => {
    it('sends the body', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/products', method: 'POST', body: '{"name":"Widget"}' })
        .reply(201, '{"id":7}');

      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });

      const [err, response] = await client.post('products', { body: '{"name":"Widget"}' });
      expect(err).toBeNull();
      expect(response?.status).toBe(201);
    });
  });

  describe('PUT', () => {
    it('sends the body with PUT', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/products/7', method: 'PUT', body: '{"name":"Gadget"}' }).reply(200, '{}');

      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });

      const [err] = await client.put('products/7', { body: '{"name":"Gadget"}' });
      expect(err).toBeNull();
    });
  });

  describe('PATCH', () => {
    it('sends the body with PATCH', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/products/7', method: 'PATCH', body: '{"price":5}' }).reply(200, '{}');

      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });

      const [err] = await client.patch('products/7', { body: '{"price":5}' });
      expect(err).toBeNull();
    });
  });

  describe('DELETE', () => {
    it('sends the body with DELETE', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/products/7', method: 'DELETE', body: '{"reason":"eol"}' }).reply(204);

      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });

      const [err, response] = await client.delete('products/7', { body: '{"reason":"eol"}' });
      expect(err).toBeNull();
      expect(response?.status).toBe(204);
    });
  });

  describe('ERROR', () => {
    it('returns an HTTPError for non-2xx responses', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/missing', method: 'GET' }).reply(404, 'not found');

      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });

      const [err, response] = await client.get('missing');
      expect(response).toBeNull();
      expect(err).toBeInstanceOf(HTTPError);
      expect(err?.message).toBe('error in GET request in fetchClient');
      if (!(err instanceof HTTPError)) {
        throw new Error('expected an HTTPError');
      }
      expect(err.status).toBe(404);
      expect(await err.response.text()).toBe('not found');
    });

    it('wraps transport failures', async () => {
      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });

      const [err, response] = await client.get('unmocked');
      expect(response).toBeNull();
      expect(err?.message).toBe('error wrapping GET request in fetchClient');
      expect(err?.cause).toBeInstanceOf(TypeError);
    });

    it('surfaces an aborted request as a wrapped error', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/products', method: 'GET' }).reply(200, '[]');

      const client = new FetchClient(ORIGIN, { dispatcher: mockAgent });
      const controller = new AbortController();
      controller.abort();

      const [err] = await client.get('products', { signal: controller.signal });
      expect(err?.message).toBe('error wrapping GET request in fetchClient');
    });
  });
});
