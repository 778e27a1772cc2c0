/**
 * Unit tests for the panel transport: headers, response classification,
 * and session lifecycle. HTTP is an injected fetch stub.
 */
import { describe, it, expect } from 'vitest';
import type { HttpMethod } from '@hostpanel/shared';
import { buildUrl, decodeResponse, PanelTransport } from '../../src/lib/transport.js';
import { ApiError, DecodeError, TransportError } from '../../src/types/index.js';
import {
  APP_BASE,
  createFetchStub,
  jsonResponse,
  pendingUntilAborted,
  type RouteHandler,
} from '../helpers/panel-stub.js';

function transportWith(handler: RouteHandler, timeoutMs = 5000) {
  const stub = createFetchStub(handler);
  const transport = new PanelTransport({
    baseUrl: APP_BASE,
    apiKey: 'test-secret',
    timeoutMs,
    fetch: stub.fetch,
  });
  return { transport, calls: stub.calls };
}

describe('PanelTransport.request', () => {
  it('sends bearer and JSON headers and returns the parsed body', async () => {
    const { transport, calls } = transportWith(() => jsonResponse({ attributes: { id: 1 } }));

    const body = await transport.get('/servers/1');

    expect(body).toEqual({ attributes: { id: 1 } });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url.href).toBe('https://panel.test/api/application/servers/1');
    expect(calls[0]?.headers.get('authorization')).toBe('Bearer test-secret');
    expect(calls[0]?.headers.get('accept')).toBe('application/json');
    expect(calls[0]?.headers.get('content-type')).toBe('application/json');
  });

  it('serializes the body and query', async () => {
    const { transport, calls } = transportWith(() => jsonResponse({}));

    await transport.request('POST', '/servers/1/power', {
      body: { signal: 'start' },
      query: { admin_bypass: true },
    });

    expect(calls[0]?.method).toBe('POST');
    expect(calls[0]?.body).toEqual({ signal: 'start' });
    expect(calls[0]?.url.searchParams.get('admin_bypass')).toBe('true');
  });

  const methods: HttpMethod[] = ['GET', 'POST', 'PATCH', 'PUT', 'DELETE'];

  it.each(methods)('returns an empty object for a %s answered with 204', async (method) => {
    const { transport, calls } = transportWith(() => new Response(null, { status: 204 }));
    await expect(transport.request(method, '/users/2')).resolves.toEqual({});
    expect(calls[0]?.method).toBe(method);
  });

  it.each(methods)('returns an empty object for a %s with a whitespace body', async (method) => {
    const { transport } = transportWith(() => new Response('  \n', { status: 200 }));
    await expect(transport.request(method, '/servers/1/suspend')).resolves.toEqual({});
  });

  it('raises DecodeError for a success status with a non-JSON body', async () => {
    const { transport } = transportWith(() => new Response('<html>oops</html>', { status: 200 }));

    const error = await transport.get('/servers').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ statusCode: 200, excerpt: '<html>oops</html>' });
  });

  it('keeps only the first 500 characters of an undecodable body', async () => {
    const { transport } = transportWith(() => new Response('x'.repeat(600), { status: 200 }));

    const error = await transport.get('/servers').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error instanceof DecodeError && error.excerpt.length).toBe(500);
  });

  it('raises ApiError with the first error detail and code', async () => {
    const { transport } = transportWith(() =>
      jsonResponse(
        {
          errors: [
            { code: 'ValidationException', detail: 'The name field is required.' },
            { code: 'ValidationException', detail: 'The user field is required.' },
          ],
        },
        422,
      ),
    );

    const error = await transport.request('POST', '/servers').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      statusCode: 422,
      message: 'The name field is required.',
      code: 'ValidationException',
    });
  });

  it('falls back to the stringified body when no error detail exists', async () => {
    const { transport } = transportWith(() => jsonResponse({ message: 'boom' }, 500));

    await expect(transport.get('/nodes')).rejects.toMatchObject({
      statusCode: 500,
      message: '{"message":"boom"}',
    });
  });

  it('raises ApiError for an empty error body', async () => {
    const { transport } = transportWith(() => new Response('', { status: 404 }));

    const error = await transport.get('/servers/404').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 404, message: 'HTTP 404' });
  });

  it('raises ApiError carrying the raw text of a non-JSON error body', async () => {
    const { transport } = transportWith(() => new Response('Bad Gateway', { status: 502 }));

    const error = await transport.get('/servers').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 502, message: 'Bad Gateway' });
  });

  it('wraps connection failures in TransportError', async () => {
    const { transport } = transportWith(() => Promise.reject(new TypeError('fetch failed')));

    const error = await transport.get('/servers').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'Failed to reach panel: fetch failed',
      method: 'GET',
      path: '/servers',
    });
  });

  it('times out slow requests', async () => {
    const { transport } = transportWith(pendingUntilAborted, 20);

    const error = await transport.get('/servers').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Panel request timed out after 20ms' });
  });
});

describe('PanelTransport session', () => {
  it('opens lazily and reuses the session', async () => {
    const { transport, calls } = transportWith(() => jsonResponse({}));
    expect(transport.isOpen).toBe(false);

    await transport.get('/a');
    await transport.get('/b');

    expect(transport.isOpen).toBe(true);
    expect(calls).toHaveLength(2);
  });

  it('fails in-flight requests on close and reopens afterwards', async () => {
    let first = true;
    const { transport } = transportWith((call) => {
      if (first) {
        first = false;
        return pendingUntilAborted(call);
      }
      return jsonResponse({ ok: true });
    });

    const inFlight = transport.get('/slow').catch((e: unknown) => e);
    transport.close();
    const error = await inFlight;

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Panel transport was closed' });
    expect(transport.isOpen).toBe(false);

    await expect(transport.get('/again')).resolves.toEqual({ ok: true });
    expect(transport.isOpen).toBe(true);
  });

  it('tolerates overlapping requests', async () => {
    const { transport } = transportWith((call) => jsonResponse({ path: call.url.pathname }));

    const results = await Promise.all([transport.get('/one'), transport.get('/two')]);

    expect(results).toEqual([
      { path: '/api/application/one' },
      { path: '/api/application/two' },
    ]);
  });

  it('close on a closed transport is a no-op', () => {
    const { transport } = transportWith(() => jsonResponse({}));
    expect(() => {
      transport.close();
      transport.close();
    }).not.toThrow();
  });
});

describe('buildUrl', () => {
  it('joins base and path and skips undefined query values', () => {
    expect(
      buildUrl('https://panel.test/api/application/', '/servers', {
        page: 2,
        'filter[name]': undefined,
        admin_bypass: true,
      }),
    ).toBe('https://panel.test/api/application/servers?page=2&admin_bypass=true');
  });

  it('encodes query keys and values', () => {
    expect(buildUrl('https://panel.test', '/users', { 'filter[email]': 'a b@example.com' })).toBe(
      'https://panel.test/users?filter%5Bemail%5D=a%20b%40example.com',
    );
  });
});

describe('decodeResponse', () => {
  it('returns non-object JSON unchanged', () => {
    expect(decodeResponse(200, '[1,2]')).toEqual([1, 2]);
  });
});
