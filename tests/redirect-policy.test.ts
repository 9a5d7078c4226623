import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { RedirectError } from '../src/errors.js';
import { RedirectPolicy } from '../src/services/transfer/redirect-policy.js';
import { TraceEmitter } from '../src/services/transfer/trace.js';
import type { HopRequest } from '../src/services/transfer/types.js';

function createPolicy(maxRedirects?: number): {
  policy: RedirectPolicy;
  traces: string[];
} {
  const traces: string[] = [];
  const tracer = new TraceEmitter(
    {
      trace: (message) => traces.push(message),
      write: () => undefined,
    },
    { verbose: false, unsafeDebug: false }
  );
  const policy = new RedirectPolicy({
    tracer,
    ...(maxRedirects === undefined ? {} : { maxRedirects }),
  });
  return { policy, traces };
}

function hop(url: string, headers: Record<string, string> = {}): HopRequest {
  return { method: 'GET', url: new URL(url), headers };
}

const original = hop('https://api.example.com/start?token=abc', {
  Authorization: 'Bearer test-token',
  Accept: 'application/json',
  Host: 'api.example.com',
});

describe('RedirectPolicy', () => {
  it('copies headers from the first request, not intermediate hops', () => {
    const { policy } = createPolicy();
    const middle = hop('https://api.example.com/middle', { 'X-Middle': '1' });

    const next = policy.apply(hop('https://api.example.com/end'), [
      original,
      middle,
    ]);

    assert.deepEqual(next.headers, {
      Authorization: 'Bearer test-token',
      Accept: 'application/json',
    });
  });

  it('drops Authorization when the host changes', () => {
    const { policy } = createPolicy();
    const next = policy.apply(hop('https://cdn.example.com/file'), [original]);
    assert.deepEqual(next.headers, { Accept: 'application/json' });
  });

  it('drops Authorization when the port changes', () => {
    const { policy } = createPolicy();
    const next = policy.apply(hop('https://api.example.com:8443/file'), [
      original,
    ]);
    assert.equal(next.headers.Authorization, undefined);
  });

  it('drops Authorization when the scheme changes', () => {
    const { policy } = createPolicy();
    const next = policy.apply(hop('http://api.example.com/file'), [original]);
    assert.equal(next.headers.Authorization, undefined);
  });

  it('replaces headers case-insensitively', () => {
    const { policy } = createPolicy();
    const next = policy.apply(
      hop('https://api.example.com/file', { accept: 'text/html' }),
      [original]
    );
    assert.deepEqual(next.headers, {
      Authorization: 'Bearer test-token',
      Accept: 'application/json',
    });
  });

  it('traces the redirect without query strings', () => {
    const { policy, traces } = createPolicy();
    policy.apply(hop('https://cdn.example.com/file?sig=xyz'), [original]);
    assert.deepEqual(traces, [
      'api: redirect GET https://api.example.com/start to https://cdn.example.com/file',
    ]);
  });

  it('refuses the hop after three requests', () => {
    const { policy, traces } = createPolicy();
    const via = [
      original,
      hop('https://api.example.com/2'),
      hop('https://api.example.com/3'),
    ];

    assert.throws(() => policy.apply(hop('https://api.example.com/4'), via), {
      name: 'RedirectError',
      code: 'ETOOMANYREDIRECTS',
      message: 'stopped after 3 redirects',
      url: 'https://api.example.com/4',
    });
    assert.deepEqual(traces, []);
  });

  it('honours a custom redirect limit', () => {
    const { policy } = createPolicy(1);
    assert.throws(
      () => policy.apply(hop('https://api.example.com/2'), [original]),
      { message: 'stopped after 1 redirects' }
    );
  });

  it('requires an originating request', () => {
    const { policy } = createPolicy();
    assert.throws(
      () => policy.apply(hop('https://api.example.com/2'), []),
      (error: unknown) =>
        error instanceof RedirectError && error.code === 'EBADREDIRECT'
    );
  });
});
