import test from 'node:test';
import assert from 'node:assert/strict';

import { ResolutionError } from '../core/errors.js';
import { annotateText, buildEndpointUrl, parseAnnotationPayload } from '../grounding/gilda.js';
import { createFakeFetch, jsonResponse, textResponse } from './helpers/fake-fetch.js';

const annotations = [
  {
    text: 'BRAF',
    start: 0,
    end: 4,
    matches: [{ term: { db: 'HGNC', id: '1097', entry_name: 'BRAF' }, score: 0.99 }]
  }
];

test('buildEndpointUrl keeps the base path', () => {
  assert.equal(buildEndpointUrl('https://grounding.indra.bio', '/annotate').toString(), 'https://grounding.indra.bio/annotate');
  assert.equal(buildEndpointUrl('http://localhost:8001/gilda/', '/annotate').toString(), 'http://localhost:8001/gilda/annotate');
});

test('annotateText posts the text as JSON and returns the annotations', async () => {
  const fake = createFakeFetch(() => jsonResponse(annotations));

  const result = await annotateText('BRAF mutations', { fetchImpl: fake.fetchImpl });

  assert.deepStrictEqual(result, annotations);
  assert.equal(fake.requests.length, 1);
  assert.equal(fake.requests[0].url, 'https://grounding.indra.bio/annotate');
  assert.equal(fake.requests[0].method, 'POST');
  assert.equal(fake.requests[0].contentType, 'application/json');
  assert.equal(fake.requests[0].body, '{"text":"BRAF mutations"}');
});

test('annotateText honours a configured base URL', async () => {
  const fake = createFakeFetch(() => jsonResponse([]));

  const result = await annotateText('nothing here', { fetchImpl: fake.fetchImpl, baseUrl: 'http://localhost:8001' });

  assert.deepStrictEqual(result, []);
  assert.equal(fake.requests[0].url, 'http://localhost:8001/annotate');
});

test('a body that is not JSON is an invalid response', async () => {
  const fake = createFakeFetch(() => textResponse('<html>maintenance</html>'));

  await assert.rejects(
    annotateText('text', { fetchImpl: fake.fetchImpl }),
    (error: unknown) =>
      error instanceof ResolutionError &&
      error.kind === 'invalid_response' &&
      error.message === 'Gilda grounding service returned a body that is not JSON'
  );
});

test('parseAnnotationPayload requires a top-level array', () => {
  assert.throws(
    () => parseAnnotationPayload('{"error":"bad input"}'),
    (error: unknown) =>
      error instanceof ResolutionError &&
      error.message === 'Gilda grounding service returned a JSON object instead of an annotation list'
  );
  assert.throws(
    () => parseAnnotationPayload('null'),
    (error: unknown) =>
      error instanceof ResolutionError &&
      error.message === 'Gilda grounding service returned null instead of an annotation list'
  );
});
