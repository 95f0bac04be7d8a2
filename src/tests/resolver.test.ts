import test from 'node:test';
import assert from 'node:assert/strict';

import { UsageError } from '../core/errors.js';
import { pmid } from './helpers/pmid.js';
import { createResolver, MockResolver, PubmedGildaResolver } from '../resolvers/index.js';
import type { RecordedRequest } from './helpers/fake-fetch.js';
import { createFakeFetch, jsonResponse, textResponse } from './helpers/fake-fetch.js';
import { articleXml, EMPTY_RESULT_XML } from './helpers/pubmed-xml.js';

const ABSTRACT = 'BRAF V600E drives melanoma growth.';
const ANNOTATIONS = [{ text: 'BRAF', start: 0, end: 4, matches: [] }];

function routeByHost(efetch: () => Response) {
  return (request: RecordedRequest): Response => {
    if (request.url.startsWith('https://eutils.ncbi.nlm.nih.gov/')) {
      return efetch();
    }
    if (request.url === 'https://grounding.indra.bio/annotate') {
      return jsonResponse(ANNOTATIONS);
    }
    return textResponse('unexpected route', 500);
  };
}

test('PubmedGildaResolver fetches, extracts and annotates', async () => {
  const fake = createFakeFetch(routeByHost(() => textResponse(articleXml('28546431', `<AbstractText>${ABSTRACT}</AbstractText>`))));
  const resolver = new PubmedGildaResolver({
    pubmed: { fetchImpl: fake.fetchImpl },
    grounding: { fetchImpl: fake.fetchImpl }
  });
  const identifier = pmid('28546431');

  const result = await resolver.resolve(identifier);

  assert.deepStrictEqual(result, { success: true, identifier, abstract: ABSTRACT, annotations: ANNOTATIONS });
  assert.equal(fake.requests.length, 2);
  assert.equal(fake.requests[1].body, JSON.stringify({ text: ABSTRACT }));
});

test('abstractOnly skips the annotation request', async () => {
  const fake = createFakeFetch(routeByHost(() => textResponse(articleXml('28546431', `<AbstractText>${ABSTRACT}</AbstractText>`))));
  const resolver = new PubmedGildaResolver({ pubmed: { fetchImpl: fake.fetchImpl } });

  const result = await resolver.resolve(pmid('28546431'), { abstractOnly: true });

  assert.equal(result.success, true);
  assert.equal(result.success && result.annotations, null);
  assert.equal(fake.requests.length, 1);
});

test('an unknown PMID resolves to a not_found failure without calling Gilda', async () => {
  const fake = createFakeFetch(routeByHost(() => textResponse(EMPTY_RESULT_XML)));
  const resolver = new PubmedGildaResolver({
    pubmed: { fetchImpl: fake.fetchImpl },
    grounding: { fetchImpl: fake.fetchImpl }
  });

  const result = await resolver.resolve(pmid('99999999'));

  assert.equal(result.success, false);
  assert.equal(!result.success && result.error.kind, 'not_found');
  assert.equal(fake.requests.length, 1);
});

test('service failures become resolution failures', async () => {
  const fake = createFakeFetch(routeByHost(() => textResponse('upstream down', 503)));
  const resolver = new PubmedGildaResolver({ pubmed: { fetchImpl: fake.fetchImpl } });

  const result = await resolver.resolve(pmid('28546431'));

  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.kind, 'http');
    assert.equal(result.error.message, 'PubMed eFetch returned HTTP 503: upstream down');
  }
});

test('faults outside resolution are rethrown', async () => {
  const resolver = new PubmedGildaResolver({ pubmed: { efetchUrl: 'not a url' } });

  await assert.rejects(resolver.resolve(pmid('1')), TypeError);
});

test('MockResolver serves records and reports unknown identifiers', async () => {
  const resolver = new MockResolver({
    records: { '28546431': { abstract: ABSTRACT, annotations: ANNOTATIONS } },
    unknown: 'not_found'
  });

  const known = await resolver.resolve(pmid('28546431'));
  const unknown = await resolver.resolve(pmid('7'));

  assert.deepStrictEqual(known, {
    success: true,
    identifier: { raw: '28546431', value: '28546431' },
    abstract: ABSTRACT,
    annotations: ANNOTATIONS
  });
  assert.equal(unknown.success, false);
  assert.equal(!unknown.success && unknown.error.message, 'PMID 7 was not found in PubMed');
  assert.deepStrictEqual(resolver.resolved, ['28546431', '7']);
});

test('MockResolver generates the same record for the same identifier', async () => {
  const resolver = new MockResolver();

  const first = await resolver.resolve(pmid('123'));
  const second = await resolver.resolve(pmid('123'));

  assert.deepStrictEqual(first, second);
  assert.equal(first.success, true);
  assert.match(first.success ? first.abstract : '', /^Synthetic abstract [0-9a-f]{12} for PMID 123\.$/);
});

test('createResolver picks the implementation by name', () => {
  assert.ok(createResolver('mock') instanceof MockResolver);
  assert.ok(createResolver('TEST') instanceof MockResolver);
  assert.ok(createResolver('auto') instanceof PubmedGildaResolver);
  assert.ok(createResolver('pubmed') instanceof PubmedGildaResolver);
  assert.throws(
    () => createResolver('crossref'),
    (error: unknown) =>
      error instanceof UsageError && error.message === 'Unknown resolver "crossref" (expected auto, pubmed or mock)'
  );
});
