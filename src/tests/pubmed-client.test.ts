import test from 'node:test';
import assert from 'node:assert/strict';

import { pmid } from './helpers/pmid.js';
import { buildEfetchUrl, fetchPubmedXml } from '../pubmed/efetch.js';
import { createFakeFetch, textResponse } from './helpers/fake-fetch.js';
import { articleXml } from './helpers/pubmed-xml.js';

test('buildEfetchUrl asks eFetch for the PubMed record as XML', () => {
  const url = buildEfetchUrl(pmid('28546431'));

  assert.equal(
    url.toString(),
    'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=pubmed&id=28546431&retmode=xml'
  );
});

test('buildEfetchUrl uses the canonical identifier and optional NCBI parameters', () => {
  const url = buildEfetchUrl(pmid('0042'), {
    efetchUrl: 'http://localhost:8080/efetch',
    apiKey: 'test-key',
    email: 'dev@example.org',
    tool: 'pmid-annotate'
  });

  assert.equal(
    url.toString(),
    'http://localhost:8080/efetch?db=pubmed&id=42&retmode=xml&api_key=test-key&email=dev%40example.org&tool=pmid-annotate'
  );
});

test('fetchPubmedXml returns the eFetch body', async () => {
  const xml = articleXml('28546431', '<AbstractText>Some text.</AbstractText>');
  const fake = createFakeFetch(() => textResponse(xml));

  const body = await fetchPubmedXml(pmid('28546431'), { fetchImpl: fake.fetchImpl });

  assert.equal(body, xml);
  assert.equal(fake.requests.length, 1);
  assert.equal(fake.requests[0].method, 'GET');
  assert.equal(
    fake.requests[0].url,
    'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=pubmed&id=28546431&retmode=xml'
  );
});
