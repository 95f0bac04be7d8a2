import test from 'node:test';
import assert from 'node:assert/strict';

import { ResolutionError } from '../core/errors.js';
import { extractAbstract, extractAbstractText, hasArticle } from '../pubmed/abstract.js';
import { articleWithoutAbstractXml, articleXml, EMPTY_RESULT_XML } from './helpers/pubmed-xml.js';

test('concatenates structured abstract sections in document order', () => {
  const xml = articleXml(
    '10000001',
    `<AbstractText Label="BACKGROUND" NlmCategory="BACKGROUND">Kinase signalling drives growth.</AbstractText>
        <AbstractText Label="RESULTS" NlmCategory="RESULTS"> Loss of BRAF reduced tumour size.</AbstractText>`
  );

  assert.equal(extractAbstract(xml, '10000001'), 'Kinase signalling drives growth. Loss of BRAF reduced tumour size.');
});

test('keeps only direct text of AbstractText and decodes entities', () => {
  const xml = articleXml('1', '<AbstractText>Levels of <i>TP53</i> rose &amp; fell by 5&#x2009;% (n&#61;12).</AbstractText>');

  assert.equal(extractAbstractText(xml), 'Levels of  rose & fell by 5\u2009% (n=12).');
});

test('drops nested and self-closing markup', () => {
  assert.equal(extractAbstractText('<AbstractText>A<b>B<i>C</i>D</b>E</AbstractText>'), 'AE');
  assert.equal(extractAbstractText('<AbstractText>x<br/>y</AbstractText>'), 'xy');
});

test('reads CDATA sections as text', () => {
  assert.equal(extractAbstractText('<AbstractText><![CDATA[x < y]]> holds.</AbstractText>'), 'x < y holds.');
});

test('leaves unknown entities untouched', () => {
  assert.equal(extractAbstractText('<AbstractText>&beta;-catenin</AbstractText>'), '&beta;-catenin');
});

test('an empty eFetch result means the PMID was not found', () => {
  assert.equal(hasArticle(EMPTY_RESULT_XML), false);
  assert.throws(
    () => extractAbstract(EMPTY_RESULT_XML, '99999999'),
    (error: unknown) =>
      error instanceof ResolutionError &&
      error.kind === 'not_found' &&
      error.message === 'PMID 99999999 was not found in PubMed'
  );
});

test('an article without abstract text is reported as such', () => {
  const xml = articleWithoutAbstractXml('10000002');

  assert.equal(hasArticle(xml), true);
  assert.throws(
    () => extractAbstract(xml, '10000002'),
    (error: unknown) =>
      error instanceof ResolutionError &&
      error.kind === 'no_abstract' &&
      error.message === 'PMID 10000002 has no abstract'
  );
});

test('a whitespace-only abstract counts as missing', () => {
  const xml = articleXml('10000003', '<AbstractText>   </AbstractText>');

  assert.throws(
    () => extractAbstract(xml, '10000003'),
    (error: unknown) => error instanceof ResolutionError && error.kind === 'no_abstract'
  );
});
