import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { scoreMoneyPage, selectRelevantMoneyPages } from '../src/seo/moneyPages.js';
import { makeMoneyPage } from './helpers/fixtures.js';

describe('scoreMoneyPage', () => {
  it('adds 10 per target keyword containing or contained by the keyword', () => {
    const page = makeMoneyPage({ priority: 3, targetKeywords: ['comprar casa', 'venta departamentos', 'casa'] });
    assert.equal(scoreMoneyPage('Comprar casa CDMX', page), 23);
  });

  it('adds 3 for a shared word', () => {
    const page = makeMoneyPage({ priority: 1, targetKeywords: ['casa de campo'] });
    assert.equal(scoreMoneyPage('comprar casa cdmx', page), 4);
  });

  it('is the priority alone without targets', () => {
    assert.equal(scoreMoneyPage('comprar casa', makeMoneyPage({ priority: 5 })), 5);
  });
});

describe('selectRelevantMoneyPages', () => {
  const a = makeMoneyPage({ id: 'a', priority: 5 });
  const b = makeMoneyPage({ id: 'b', priority: 1, targetKeywords: ['comprar casa'] });
  const c = makeMoneyPage({ id: 'c', priority: 3, targetKeywords: ['comprar casa'], active: false });
  const d = makeMoneyPage({ id: 'd', priority: 5 });

  it('returns the two most relevant active pages', () => {
    const picked = selectRelevantMoneyPages('comprar casa', [a, b, c, d]);
    assert.deepEqual(picked.map((p) => p.id), ['b', 'a']);
  });

  it('keeps input order on ties', () => {
    const picked = selectRelevantMoneyPages('comprar casa', [d, a, b, c], 3);
    assert.deepEqual(picked.map((p) => p.id), ['b', 'd', 'a']);
  });

  it('returns nothing for no pages', () => {
    assert.deepEqual(selectRelevantMoneyPages('comprar casa', []), []);
  });
});
