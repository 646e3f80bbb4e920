import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { titleCase, toSlug } from '../src/utils/slug.js';

describe('toSlug', () => {
  it('folds accents and hyphenates words', () => {
    assert.equal(toSlug('Cómo comprar casa en España'), 'como-comprar-casa-en-espana');
  });

  it('drops punctuation and collapses hyphens', () => {
    assert.equal(toSlug('  ¿Qué es un crédito -- hipotecario?  '), 'que-es-un-credito-hipotecario');
  });

  it('returns an empty string when nothing survives', () => {
    assert.equal(toSlug('¿¡!?'), '');
  });
});

describe('titleCase', () => {
  it('capitalizes each word', () => {
    assert.equal(titleCase('comprar casa cdmx'), 'Comprar Casa Cdmx');
  });

  it('handles accented initials', () => {
    assert.equal(titleCase('ÉXITO en ventas'), 'Éxito En Ventas');
  });
});
