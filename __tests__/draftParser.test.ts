import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseDraft } from '../src/services/draftParser.js';

describe('parseDraft', () => {
  it('splits metadata lines from the body', () => {
    const raw = [
      '```html',
      'META_TITLE: Comprar casa en CDMX',
      'META_DESCRIPTION: Guía paso a paso.',
      'SLUG: Comprar Casa CDMX!',
      'EXTRACTO: Resumen corto.',
      '<h1>Título</h1>',
      '<p>Cuerpo</p>',
      '```'
    ].join('\n');

    assert.deepEqual(parseDraft(raw, 'comprar casa'), {
      title: 'Comprar casa en CDMX',
      slug: 'comprar-casa-cdmx',
      metaDescription: 'Guía paso a paso.',
      excerpt: 'Resumen corto.',
      bodyHtml: '<h1>Título</h1>\n<p>Cuerpo</p>'
    });
  });

  it('derives title and slug from the keyword when missing', () => {
    assert.deepEqual(parseDraft('<p>Solo cuerpo</p>', 'comprar casa'), {
      title: 'Comprar Casa',
      slug: 'comprar-casa',
      metaDescription: '',
      excerpt: '',
      bodyHtml: '<p>Solo cuerpo</p>'
    });
  });

  it('keeps the last occurrence of a field and removes every metadata line', () => {
    const parsed = parseDraft('META_TITLE: Uno\n<p>a</p>\n  META_TITLE: Dos\n<p>b</p>', 'x');
    assert.equal(parsed.title, 'Dos');
    assert.equal(parsed.bodyHtml, '<p>a</p>\n<p>b</p>');
  });

  it('falls back to the keyword slug when the given one cleans to nothing', () => {
    assert.equal(parseDraft('SLUG: ¡¿!\n<p>x</p>', 'crédito hipotecario').slug, 'credito-hipotecario');
  });
});
