import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { countInternalLinks, ensureInternalLinks, ensureMoneyLinks, toLinkLocale } from '../src/seo/linkInjector.js';
import { makeMoneyPage, makePost } from './helpers/fixtures.js';

const page = makeMoneyPage({ url: 'https://x.example/servicios', title: 'Servicios', anchorTexts: ['asesoría'] });

describe('ensureMoneyLinks', () => {
  it('appends a sentence to the last paragraph', () => {
    const out = ensureMoneyLinks('<p>Uno.</p><p>Dos.</p>', [page]);
    assert.equal(
      out,
      '<p>Uno.</p><p>Dos. Si te interesa, puedes conocer más sobre <a href="https://x.example/servicios" title="Servicios">asesoría</a>.</p>'
    );
  });

  it('is idempotent', () => {
    const once = ensureMoneyLinks('<p>Uno.</p>', [page]);
    assert.equal(ensureMoneyLinks(once, [page]), once);
  });

  it('skips pages the article already links to', () => {
    const html = '<p>Ver <a href="https://x.example/servicios">servicios</a>.</p>';
    assert.equal(ensureMoneyLinks(html, [page]), html);
  });

  it('leaves html without paragraphs untouched', () => {
    assert.equal(ensureMoneyLinks('<div>sin párrafos</div>', [page]), '<div>sin párrafos</div>');
  });

  it('escapes the url and stays idempotent', () => {
    const withQuery = makeMoneyPage({ url: 'https://x.example/?a=1&b=2', title: 'Planes', anchorTexts: [] });
    const once = ensureMoneyLinks('<p>Uno.</p>', [withQuery]);
    assert.equal(
      once,
      '<p>Uno. Si te interesa, puedes conocer más sobre <a href="https://x.example/?a=1&amp;b=2" title="Planes">Planes</a>.</p>'
    );
    assert.equal(ensureMoneyLinks(once, [withQuery]), once);
  });

  it('links every missing page', () => {
    const other = makeMoneyPage({ url: 'https://x.example/contacto', title: 'Contacto', anchorTexts: ['contáctanos'] });
    const out = ensureMoneyLinks('<p>Uno.</p>', [page, other], 'en');
    assert.equal(
      out,
      '<p>Uno. If you are interested, you can learn more about <a href="https://x.example/servicios" title="Servicios">asesoría</a>. If you are interested, you can learn more about <a href="https://x.example/contacto" title="Contacto">contáctanos</a>.</p>'
    );
  });
});

describe('ensureInternalLinks', () => {
  const post = makePost();
  const paragraph =
    '<p>Te puede interesar: <a href="/guia-credito-hipotecario" title="Guía de crédito hipotecario">Guía de crédito hipotecario</a></p>';

  it('inserts before the CTA box', () => {
    const out = ensureInternalLinks('<p>Intro.</p><div class="cta-box">CTA</div>', [post], 'comprar casa');
    assert.equal(out, `<p>Intro.</p>${paragraph}\n<div class="cta-box">CTA</div>`);
  });

  it('appends after the last paragraph without a CTA box', () => {
    const out = ensureInternalLinks('<p>Intro.</p>', [post], 'comprar casa');
    assert.equal(out, `<p>Intro.</p>\n${paragraph}`);
  });

  it('does nothing when two internal links exist', () => {
    const html = '<p><a href="/a">a</a> <a href="/b">b</a></p>';
    assert.equal(ensureInternalLinks(html, [post], 'comprar casa'), html);
  });

  it('stops at three internal links', () => {
    const posts = ['uno', 'dos', 'tres', 'cuatro'].map((n) => makePost({ slug: `casa-${n}`, title: `Casa ${n}`, keyword: `casa ${n}` }));
    const out = ensureInternalLinks('<p><a href="/a">a</a></p>', posts, 'comprar casa');
    assert.equal(countInternalLinks(out), 3);
    assert.ok(out.includes('/casa-uno'));
    assert.ok(out.includes('/casa-dos'));
    assert.ok(!out.includes('/casa-tres'));
  });

  it('skips unrelated posts', () => {
    const unrelated = makePost({ slug: 'jardin', title: 'Jardín', keyword: 'jardinería urbana' });
    assert.equal(ensureInternalLinks('<p>Intro.</p>', [unrelated], 'comprar casa'), '<p>Intro.</p>');
  });

  it('is idempotent', () => {
    const once = ensureInternalLinks('<p>Intro.</p>', [post], 'comprar casa');
    assert.equal(ensureInternalLinks(once, [post], 'comprar casa'), once);
  });
});

describe('countInternalLinks', () => {
  it('counts root-relative hrefs only', () => {
    assert.equal(countInternalLinks(`<a href="/x">x</a> <a href='/y'>y</a> <a href="https://z.example">z</a>`), 2);
  });
});

describe('toLinkLocale', () => {
  it('maps English variants to en and everything else to es', () => {
    assert.equal(toLinkLocale('en'), 'en');
    assert.equal(toLinkLocale('EN-us'), 'en');
    assert.equal(toLinkLocale('es'), 'es');
    assert.equal(toLinkLocale('pt'), 'es');
  });
});
