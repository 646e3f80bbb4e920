import type { AuditInput } from '../../src/seo/auditor.js';
import type { Client, ExistingPostRef, MoneyPage } from '../../src/types.js';

export const KEYWORD = 'comprar casa';

// 141 characters, contains the keyword
export const GOOD_META =
  'Descubre cómo comprar casa en CDMX paso a paso: requisitos, crédito hipotecario, enganche y errores comunes que debes evitar antes de firmar.';

export function words(n: number, word = 'texto'): string {
  return Array.from({ length: n }, () => word).join(' ');
}

/**
 * An article body that passes all 14 checks for KEYWORD:
 * 1016 words, keyword 9 times, 3 H2s, 2 internal links, 1 external link,
 * one image with alt text, both secondary keywords present.
 */
export function perfectBody(): string {
  return [
    `<h1>Comprar casa en CDMX</h1>`,
    `<p>Si quieres comprar casa este año necesitas un plan claro.</p>`,
    `<img src="/img/casa.jpg" alt="comprar casa en cdmx">`,
    `<h2>Por qué comprar casa ahora</h2>`,
    `<p>${words(300)} comprar casa ${words(10)}</p>`,
    `<h2>Crédito hipotecario y enganche</h2>`,
    `<p>El crédito hipotecario y el enganche definen cuánto puedes comprar casa. ${words(300)}</p>`,
    `<h2>Errores comunes</h2>`,
    `<p>${words(300)} Antes de comprar casa revisa la <a href="/guia-credito">guía de crédito</a> y la <a href="/enganche-minimo">guía del enganche</a>.</p>`,
    `<p>Para comprar casa con asesoría visita <a href="https://inmobiliaria.example.com/servicios">nuestros servicios</a>. ${words(40)} comprar casa comprar casa</p>`,
  ].join('\n');
}

export function perfectInput(overrides: Partial<AuditInput> = {}): AuditInput {
  return {
    title: 'Comprar casa en CDMX: guía completa',
    metaDescription: GOOD_META,
    slug: 'comprar-casa-cdmx',
    bodyHtml: perfectBody(),
    primaryKeyword: KEYWORD,
    secondaryKeywords: ['crédito hipotecario', 'enganche'],
    existingPostsCount: 5,
    ...overrides,
  };
}

export function makeClient(overrides: Partial<Client> = {}): Client {
  return {
    id: 'client-1',
    name: 'Inmobiliaria Demo',
    industry: 'real estate',
    websiteUrl: 'https://inmobiliaria.example.com',
    brandTone: 'cercano',
    language: 'es',
    plan: 'starter',
    status: 'active',
    autoPublish: false,
    industryInstructions: null,
    ...overrides,
  };
}

export function makeMoneyPage(overrides: Partial<MoneyPage> = {}): MoneyPage {
  return {
    id: 'mp-1',
    url: 'https://inmobiliaria.example.com/servicios',
    title: 'Servicios inmobiliarios',
    type: 'service',
    targetKeywords: [],
    anchorTexts: ['asesoría inmobiliaria'],
    priority: 3,
    active: true,
    ...overrides,
  };
}

export function makePost(overrides: Partial<ExistingPostRef> = {}): ExistingPostRef {
  return {
    slug: 'guia-credito-hipotecario',
    title: 'Guía de crédito hipotecario',
    keyword: 'credito hipotecario casa',
    excerpt: '',
    ...overrides,
  };
}
