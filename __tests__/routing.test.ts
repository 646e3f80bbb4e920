import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { isClientPlan, isTaskType, loadRoutingTable, parseRoutingTable, resolveRoute } from '../src/config/routing.js';

describe('loadRoutingTable', () => {
  const table = loadRoutingTable();

  it('reads the shipped routing file', () => {
    assert.deepEqual(table.fallback, { provider: 'claude', model: 'haiku' });
    assert.deepEqual(resolveRoute(table, 'generacion_articulo', 'starter'), { provider: 'deepseek', model: 'deepseek-chat' });
    assert.deepEqual(resolveRoute(table, 'generacion_articulo', 'agency'), { provider: 'claude', model: 'sonnet' });
    assert.deepEqual(resolveRoute(table, 'estrategia_editorial', 'pro'), { provider: 'gemini', model: 'gemini-2.5-flash' });
  });

  it('offers no revision on the free plan', () => {
    assert.equal(resolveRoute(table, 'revision_editorial', 'free'), null);
  });

  it('freezes the table', () => {
    assert.ok(Object.isFrozen(table));
    assert.ok(Object.isFrozen(table.tasks.generacion_articulo));
  });

  it('reports a file that is not JSON', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'routing-'));
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{');
    try {
      assert.throws(() => loadRoutingTable(file), /is not valid JSON/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('parseRoutingTable', () => {
  it('defaults the fallback and missing tasks', () => {
    const table = parseRoutingTable({ tasks: { generacion_articulo: { free: { provider: 'deepseek', model: 'deepseek-chat' } } } });
    assert.deepEqual(table.fallback, { provider: 'claude', model: 'haiku' });
    assert.equal(resolveRoute(table, 'revision_editorial', 'agency'), null);
  });

  it('rejects unknown providers', () => {
    assert.throws(
      () => parseRoutingTable({ tasks: { generacion_articulo: { free: { provider: 'openai', model: 'gpt' } } } }),
      /Routing: invalid routing table/
    );
  });

  it('rejects unknown plans', () => {
    assert.throws(
      () => parseRoutingTable({ tasks: { generacion_articulo: { enterprise: { provider: 'claude', model: 'sonnet' } } } }),
      /Routing: invalid routing table/
    );
  });
});

describe('guards', () => {
  it('recognizes task types and plans', () => {
    assert.equal(isTaskType('revision_editorial'), true);
    assert.equal(isTaskType('translation'), false);
    assert.equal(isClientPlan('agency'), true);
    assert.equal(isClientPlan('enterprise'), false);
  });
});
