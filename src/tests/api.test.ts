import * as test from 'node:test';
import * as assert from 'node:assert';
import * as path from 'node:path';
import request from 'supertest';
import { createApp } from '../app.js';
import { BibliographyIdMapper } from '../bibliography.js';
import { projectRoot } from '../config.js';
import { StylesheetCache } from '../stylesheet-cache.js';
import { ENTRY_XML, entryPayload, recordingTransform, xslFixturesDir } from './fixtures.js';

const { describe, it } = test;

function createTestApp() {
  const { transform } = recordingTransform();
  return createApp({
    stylesheets: new StylesheetCache(xslFixturesDir),
    bibliography: new BibliographyIdMapper({ WB12: '123' }),
    transform
  });
}

function renderBody(fields: Record<string, string | string[]> = {}) {
  return {
    record: {
      fields: {
        id: 'MED52860',
        json: JSON.stringify(entryPayload()),
        xml: ENTRY_XML,
        official_headword: 'worde',
        headword: ['worde', 'wurde'],
        ...fields
      },
      highlighting: { official_headword: ['<em>worde</em>'], headword: ['<em>worde</em>', 'worden'] }
    },
    searchField: 'headword'
  };
}

describe('POST /api/render', () => {
  it('should render a hit', async () => {
    const res = await request(createTestApp()).post('/api/render').send(renderBody());

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.id, 'MED52860');
    assert.strictEqual(res.body.officialHeadword, '<em>worde</em>');
    assert.deepStrictEqual(res.body.otherSpellings, ['worden']);
    assert.strictEqual(res.body.form, 'FormOnly:<FORM><ORTH>worde</ORTH><POS>n</POS></FORM>');
    assert.deepStrictEqual(res.body.errors, []);
  });

  it('should render with the shipped stylesheets', async () => {
    const app = createApp({
      stylesheets: new StylesheetCache(path.join(projectRoot, 'xslt')),
      bibliography: new BibliographyIdMapper({ WB12: '123' })
    });
    const res = await request(app).post('/api/render').send(renderBody());

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.form, '<div class="form"><span class="orth">worde</span><span class="pos">n</span></div>');
    assert.strictEqual(res.body.etym, '<div class="etym">OE <i>word</i></div>');
    assert.strictEqual(res.body.senses[0].html, '<div class="definition">see worde above</div>');
    assert.deepStrictEqual(res.body.errors, []);
  });

  it('should answer an unparsable JSON body with a JSON error', async () => {
    const res = await request(createTestApp())
      .post('/api/render')
      .set('Content-Type', 'application/json')
      .send('{"record":');

    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(res.body, { error: 'Malformed JSON body' });
  });

  it('should reject a body without a record', async () => {
    const res = await request(createTestApp()).post('/api/render').send({ searchField: 'headword' });

    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.error, 'Invalid render request');
  });

  it('should reject an entry payload that does not validate', async () => {
    const res = await request(createTestApp())
      .post('/api/render')
      .send(renderBody({ json: JSON.stringify({ id: 'MED1', headwords: [] }) }));

    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.error, 'Entry payload does not match the entry schema');
  });

  it('should reject malformed entry XML', async () => {
    const res = await request(createTestApp())
      .post('/api/render')
      .send(renderBody({ xml: '<ENTRYFREE>' }));

    assert.strictEqual(res.status, 400);
    assert.ok(res.body.error.startsWith('Malformed XML'));
  });
});

describe('GET /health', () => {
  it('should report status and loaded resources', async () => {
    const res = await request(createTestApp()).get('/health');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { status: 'ok', stylesheets: 0, bibliography: 1 });
  });

  it('should 404 unknown paths', async () => {
    const res = await request(createTestApp()).get('/nope');
    assert.strictEqual(res.status, 404);
  });
});
