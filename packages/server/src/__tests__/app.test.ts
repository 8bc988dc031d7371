/**
 * Tests for the HTTP API, driven through the SDK client against an in-process server.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { rmSync } from 'node:fs';
import type { Server } from 'node:http';
import type Database from 'better-sqlite3';
import { HttpEsmpAPI, groupCreated, signProfileUpdate, signRequest } from 'esmp-sdk';
import { createHttpServer, matchPath } from '../app.js';
import { makeUser, setupDb, testConfig, at } from './helpers.js';

describe('matchPath', () => {
  it('extracts and decodes params', () => {
    assert.deepEqual(matchPath('/users/:pubkey/profile', '/users/ab%2Fc%3D/profile'), { pubkey: 'ab/c=' });
    assert.equal(matchPath('/users/:pubkey/profile', '/users/x/settings'), null);
    assert.equal(matchPath('/users/:pubkey/profile', '/users/%E0%A4%A/profile'), null);
  });
});

describe('HTTP API', () => {
  let server: Server;
  let db: Database.Database;
  let dir = '';
  let baseUrl = '';

  before(async () => {
    ({ db, dir } = setupDb('esmp-app-test-'));
    server = createHttpServer({ db, config: testConfig() });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('GET /health', async () => {
    const res = await new HttpEsmpAPI(baseUrl, makeUser('a#x').privateKey).health();
    assert.deepEqual(res, { ok: true, status: 200, data: { status: 'ok', version: '0.1.0' } });
  });

  // ================================================================
  // Profiles
  // ================================================================

  it('owner sees every field; others see public fields only', async () => {
    const ann = makeUser('ann#x');
    const annApi = new HttpEsmpAPI(baseUrl, ann.privateKey);

    const put = await annApi.updateProfile({
      first_name: { value: 'Ann', visibility: 'public' },
      last_name: { value: 'Lee' },
      address: { value: '1 Main Street' },
    });
    assert.equal(put.status, 200);
    assert.deepEqual(put.data?.address, { value: '1 Main Street', visibility: 'private' });

    const seen = await new HttpEsmpAPI(baseUrl, makeUser('bob#x').privateKey).getProfile(ann.pubkey);
    assert.equal(seen.status, 200);
    assert.equal(seen.data?.pubkey, ann.pubkey);
    assert.deepEqual(seen.data?.first_name, { value: 'Ann', visibility: 'public' });
    assert.deepEqual(Object.keys(seen.data ?? {}).sort(), ['first_name', 'pubkey', 'updated_at']);

    const own = await annApi.getOwnProfile();
    assert.equal(own.status, 200);
    assert.deepEqual(own.data?.last_name, { value: 'Lee', visibility: 'private' });
    assert.deepEqual(own.data?.address, { value: '1 Main Street', visibility: 'private' });
  });

  it('a 51-character first name is rejected with 400 and creates no profile', async () => {
    const cat = makeUser('cat#x');
    const api = new HttpEsmpAPI(baseUrl, cat.privateKey);

    const res = await api.updateProfile({ first_name: { value: 'a'.repeat(51) } });

    assert.equal(res.status, 400);
    assert.equal(res.error, 'InvalidField: first_name is too long (max 50 characters)');
    assert.equal((await api.getProfile(cat.pubkey)).status, 404);
  });

  it('PUT signed by another key is 403', async () => {
    const dan = makeUser('dan#x');
    const eve = makeUser('eve#x');
    const body = signProfileUpdate({ first_name: { value: 'Dan' } }, eve.privateKey);

    const res = await fetch(`${baseUrl}/users/${encodeURIComponent(dan.pubkey)}/profile`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    assert.equal(res.status, 403);
    assert.deepEqual(await res.json(), {
      error: 'Forbidden',
      message: 'Signature does not match the profile owner',
      field: 'signature',
    });
  });

  it('?as= needs a request signed by that key', async () => {
    const fay = makeUser('fay#x');
    const gus = makeUser('gus#x');
    const path = `/users/${encodeURIComponent(fay.pubkey)}/profile`;
    const query = `?as=${encodeURIComponent(fay.pubkey)}`;

    const unsigned = await fetch(`${baseUrl}${path}${query}`);
    assert.equal(unsigned.status, 401);

    const wrongKey = await fetch(`${baseUrl}${path}${query}`, { headers: signRequest('GET', path, '', gus.privateKey) });
    assert.equal(wrongKey.status, 403);
  });

  // ================================================================
  // Envelopes and groups
  // ================================================================

  it('POST /envelopes runs the pipeline and groups are readable', async () => {
    const hal = makeUser('hal#x');
    const api = new HttpEsmpAPI(baseUrl, hal.privateKey);

    const created = await api.submitEnvelope(hal.sign(groupCreated('http-g1', 'hal#x', { name: 'Club' }, at(0))));
    assert.equal(created.status, 201);
    assert.deepEqual(created.data, { ok: true, threads: [{ threadKey: 'http-g1', seq: 1 }] });

    const group = await api.getGroup('http-g1');
    assert.equal(group.status, 200);
    assert.equal(group.data?.group_name, 'Club');
    assert.deepEqual(group.data?.members, ['hal#x']);

    const duplicate = await api.submitEnvelope(hal.sign(groupCreated('http-g1', 'hal#x', {}, at(1))));
    assert.equal(duplicate.status, 409);
    assert.equal(duplicate.error, 'DuplicateGroup: Group http-g1 already exists');

    assert.equal((await api.getGroup('http-missing')).status, 404);
  });

  it('group messages are readable by members only', async () => {
    const ida = makeUser('ida#x');
    const jon = makeUser('jon#x');
    const idaApi = new HttpEsmpAPI(baseUrl, ida.privateKey);
    const envelope = ida.sign(groupCreated('http-g2', 'ida#x', {}, at(0)));
    assert.equal((await idaApi.submitEnvelope(envelope)).status, 201);

    const messages = await idaApi.getGroupMessages('http-g2');
    assert.equal(messages.status, 200);
    assert.equal(messages.data?.length, 1);
    assert.equal(messages.data?.[0]?.seq, 1);
    assert.deepEqual(messages.data?.[0]?.envelope, envelope);

    const outsider = await new HttpEsmpAPI(baseUrl, jon.privateKey).getGroupMessages('http-g2');
    assert.equal(outsider.status, 403);

    const unsigned = await fetch(`${baseUrl}/groups/http-g2/messages`);
    assert.equal(unsigned.status, 401);

    const path = '/groups/http-g2/messages';
    const badLimit = await fetch(`${baseUrl}${path}?limit=many`, { headers: signRequest('GET', path, '', ida.privateKey) });
    assert.equal(badLimit.status, 400);
  });

  it('invalid JSON is 400 and unknown routes are 404', async () => {
    const badJson = await fetch(`${baseUrl}/envelopes`, { method: 'POST', body: '{"type":' });
    assert.equal(badJson.status, 400);
    assert.deepEqual(await badJson.json(), { error: 'MalformedInput', message: 'Invalid JSON' });

    const missing = await fetch(`${baseUrl}/nowhere`);
    assert.equal(missing.status, 404);
  });
});
