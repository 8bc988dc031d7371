/**
 * Tests for the TCP envelope listener, over real sockets on an ephemeral port.
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { rmSync } from 'node:fs';
import { EsmpConnection, groupCreated, joined, textMessage } from 'esmp-sdk';
import type { Rejection } from 'esmp-sdk';
import { EsmpListener } from '../listener.js';
import type { ServerConfig } from '../config.js';
import { at, makeUser, setupDb, testConfig } from './helpers.js';

const alice = makeUser('alice#x');
const bob = makeUser('bob#x');

describe('EsmpListener', () => {
  let cleanup: Array<() => Promise<void> | void> = [];

  afterEach(async () => {
    for (const fn of cleanup.reverse()) await fn();
    cleanup = [];
  });

  async function start(overrides: Partial<ServerConfig> = {}) {
    const { db, dir } = setupDb('esmp-listener-test-');
    const listener = new EsmpListener({ db, config: testConfig(overrides) });
    const port = await listener.listen(0);
    const conn = await EsmpConnection.connect(port);
    cleanup.push(() => rmSync(dir, { recursive: true, force: true }));
    cleanup.push(() => {
      if (db.open) db.close();
    });
    cleanup.push(() => listener.close());
    cleanup.push(() => conn.close());
    return { db, listener, conn };
  }

  it('accepts an envelope and replies with its thread position', async () => {
    const { conn } = await start();

    const reply = await conn.send(alice.sign(groupCreated('g1', 'alice#x', {}, at(0))));

    assert.deepEqual(reply, { ok: true, threads: [{ threadKey: 'g1', seq: 1 }] });
  });

  it('answers every line in order', async () => {
    const { conn } = await start();

    const replies = await Promise.all([
      conn.send(alice.sign(groupCreated('g1', 'alice#x', {}, at(0)))),
      conn.send(bob.sign(joined('g1', 'bob#x', at(1)))),
      conn.send(bob.sign(joined('g1', 'bob#x', at(2)))),
      conn.send(alice.sign(textMessage({ groupId: 'g1', from: 'alice#x', body: 'hi' }))),
    ]);

    assert.deepEqual(replies, [
      { ok: true, threads: [{ threadKey: 'g1', seq: 1 }] },
      { ok: true, threads: [{ threadKey: 'g1', seq: 2 }] },
      { ok: false, error: 'InvalidTransition', message: 'bob#x is already a member of g1', field: 'actor' },
      { ok: true, threads: [{ threadKey: 'g1', seq: 3 }] },
    ]);
  });

  it('keeps the connection open after a malformed line', async () => {
    const { conn } = await start();

    const bad = await conn.sendLine('this is not json');
    assert.equal(bad.ok, false);
    if (!bad.ok) assert.equal(bad.error, 'MalformedInput');

    const good = await conn.send(alice.sign(groupCreated('g1', 'alice#x', {}, at(0))));
    assert.equal(good.ok, true);
  });

  it('rejects over-long lines and resynchronizes at the next newline', async () => {
    const { conn } = await start({ maxLineBytes: 1024 });

    const tooLong = await conn.sendLine('x'.repeat(4000));
    assert.deepEqual(tooLong, { ok: false, error: 'MalformedInput', message: 'Line exceeds 1024 bytes' });

    const good = await conn.send(alice.sign(groupCreated('g1', 'alice#x', {}, at(0))));
    assert.deepEqual(good, { ok: true, threads: [{ threadKey: 'g1', seq: 1 }] });
  });

  it('accepts CRLF line endings and skips blank lines', async () => {
    const { conn } = await start();
    const line = JSON.stringify(alice.sign(groupCreated('g1', 'alice#x', {}, at(0))));

    const reply = await conn.sendLine(`\n\n${line}\r`);

    assert.deepEqual(reply, { ok: true, threads: [{ threadKey: 'g1', seq: 1 }] });
  });

  it('emits accepted and rejected events', async () => {
    const { conn, listener } = await start();
    const accepted: string[] = [];
    const rejected: Rejection[] = [];
    listener.on('accepted', () => accepted.push('accepted'));
    listener.on('rejected', (rejection: Rejection) => rejected.push(rejection));

    await conn.send(alice.sign(groupCreated('g1', 'alice#x', {}, at(0))));
    await conn.send(alice.sign(groupCreated('g1', 'alice#x', {}, at(1))));

    assert.deepEqual(accepted, ['accepted']);
    assert.equal(rejected.length, 1);
    assert.equal(rejected[0]?.error, 'DuplicateGroup');
  });

  it('reports storage failures as InternalError', async () => {
    const { db, listener } = await start();
    const line = Buffer.from(JSON.stringify(alice.sign(groupCreated('g1', 'alice#x', {}, at(0)))));

    db.close();
    const reply = listener.handleLine(line);

    assert.equal(reply.ok, false);
    if (!reply.ok) {
      assert.equal(reply.error, 'InternalError');
      assert.match(reply.message, /^Internal server error \(/);
    }
  });
});
