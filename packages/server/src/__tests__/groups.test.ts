/**
 * Tests for the group state machine, its persistence, and replay from the log.
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { rmSync } from 'node:fs';
import {
  adminAssigned,
  adminRevoked,
  descriptionUpdated,
  dpUpdated,
  groupCreated,
  groupRenamed,
  joined,
  left,
  removed,
  textMessage,
} from 'esmp-sdk';
import type { GroupMetadata, GroupSystemEnvelope, UnsignedEnvelope } from 'esmp-sdk';
import { getGroup, groupLog, replayGroup, saveGroup, transition } from '../groups.js';
import { append } from '../thread-log.js';
import { at, makeUser, setupDb, typed } from './helpers.js';

const alice = makeUser('alice#x');

function sys(unsigned: UnsignedEnvelope): GroupSystemEnvelope {
  const envelope = typed(alice, unsigned);
  if (envelope.type !== 'system' || envelope.subtype === 'profile_updated') {
    throw new Error('not a group system message');
  }
  return envelope;
}

/** Apply messages in order, failing the test on any rejection. */
function applyAll(messages: UnsignedEnvelope[]): GroupMetadata {
  let group: GroupMetadata | null = null;
  for (const message of messages) {
    const result = transition(group, sys(message));
    if (!result.ok) assert.fail(`${result.error}: ${result.message}`);
    group = result.group;
  }
  assert.ok(group);
  return group;
}

function rejectionOf(current: GroupMetadata | null, message: UnsignedEnvelope): string {
  const result = transition(current, sys(message));
  assert.equal(result.ok, false);
  return result.ok ? '' : result.error;
}

describe('transition', () => {
  it('group_created makes the actor sole member and admin', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', { name: 'Club', description: 'Books' }, at(0))]);
    assert.deepEqual(group, {
      group_id: 'g1',
      group_name: 'Club',
      group_description: 'Books',
      group_dp_url: null,
      admins: ['alice#x'],
      members: ['alice#x'],
      created_at: at(0),
      updated_at: at(0),
    });
  });

  it('rejects creating a group that exists', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(0))]);
    assert.equal(rejectionOf(group, groupCreated('g1', 'bob#x', {}, at(5))), 'DuplicateGroup');
  });

  it('rejects changes to a group that does not exist', () => {
    assert.equal(rejectionOf(null, joined('g1', 'bob#x', at(1))), 'UnknownGroup');
  });

  it('joined and left change membership of the actor', () => {
    const group = applyAll([
      groupCreated('g1', 'alice#x', {}, at(0)),
      joined('g1', 'bob#x', at(1)),
      joined('g1', 'carol#x', at(2)),
      left('g1', 'bob#x', at(3)),
    ]);
    assert.deepEqual(group.members, ['alice#x', 'carol#x']);
    assert.equal(group.updated_at, at(3));
  });

  it('rejects joining twice and leaving without membership', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(0)), joined('g1', 'bob#x', at(1))]);
    assert.equal(rejectionOf(group, joined('g1', 'bob#x', at(2))), 'InvalidTransition');
    assert.equal(rejectionOf(group, left('g1', 'carol#x', at(2))), 'InvalidTransition');
  });

  it('only admins may remove, and the group is unchanged after a refusal', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(0)), joined('g1', 'bob#x', at(1))]);
    const before = structuredClone(group);

    assert.equal(rejectionOf(group, removed('g1', 'bob#x', 'alice#x', at(2))), 'Forbidden');
    assert.deepEqual(group, before);
  });

  it('only admins may change metadata or admins', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(0)), joined('g1', 'bob#x', at(1))]);
    assert.equal(rejectionOf(group, groupRenamed('g1', 'bob#x', 'Mine', at(2))), 'Forbidden');
    assert.equal(rejectionOf(group, adminAssigned('g1', 'bob#x', 'bob#x', at(2))), 'Forbidden');
  });

  it('rejects mutations that are not strictly newer', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(10))]);
    assert.equal(rejectionOf(group, joined('g1', 'bob#x', at(10))), 'StaleMutation');
    assert.equal(rejectionOf(group, joined('g1', 'bob#x', at(9))), 'StaleMutation');
  });

  it('checks staleness before authorization', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(10)), joined('g1', 'bob#x', at(11))]);
    assert.equal(rejectionOf(group, removed('g1', 'bob#x', 'alice#x', at(5))), 'StaleMutation');
  });

  it('removing a member also drops their admin role', () => {
    const group = applyAll([
      groupCreated('g1', 'alice#x', {}, at(0)),
      joined('g1', 'bob#x', at(1)),
      adminAssigned('g1', 'alice#x', 'bob#x', at(2)),
      removed('g1', 'alice#x', 'bob#x', at(3)),
    ]);
    assert.deepEqual(group.members, ['alice#x']);
    assert.deepEqual(group.admins, ['alice#x']);
  });

  it('admin_assigned needs a member; admin_revoked needs an admin', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(0)), joined('g1', 'bob#x', at(1))]);
    assert.equal(rejectionOf(group, adminAssigned('g1', 'alice#x', 'carol#x', at(2))), 'InvalidTransition');
    assert.equal(rejectionOf(group, adminRevoked('g1', 'alice#x', 'bob#x', at(2))), 'InvalidTransition');

    const promoted = applyAll([
      groupCreated('g1', 'alice#x', {}, at(0)),
      joined('g1', 'bob#x', at(1)),
      adminAssigned('g1', 'alice#x', 'bob#x', at(2)),
    ]);
    assert.deepEqual(promoted.admins, ['alice#x', 'bob#x']);
  });

  it('admins stay ordered like members', () => {
    const group = applyAll([
      groupCreated('g1', 'alice#x', {}, at(0)),
      joined('g1', 'bob#x', at(1)),
      joined('g1', 'carol#x', at(2)),
      adminAssigned('g1', 'alice#x', 'carol#x', at(3)),
      adminAssigned('g1', 'alice#x', 'bob#x', at(4)),
    ]);
    assert.deepEqual(group.admins, ['alice#x', 'bob#x', 'carol#x']);
  });

  it('updates name, description and picture', () => {
    const group = applyAll([
      groupCreated('g1', 'alice#x', { name: 'Old' }, at(0)),
      groupRenamed('g1', 'alice#x', 'New', at(1)),
      descriptionUpdated('g1', 'alice#x', 'About', at(2)),
      dpUpdated('g1', 'alice#x', 'https://example.org/g.png', at(3)),
    ]);
    assert.equal(group.group_name, 'New');
    assert.equal(group.group_description, 'About');
    assert.equal(group.group_dp_url, 'https://example.org/g.png');
  });

  it('an emptied group stays in place with no members', () => {
    const group = applyAll([groupCreated('g1', 'alice#x', {}, at(0)), left('g1', 'alice#x', at(1))]);
    assert.deepEqual(group.members, []);
    assert.deepEqual(group.admins, []);
  });
});

describe('group store', () => {
  let cleanupDirs: string[] = [];

  afterEach(() => {
    for (const dir of cleanupDirs) rmSync(dir, { recursive: true, force: true });
    cleanupDirs = [];
  });

  function withDb() {
    const { db, dir } = setupDb('esmp-groups-test-');
    cleanupDirs.push(dir);
    return db;
  }

  it('saves and loads metadata with member order', () => {
    const db = withDb();
    const group = applyAll([
      groupCreated('g1', 'alice#x', { dpUrl: 'https://example.org/g.png' }, at(0)),
      joined('g1', 'carol#x', at(1)),
      joined('g1', 'bob#x', at(2)),
      adminAssigned('g1', 'alice#x', 'bob#x', at(3)),
    ]);
    saveGroup(db, group);

    assert.deepEqual(getGroup(db, 'g1'), group);
    assert.equal(getGroup(db, 'g2'), null);
    db.close();
  });

  it('replaying the group thread reproduces the stored metadata', () => {
    const db = withDb();
    const messages = [
      groupCreated('g1', 'alice#x', { name: 'Club' }, at(0)),
      joined('g1', 'bob#x', at(1)),
      textMessage({ groupId: 'g1', from: 'bob#x', body: 'hello' }),
      adminAssigned('g1', 'alice#x', 'bob#x', at(2)),
      left('g1', 'alice#x', at(3)),
    ];
    for (const message of messages) append(db, 'g1', alice.sign(message));

    const expected = applyAll(messages.filter((m) => m.type === 'system'));
    saveGroup(db, expected);

    assert.deepEqual(replayGroup(groupLog(db, 'g1')), getGroup(db, 'g1'));
    db.close();
  });

  it('replay refuses a log that does not apply', () => {
    const records = [
      alice.sign(groupCreated('g1', 'alice#x', {}, at(0))),
      alice.sign(groupCreated('g1', 'alice#x', {}, at(1))),
    ];
    assert.throws(() => replayGroup(records), /DuplicateGroup/);
  });
});
