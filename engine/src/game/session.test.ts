import test from 'node:test';
import assert from 'node:assert/strict';

import { ManualScheduler } from './scheduler.js';
import { MemoryMatchSession } from './session.js';
import type { GameLogger } from './logger.js';

const inCreationOrder = () => 0.999_999;

const setup = () => {
  const scheduler = new ManualScheduler();
  const session = new MemoryMatchSession({ scheduler, random: inCreationOrder });
  let notifications = 0;
  session.subscribe(() => {
    notifications += 1;
  });

  const flip = (id: number) => session.flip({ id, round: session.state.round });
  const card = (id: number) => {
    const found = session.getSnapshot().cards.find((candidate) => candidate.id === id);
    assert.ok(found, `card ${id} missing`);
    return found;
  };

  return { scheduler, session, flip, card, notifications: () => notifications };
};

test('session starts idle with the clock stopped', () => {
  const { scheduler, session } = setup();

  scheduler.advanceBy(5_000);

  const snapshot = session.getSnapshot();
  assert.equal(snapshot.phase, 'idle');
  assert.equal(snapshot.elapsedSeconds, 0);
  assert.equal(session.clockActive, false);
  assert.equal(scheduler.pendingCount, 0);
});

test('the first accepted flip starts the clock and every tick notifies', () => {
  const { scheduler, session, flip, notifications } = setup();

  flip(0);
  assert.equal(session.clockActive, true);
  assert.equal(notifications(), 1);

  scheduler.advanceBy(3_000);
  assert.equal(session.getSnapshot().elapsedSeconds, 3);
  assert.equal(notifications(), 4);
});

test('flip on a face-up or matched card neither changes state nor notifies', () => {
  const { session, flip, notifications } = setup();

  flip(0);
  flip(1);
  flip(2);
  const before = session.getSnapshot();
  const count = notifications();

  assert.deepEqual(flip(0), { kind: 'ignored', reason: 'matched' });
  assert.deepEqual(flip(2), { kind: 'ignored', reason: 'face-up' });
  assert.equal(session.getSnapshot(), before);
  assert.equal(notifications(), count);
});

test('a matching pair is marked matched with +10 and no pending resolution', () => {
  const { session, flip, card, notifications } = setup();

  flip(6);
  const outcome = flip(7);

  assert.deepEqual(outcome, { kind: 'matched', cardIds: [6, 7], cleared: false });
  assert.equal(card(6).matched, true);
  assert.equal(card(7).matched, true);
  assert.equal(session.getSnapshot().score, 10);
  assert.equal(session.getSnapshot().awaitingResolution, false);
  assert.equal(notifications(), 3);
});

test('a mismatch stays face-up for the peek delay and blocks further flips', () => {
  const { scheduler, session, flip, card } = setup();

  flip(0);
  flip(1);
  flip(2);
  assert.deepEqual(flip(4), { kind: 'mismatched', cardIds: [2, 4] });

  assert.equal(session.getSnapshot().score, 5);
  assert.equal(card(2).faceUp, true);
  assert.equal(card(4).faceUp, true);
  assert.equal(session.concealPending, true);

  scheduler.advanceBy(999);
  assert.deepEqual(flip(6), { kind: 'ignored', reason: 'awaiting-resolution' });
  assert.equal(card(6).faceUp, false);
  assert.equal(card(2).faceUp, true);

  scheduler.advanceBy(1);
  assert.equal(card(2).faceUp, false);
  assert.equal(card(4).faceUp, false);
  assert.equal(session.getSnapshot().awaitingResolution, false);
  assert.equal(session.getSnapshot().pendingCardId, null);
  assert.equal(session.getSnapshot().score, 5);
  assert.equal(session.concealPending, false);

  assert.deepEqual(flip(6), { kind: 'first-selected', cardId: 6 });
});

test('repeated mismatches from zero keep the score at zero', () => {
  const { scheduler, session, flip } = setup();

  for (let attempt = 0; attempt < 3; attempt += 1) {
    flip(0);
    flip(2);
    assert.equal(session.getSnapshot().score, 0);
    scheduler.advanceBy(1_000);
  }

  assert.equal(session.getSnapshot().score, 0);
});

test('finishing the last pair stops the clock at that moment', () => {
  const { scheduler, session, flip } = setup();

  for (let id = 0; id < 14; id += 2) {
    flip(id);
    flip(id + 1);
    scheduler.advanceBy(1_000);
    assert.equal(session.getSnapshot().finished, false);
  }

  flip(14);
  scheduler.advanceBy(500);
  assert.deepEqual(flip(15), { kind: 'matched', cardIds: [14, 15], cleared: true });

  const snapshot = session.getSnapshot();
  assert.equal(snapshot.finished, true);
  assert.equal(snapshot.phase, 'finished');
  assert.equal(snapshot.score, 80);
  assert.equal(snapshot.elapsedSeconds, 7);
  assert.equal(session.clockActive, false);

  scheduler.advanceBy(10_000);
  assert.equal(session.getSnapshot().elapsedSeconds, 7);
  assert.equal(scheduler.pendingCount, 0);
});

test('reset mid-delay yields a fresh round and the old reconciliation never fires', () => {
  const { scheduler, session, flip, notifications } = setup();

  flip(0);
  flip(1);
  flip(2);
  flip(4);
  scheduler.advanceBy(400);

  session.reset();
  const afterReset = notifications();
  const snapshot = session.getSnapshot();

  assert.equal(snapshot.round, 1);
  assert.equal(snapshot.score, 0);
  assert.equal(snapshot.elapsedSeconds, 0);
  assert.equal(snapshot.finished, false);
  assert.equal(snapshot.awaitingResolution, false);
  assert.equal(snapshot.pendingCardId, null);
  assert.ok(snapshot.cards.every((card) => !card.faceUp && !card.matched && card.round === 1));
  assert.equal(session.clockActive, false);
  assert.equal(session.concealPending, false);
  assert.equal(scheduler.pendingCount, 0);

  flip(2);
  scheduler.advanceBy(2_000);

  const later = session.getSnapshot();
  assert.equal(later.cards.find((card) => card.id === 2)?.faceUp, true);
  assert.equal(later.pendingCardId, 2);
  assert.equal(later.elapsedSeconds, 2);
  assert.equal(notifications(), afterReset + 3);
});

test('observers reading the snapshot on every notification see the win recorded', () => {
  const scheduler = new ManualScheduler();
  const session = new MemoryMatchSession({ scheduler, random: inCreationOrder });
  const observed: Array<{ finished: boolean; matched: number }> = [];
  session.subscribe(() => {
    const snapshot = session.getSnapshot();
    observed.push({ finished: snapshot.finished, matched: snapshot.cards.filter((card) => card.matched).length });
  });

  for (let id = 0; id < 16; id += 2) {
    session.flip({ id, round: 0 });
    assert.deepEqual(session.flip({ id: id + 1, round: 0 }), {
      kind: 'matched',
      cardIds: [id, id + 1],
      cleared: id === 14
    });
    scheduler.advanceBy(1_000);
  }

  assert.deepEqual(observed.slice(-2), [
    { finished: false, matched: 16 },
    { finished: true, matched: 16 }
  ]);
  assert.equal(session.getSnapshot().finished, true);
  assert.equal(session.getSnapshot().elapsedSeconds, 7);
  assert.equal(session.clockActive, false);

  const count = observed.length;
  scheduler.advanceBy(5_000);
  assert.equal(observed.length, count);
  assert.equal(session.getSnapshot().elapsedSeconds, 7);
});

test('flips carrying a card from a superseded round are ignored', () => {
  const { session, notifications } = setup();
  const staleCard = session.getSnapshot().cards[0];
  assert.ok(staleCard);

  session.reset();
  const count = notifications();

  assert.deepEqual(session.flip(staleCard), { kind: 'ignored', reason: 'stale-card' });
  assert.equal(notifications(), count);
  assert.ok(session.getSnapshot().cards.every((card) => !card.faceUp));
});

test('getSnapshot is stable between mutations', () => {
  const { session, flip } = setup();

  const first = session.getSnapshot();
  assert.equal(session.getSnapshot(), first);

  flip(0);
  assert.notEqual(session.getSnapshot(), first);
});

test('unsubscribe and dispose stop notifications and cancel timers', () => {
  const scheduler = new ManualScheduler();
  const session = new MemoryMatchSession({ scheduler, random: inCreationOrder });
  let calls = 0;
  const unsubscribe = session.subscribe(() => {
    calls += 1;
  });

  session.flip({ id: 0, round: 0 });
  unsubscribe();
  session.flip({ id: 2, round: 0 });
  assert.equal(calls, 1);

  session.dispose();
  assert.equal(scheduler.pendingCount, 0);
  scheduler.advanceBy(5_000);
  assert.equal(session.getSnapshot().elapsedSeconds, 0);
  assert.equal(session.getSnapshot().cards.find((card) => card.id === 2)?.faceUp, true);
});

test('session logs ignored flips, outcomes and resets through the injected logger', () => {
  const lines: string[] = [];
  const logger: GameLogger = {
    debug: (message: string) => lines.push(`debug ${message}`),
    info: (message: string) => lines.push(`info ${message}`)
  };
  const scheduler = new ManualScheduler();
  const session = new MemoryMatchSession({ scheduler, random: inCreationOrder, logger });

  session.flip({ id: 4, round: 0 });
  session.flip({ id: 4, round: 0 });
  session.flip({ id: 5, round: 0 });
  session.flip({ id: 8, round: 0 });
  session.flip({ id: 12, round: 0 });
  scheduler.advanceBy(1_000);
  session.reset();

  assert.deepEqual(lines, [
    'debug first card selected: id 4, content 3',
    'debug flip ignored for card 4 (round 0): face-up',
    'debug second card selected: id 5, content 3',
    'debug cards match, awarding 10 points (score 10)',
    'debug checking win condition: allMatched=false',
    'debug first card selected: id 8, content 5',
    'debug second card selected: id 12, content 7',
    'debug cards do not match, deducting 5 points (score 5)',
    'debug flipping mismatched cards back',
    'info round 1 started'
  ]);
});
