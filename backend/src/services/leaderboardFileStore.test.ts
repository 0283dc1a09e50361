import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonFileLeaderboardStore, parseLeaderboardDocument } from './leaderboardFileStore';
import { ScoreLedger } from './scoreLedger';

describe('JsonFileLeaderboardStore', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'raven-ledger-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads a missing file as an empty document', async () => {
    const store = new JsonFileLeaderboardStore(path.join(dir, 'missing.json'));
    await expect(store.load()).resolves.toEqual({});
  });

  it('loads an empty file as an empty document', async () => {
    const file = path.join(dir, 'empty.json');
    await fs.writeFile(file, '', 'utf8');
    await expect(new JsonFileLeaderboardStore(file).load()).resolves.toEqual({});
  });

  it('overwrites the whole file on save', async () => {
    const file = path.join(dir, 'nested', 'leaderboard.json');
    const store = new JsonFileLeaderboardStore(file);

    await store.save({ p1: { label: 'Alice', bestScore: 50 } });
    await store.save({ p2: { label: 'Bob', bestScore: 20 } });

    const raw = await fs.readFile(file, 'utf8');
    expect(JSON.parse(raw)).toEqual({ p2: { label: 'Bob', bestScore: 20 } });
    await expect(store.load()).resolves.toEqual({ p2: { label: 'Bob', bestScore: 20 } });
    expect(await fs.readdir(path.dirname(file))).toEqual(['leaderboard.json']);
  });

  it('rejects a corrupt file with a distinct code', async () => {
    const file = path.join(dir, 'corrupt.json');
    await fs.writeFile(file, '{ not json', 'utf8');
    await expect(new JsonFileLeaderboardStore(file).load()).rejects.toMatchObject({ code: 'LEADERBOARD_CORRUPT' });
  });

  it('keeps scores across ledger instances', async () => {
    const file = path.join(dir, 'leaderboard.json');
    await new ScoreLedger(new JsonFileLeaderboardStore(file)).record('p1', 'Alice', 70);

    const reopened = new ScoreLedger(new JsonFileLeaderboardStore(file));
    await expect(reopened.record('p1', 'Alice', 40)).resolves.toBe(false);
    expect(await reopened.list()).toEqual([{ rank: 1, playerId: 'p1', label: 'Alice', bestScore: 70 }]);
  });
});

describe('parseLeaderboardDocument', () => {
  it('normalizes labels and scores', () => {
    expect(parseLeaderboardDocument('{"p1":{"label":"  ","bestScore":12.7}}')).toEqual({
      p1: { label: 'Unknown', bestScore: 12 },
    });
  });

  it('rejects arrays and bad entries', () => {
    expect(() => parseLeaderboardDocument('[]')).toThrow('Leaderboard file must hold a JSON object');
    expect(() => parseLeaderboardDocument('{"p1":{"label":"A","bestScore":"many"}}')).toThrow(
      'Invalid leaderboard entry for player p1',
    );
  });
});
