import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { envInt, getConnectionInfo, getServerUrl, gridFromEnv } from '../world/config.js';
import { clampDifficulty } from '../services/bots.js';
import { clampLimit } from '../services/history.js';

describe('envInt', () => {
  it('reads positive integers', () => {
    assert.equal(envInt('42', 7), 42);
  });

  it('falls back on missing or invalid values', () => {
    assert.equal(envInt(undefined, 7), 7);
    assert.equal(envInt('', 7), 7);
    assert.equal(envInt('0', 7), 7);
    assert.equal(envInt('-3', 7), 7);
    assert.equal(envInt('1.5', 7), 7);
    assert.equal(envInt('fast', 7), 7);
  });

  it('enforces a minimum', () => {
    assert.equal(envInt('11', 30, 12), 30);
    assert.equal(envInt('12', 30, 12), 12);
  });
});

describe('gridFromEnv', () => {
  it('reads the board size', () => {
    assert.deepEqual(gridFromEnv({ COPPERHEAD_GRID_WIDTH: '40', COPPERHEAD_GRID_HEIGHT: '15' }), { WIDTH: 40, HEIGHT: 15 });
    assert.deepEqual(gridFromEnv({}), { WIDTH: 30, HEIGHT: 20 });
  });

  it('falls back when the board is too narrow for both spawns', () => {
    assert.deepEqual(gridFromEnv({ COPPERHEAD_GRID_WIDTH: '5' }), { WIDTH: 30, HEIGHT: 20 });
    assert.deepEqual(gridFromEnv({ COPPERHEAD_GRID_WIDTH: '11' }), { WIDTH: 30, HEIGHT: 20 });
    assert.deepEqual(gridFromEnv({ COPPERHEAD_GRID_WIDTH: '12', COPPERHEAD_GRID_HEIGHT: '1' }), { WIDTH: 12, HEIGHT: 1 });
  });
});

describe('getConnectionInfo', () => {
  it('uses localhost outside Codespaces', () => {
    assert.deepEqual(getConnectionInfo({}, 8000), { wsUrl: 'ws://localhost:8000/ws/', isCodespace: false });
  });

  it('builds the forwarded URL inside Codespaces', () => {
    assert.deepEqual(getConnectionInfo({ CODESPACE_NAME: 'test-space' }, 8000), {
      wsUrl: 'wss://test-space-8000.app.github.dev/ws/',
      isCodespace: true,
    });
    assert.equal(
      getServerUrl({ CODESPACE_NAME: 'test-space', GITHUB_CODESPACES_PORT_FORWARDING_DOMAIN: 'example.test' }, 9000),
      'wss://test-space-9000.example.test/ws/'
    );
  });
});

describe('clampDifficulty', () => {
  it('rounds into the 1-10 range', () => {
    assert.equal(clampDifficulty(0), 1);
    assert.equal(clampDifficulty(6.5), 7);
    assert.equal(clampDifficulty(99), 10);
  });

  it('defaults anything that is not a number', () => {
    assert.equal(clampDifficulty(undefined), 5);
    assert.equal(clampDifficulty('8'), 5);
    assert.equal(clampDifficulty(NaN), 5);
  });
});

describe('clampLimit', () => {
  it('caps and defaults the list size', () => {
    assert.equal(clampLimit(undefined), 20);
    assert.equal(clampLimit('5'), 5);
    assert.equal(clampLimit('500'), 100);
    assert.equal(clampLimit('0'), 20);
    assert.equal(clampLimit('abc'), 20);
  });
});
