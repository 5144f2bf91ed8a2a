import { describe, it, expect } from 'vitest';
import {
  WORKER_COMMANDS,
  createWorkerCommand,
  parseWorkerCommand,
  parseWorkerEvent,
} from '../../src/shared/worker-protocol.js';

describe('parseWorkerCommand', () => {
  it('accepts the two known commands', () => {
    expect(parseWorkerCommand({ type: 'SKIP_WAITING' })).toEqual({ type: 'SKIP_WAITING' });
    expect(parseWorkerCommand({ type: 'CLEAR_CACHE' })).toEqual({ type: 'CLEAR_CACHE' });
  });

  it('round-trips what createWorkerCommand builds', () => {
    const command = createWorkerCommand(WORKER_COMMANDS.CLEAR_CACHE);
    expect(parseWorkerCommand(structuredClone(command))).toEqual(command);
  });

  it('drops extra fields', () => {
    expect(parseWorkerCommand({ type: 'SKIP_WAITING', force: true })).toEqual({ type: 'SKIP_WAITING' });
  });

  it('returns null for unknown or malformed messages', () => {
    expect(parseWorkerCommand({ type: 'RELOAD' })).toBeNull();
    expect(parseWorkerCommand({ type: 'skip_waiting' })).toBeNull();
    expect(parseWorkerCommand('SKIP_WAITING')).toBeNull();
    expect(parseWorkerCommand(null)).toBeNull();
    expect(parseWorkerCommand(undefined)).toBeNull();
  });
});

describe('parseWorkerEvent', () => {
  it('parses CACHES_CLEARED with its partition list', () => {
    expect(parseWorkerEvent({ type: 'CACHES_CLEARED', partitions: ['static-v1', 'dynamic-v1'] })).toEqual({
      type: 'CACHES_CLEARED',
      partitions: ['static-v1', 'dynamic-v1'],
    });
  });

  it('keeps only string partition names', () => {
    expect(parseWorkerEvent({ type: 'CACHES_CLEARED', partitions: ['static-v1', 7, null] })).toEqual({
      type: 'CACHES_CLEARED',
      partitions: ['static-v1'],
    });
  });

  it('parses SKIP_WAITING_DONE and SYNC_REQUESTED', () => {
    expect(parseWorkerEvent({ type: 'SKIP_WAITING_DONE' })).toEqual({ type: 'SKIP_WAITING_DONE' });
    expect(parseWorkerEvent({ type: 'SYNC_REQUESTED', tag: 'sync-tasks' })).toEqual({
      type: 'SYNC_REQUESTED',
      tag: 'sync-tasks',
    });
  });

  it('returns null for incomplete or unknown events', () => {
    expect(parseWorkerEvent({ type: 'CACHES_CLEARED' })).toBeNull();
    expect(parseWorkerEvent({ type: 'SYNC_REQUESTED' })).toBeNull();
    expect(parseWorkerEvent({ type: 'SKIP_WAITING' })).toBeNull();
    expect(parseWorkerEvent(42)).toBeNull();
  });
});
