import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { diffSnapshots, hasChanged, recordSignature } from '../../src/services/snapshot-differ.js';
import type { FileRecord, Snapshot } from '../../src/types/watch.js';
import { ROOT, makeRecord } from '../harness/fixtures.js';

function snapshot(...records: FileRecord[]): Snapshot {
  return new Map(records.map((record) => [record.path, record]));
}

const NOW = 1_700_000_060_000;

describe('diffSnapshots', () => {
  it('returns nothing when no path changed', () => {
    const records = [makeRecord('a.txt'), makeRecord(path.join('sub', 'b.txt'), { size: 42 })];
    expect(diffSnapshots(ROOT, snapshot(...records), snapshot(...records), NOW)).toEqual([]);
  });

  it('does not report a modify when size, mtime and mode are identical', () => {
    const before = makeRecord('a.txt');
    const after = { ...makeRecord('a.txt'), mtimeMs: before.mtimeMs + 0.4 };
    expect(hasChanged(before, after)).toBe(false);
    expect(diffSnapshots(ROOT, snapshot(before), snapshot(after), NOW)).toEqual([]);
  });

  it('reports a modify for a size, mtime or mode change', () => {
    const before = snapshot(makeRecord('size.txt'), makeRecord('mtime.txt'), makeRecord('mode.txt'));
    const after = snapshot(
      makeRecord('size.txt', { size: 11 }),
      makeRecord('mtime.txt', { mtimeMs: 1_700_000_001_000 }),
      makeRecord('mode.txt', { mode: 0o100755 }),
    );

    const events = diffSnapshots(ROOT, before, after, NOW);
    expect(events.map((event) => [event.kind, event.relativePath])).toEqual([
      ['modify', 'mode.txt'],
      ['modify', 'mtime.txt'],
      ['modify', 'size.txt'],
    ]);
  });

  it('turns an unchanged rename into exactly one move', () => {
    const previous = makeRecord('a.txt');
    const current = { ...previous, path: path.join(ROOT, 'b.txt') };

    const events = diffSnapshots(ROOT, snapshot(previous), snapshot(current), NOW);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      kind: 'move',
      path: path.join(ROOT, 'b.txt'),
      relativePath: 'b.txt',
      previousPath: path.join(ROOT, 'a.txt'),
    });
  });

  it('reports create and delete when signatures differ', () => {
    const events = diffSnapshots(
      ROOT,
      snapshot(makeRecord('old.txt', { size: 1 })),
      snapshot(makeRecord('new.txt', { size: 2 })),
      NOW,
    );
    expect(events.map((event) => [event.kind, event.relativePath])).toEqual([
      ['create', 'new.txt'],
      ['delete', 'old.txt'],
    ]);
  });

  it('pairs identical signatures in lexicographic order and claims each deleted path once', () => {
    const previous = snapshot(makeRecord('z-old.txt'), makeRecord('a-old.txt'));
    const current = snapshot(
      { ...makeRecord('a-old.txt'), path: path.join(ROOT, 'n2.txt') },
      { ...makeRecord('a-old.txt'), path: path.join(ROOT, 'n1.txt') },
      { ...makeRecord('a-old.txt'), path: path.join(ROOT, 'n3.txt') },
    );

    const events = diffSnapshots(ROOT, previous, current, NOW);

    expect(events.map((event) => [event.kind, event.relativePath, event.previousPath])).toEqual([
      ['move', 'n1.txt', path.join(ROOT, 'a-old.txt')],
      ['move', 'n2.txt', path.join(ROOT, 'z-old.txt')],
      ['create', 'n3.txt', undefined],
    ]);
  });

  it('emits categories in the order modify, move, create, delete', () => {
    const previous = snapshot(
      makeRecord('changed.txt'),
      makeRecord('moved-from.txt', { size: 5 }),
      makeRecord('gone.txt', { size: 7 }),
    );
    const current = snapshot(
      makeRecord('changed.txt', { size: 99 }),
      makeRecord('moved-to.txt', { size: 5 }),
      makeRecord('brand-new.txt', { size: 8 }),
    );

    const kinds = diffSnapshots(ROOT, previous, current, NOW).map((event) => event.kind);
    expect(kinds).toEqual(['modify', 'move', 'create', 'delete']);
  });

  it('computes age from the record mtime, including for deletes', () => {
    const record = makeRecord('gone.txt', { mtimeMs: NOW - 5_000 });
    const [event] = diffSnapshots(ROOT, snapshot(record), snapshot(), NOW);
    expect(event.kind).toBe('delete');
    expect(event.ageMs).toBe(5_000);
    expect(event.record).toBe(record);
  });

  it('clamps age at zero for records modified after detection time', () => {
    const [event] = diffSnapshots(ROOT, snapshot(), snapshot(makeRecord('future.txt', { mtimeMs: NOW + 1_000 })), NOW);
    expect(event.ageMs).toBe(0);
  });
});

describe('recordSignature', () => {
  it('combines size, nanosecond mtime and octal mode', () => {
    const record = makeRecord('a.txt', { size: 3, mtimeMs: 2, mtimeNs: 2_000_001n, mode: 0o100644 });
    expect(recordSignature(record)).toBe('3-2000001-100644');
  });
});
