/**
 * Unit tests for sync planning
 */

import { expect } from 'chai';

import { planSync, summarizePlan, describeEntry } from '../../../src/sync/reconcile.js';
import type { FileRecord, LocalFile } from '../../../src/core/types.js';
import { fileRecord, localFile } from '../../helpers/fixtures.js';

function localMap(...files: LocalFile[]): Map<string, LocalFile> {
  return new Map(files.map((f) => [f.relativePath, f]));
}

function trackedMap(entries: Record<string, FileRecord>): Map<string, FileRecord> {
  return new Map(Object.entries(entries));
}

describe('planSync', () => {
  it('plans upload, skip and delete for new, unchanged and removed files', () => {
    const plan = planSync({
      local: localMap(localFile('a.pdf'), localFile('b.docx')),
      tracked: trackedMap({
        'b.docx': fileRecord('id-b'),
        'c.txt': fileRecord('id-c'),
      }),
      remoteIds: new Set(['id-b', 'id-c']),
    });

    expect(plan.entries.map((e) => [e.kind, e.path])).to.deep.equal([
      ['upload', 'a.pdf'],
      ['skip', 'b.docx'],
      ['delete', 'c.txt'],
    ]);
    const deleteEntry = plan.entries[2];
    expect(deleteEntry.kind === 'delete' && deleteEntry.previous.remote_id).to.equal('id-c');
    expect(plan.cleanups).to.deep.equal([]);
  });

  it('skips a touched file whose hash matches and marks it for refresh', () => {
    const plan = planSync({
      local: localMap(localFile('b.docx', { mtime: 1_800_000_000_000, contentHash: 'aaaa' })),
      tracked: trackedMap({ 'b.docx': fileRecord('id-b') }),
      remoteIds: new Set(['id-b']),
    });

    expect(plan.entries).to.have.length(1);
    const entry = plan.entries[0];
    expect(entry.kind).to.equal('skip');
    expect(entry.kind === 'skip' && entry.refresh).to.be.true;
  });

  it('replaces a file whose hash differs, carrying the old remote id', () => {
    const plan = planSync({
      local: localMap(localFile('b.docx', { size: 120, contentHash: 'bbbb' })),
      tracked: trackedMap({ 'b.docx': fileRecord('id-b') }),
      remoteIds: new Set(['id-b']),
    });

    const entry = plan.entries[0];
    expect(entry.kind).to.equal('replace');
    expect(entry.kind === 'replace' && entry.previous.remote_id).to.equal('id-b');
  });

  it('replaces when the fingerprint moved but no hash was supplied', () => {
    const plan = planSync({
      local: localMap(localFile('b.docx', { size: 120 })),
      tracked: trackedMap({ 'b.docx': fileRecord('id-b') }),
      remoteIds: new Set(['id-b']),
    });

    expect(plan.entries[0].kind).to.equal('replace');
  });

  it('replaces when the stored record never had a hash', () => {
    const plan = planSync({
      local: localMap(localFile('b.docx', { mtime: 5, contentHash: 'aaaa' })),
      tracked: trackedMap({ 'b.docx': fileRecord('id-b', { content_hash: null }) }),
      remoteIds: new Set(['id-b']),
    });

    expect(plan.entries[0].kind).to.equal('replace');
  });

  it('forces an upload when the tracked remote id is missing from the listing', () => {
    const plan = planSync({
      local: localMap(localFile('b.docx')),
      tracked: trackedMap({ 'b.docx': fileRecord('id-gone') }),
      remoteIds: new Set(['id-other']),
    });

    const entry = plan.entries[0];
    expect(entry.kind).to.equal('upload');
    expect(entry.kind === 'upload' && entry.reason).to.equal('missing-remote');
  });

  it('prefers the forced upload over a replace when both apply', () => {
    const plan = planSync({
      local: localMap(localFile('b.docx', { size: 999, contentHash: 'cccc' })),
      tracked: trackedMap({ 'b.docx': fileRecord('id-gone') }),
      remoteIds: new Set<string>(),
    });

    expect(plan.entries.map((e) => e.kind)).to.deep.equal(['upload']);
  });

  it('still deletes a locally removed file whose remote object is already gone', () => {
    const plan = planSync({
      local: new Map(),
      tracked: trackedMap({ 'c.txt': fileRecord('id-c') }),
      remoteIds: new Set<string>(),
    });

    expect(plan.entries.map((e) => e.kind)).to.deep.equal(['delete']);
  });

  it('leaves unreadable paths out of the plan entirely', () => {
    const plan = planSync({
      local: localMap(localFile('a.pdf')),
      tracked: trackedMap({ 'locked.pdf': fileRecord('id-l') }),
      remoteIds: new Set(['id-l']),
      unreadable: new Set(['locked.pdf']),
    });

    expect(plan.entries.map((e) => e.path)).to.deep.equal(['a.pdf']);
  });

  it('produces exactly one entry per known path, sorted', () => {
    const plan = planSync({
      local: localMap(localFile('z.txt'), localFile('sub/m.pdf'), localFile('a.pdf')),
      tracked: trackedMap({ 'a.pdf': fileRecord('id-a'), 'gone.txt': fileRecord('id-g') }),
      remoteIds: new Set(['id-a', 'id-g']),
    });

    expect(plan.entries.map((e) => e.path)).to.deep.equal(['a.pdf', 'gone.txt', 'sub/m.pdf', 'z.txt']);
  });

  it('returns identical plans for identical inputs', () => {
    const input = {
      local: localMap(localFile('a.pdf'), localFile('b.docx', { size: 1, contentHash: 'x' })),
      tracked: trackedMap({ 'b.docx': fileRecord('id-b'), 'c.txt': fileRecord('id-c') }),
      remoteIds: new Set(['id-b', 'id-c']),
    };

    expect(planSync(input)).to.deep.equal(planSync(input));
  });

  it('splits pending deletes into cleanups and already-resolved ids', () => {
    const plan = planSync({
      local: new Map(),
      tracked: new Map(),
      remoteIds: new Set(['old-1']),
      pendingDeletes: new Map([['old-1', 'a.pdf'], ['old-2', 'b.pdf']]),
    });

    expect(plan.cleanups).to.deep.equal([{ remoteId: 'old-1', path: 'a.pdf' }]);
    expect(plan.resolvedPendingDeletes).to.deep.equal(['old-2']);
  });
});

describe('summarizePlan', () => {
  it('counts entries per kind', () => {
    const plan = planSync({
      local: localMap(localFile('a.pdf'), localFile('n.txt'), localFile('b.docx')),
      tracked: trackedMap({ 'b.docx': fileRecord('id-b'), 'c.txt': fileRecord('id-c') }),
      remoteIds: new Set(['id-b', 'id-c', 'old']),
      pendingDeletes: new Map([['old', 'x.pdf']]),
    });

    expect(summarizePlan(plan)).to.deep.equal({ upload: 2, replace: 0, delete: 1, skip: 1, cleanup: 1 });
  });
});

describe('describeEntry', () => {
  it('names the missing remote object for forced uploads', () => {
    const plan = planSync({
      local: localMap(localFile('b.docx')),
      tracked: trackedMap({ 'b.docx': fileRecord('id-gone') }),
      remoteIds: new Set<string>(),
    });

    expect(describeEntry(plan.entries[0])).to.equal('upload   b.docx (remote object id-gone missing)');
  });
});
