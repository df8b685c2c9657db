import { describe, expect, it } from 'vitest';
import { MalformedLineError } from '@/lib/errors';
import { formatFrameRange, reconcileExport, type ReconciledRecord, type WorkOrder } from './index';

const workOrder: WorkOrder = {
  producer: 'Joan Jett',
  operator: 'John Doe',
  job: 'Dirtfixing',
  notes: '',
  canonicalPaths: [
    '/hpsans13/production/starwars/reel1/partA/1920x1080',
    '/hpsans12/production/starwars/reel1/VFX/Hydraulx'
  ]
};

function collect(content: string, grammar: 'single-path' | 'dual-path' = 'single-path') {
  const records: ReconciledRecord[] = [];
  const summary = reconcileExport(content, { workOrder, grammar, sink: (record) => records.push(record) });
  return { records, summary };
}

describe('reconcileExport', () => {
  it('emits one record for a contiguous run on a matching path', () => {
    const { records, summary } = collect('/images1/starwars/reel1/partA/1920x1080 32 33 34');
    expect(records).toEqual([
      {
        canonicalPath: '/hpsans13/production/starwars/reel1/partA/1920x1080',
        frameRange: { start: 32, end: 34 }
      }
    ]);
    expect(formatFrameRange(records[0].frameRange)).toBe('32-34');
    expect(summary).toEqual({ lines: 1, reconciled: 1, unreconciled: 0, malformed: [], records: 1 });
  });

  it('shares one canonical path across every range of a line', () => {
    const { records } = collect('/images1/starwars/reel1/VFX/Hydraulx 1251 1252 1253 1260 <err> 1270 1271 1272 ');
    expect(records.map((record) => record.canonicalPath)).toEqual([
      '/hpsans12/production/starwars/reel1/VFX/Hydraulx',
      '/hpsans12/production/starwars/reel1/VFX/Hydraulx',
      '/hpsans12/production/starwars/reel1/VFX/Hydraulx'
    ]);
    expect(records.map((record) => formatFrameRange(record.frameRange))).toEqual(['1251-1253', '1260', '1270-1272']);
  });

  it('skips blank lines and lines whose path matches nothing', () => {
    const unreconciled: string[] = [];
    const records: ReconciledRecord[] = [];
    const summary = reconcileExport('\n/images1/starwars/reel1/partB/1920x1080 1 2\n\n', {
      workOrder,
      grammar: 'single-path',
      sink: (record) => records.push(record),
      onUnreconciled: (path) => unreconciled.push(path)
    });
    expect(records).toEqual([]);
    expect(unreconciled).toEqual(['/images1/starwars/reel1/partB/1920x1080']);
    expect(summary).toEqual({ lines: 1, reconciled: 0, unreconciled: 1, malformed: [], records: 0 });
  });

  it('records malformed dual-path lines and carries on', () => {
    const content = [
      '/net/flame-archive starwars/reel1/partA/1920x1080 extra 10',
      '/net/flame-archive starwars/reel1/partA/1920x1080 10 11'
    ].join('\n');
    const { records, summary } = collect(content, 'dual-path');
    expect(records.map((record) => formatFrameRange(record.frameRange))).toEqual(['10-11']);
    expect(summary.malformed).toEqual([
      {
        lineNumber: 1,
        line: '/net/flame-archive starwars/reel1/partA/1920x1080 extra 10',
        message: 'Expected a storage and a location segment, found 3 path token(s)'
      }
    ]);
    expect(summary.reconciled).toBe(1);
  });

  it('rethrows malformed lines under the throw policy', () => {
    expect(() =>
      reconcileExport('/net/flame-archive a b 1', {
        workOrder,
        grammar: 'dual-path',
        sink: () => undefined,
        onMalformedLine: 'throw'
      })
    ).toThrow(MalformedLineError);
  });

  it('reconciles a matched line with no frames to no records', () => {
    const { records, summary } = collect('/images1/starwars/reel1/partA/1920x1080');
    expect(records).toEqual([]);
    expect(summary.reconciled).toBe(1);
  });

  it('accepts CRLF line endings', () => {
    const { records } = collect('/images1/starwars/reel1/partA/1920x1080 5 6\r\n');
    expect(records.map((record) => formatFrameRange(record.frameRange))).toEqual(['5-6']);
  });
});
