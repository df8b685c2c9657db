import { describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { buildWorkbook, toCsvString } from './07-export';
import type { WorkOrder } from './types';

const workOrder: WorkOrder = {
  producer: 'Joan Jett',
  operator: 'John Doe',
  job: 'Dirtfixing',
  notes: 'Please clean files noted per Colorist Tom Brady',
  canonicalPaths: []
};

describe('toCsvString', () => {
  it('writes the header, two blank rows and one row per range', () => {
    const csv = toCsvString(workOrder, [
      { location: '/hpsans13/production/starwars/reel1/partA/1920x1080', frameRange: '32-34' },
      { location: '/hpsans12/production/starwars/reel1/VFX/Hydraulx', frameRange: '1260' }
    ]);
    expect(csv).toBe(
      [
        'Joan Jett,John Doe,Dirtfixing,Please clean files noted per Colorist Tom Brady',
        '',
        '',
        '/hpsans13/production/starwars/reel1/partA/1920x1080,32-34',
        '/hpsans12/production/starwars/reel1/VFX/Hydraulx,1260',
        ''
      ].join('\n')
    );
  });

  it('writes only the header block when nothing reconciled', () => {
    expect(toCsvString(workOrder, [])).toBe(
      'Joan Jett,John Doe,Dirtfixing,Please clean files noted per Colorist Tom Brady\n\n\n'
    );
  });

  it('quotes fields that contain the delimiter', () => {
    const csv = toCsvString({ ...workOrder, notes: 'reel 1, reel 2' }, []);
    expect(csv.split('\n')[0]).toBe('Joan Jett,John Doe,Dirtfixing,"reel 1, reel 2"');
  });

  it('honours a custom delimiter', () => {
    const csv = toCsvString(workOrder, [{ location: '/a/b/c', frameRange: '1-2' }], ';');
    expect(csv.split('\n')[3]).toBe('/a/b/c;1-2');
  });
});

describe('buildWorkbook', () => {
  const rows = [
    {
      location: '/hpsans13/production/starwars/reel1/partA/1920x1080',
      frameRange: '32-34',
      timeRange: '00:00:01:08 - 00:00:01:10',
      thumbnail: 'thumbnails/frame-33.png'
    },
    {
      location: '/hpsans12/production/starwars/reel1/VFX/Hydraulx',
      frameRange: '1251-1253',
      timeRange: '00:00:52:03 - 00:00:52:05',
      thumbnail: 'thumbnails/frame-1252.png'
    }
  ];

  it('lays out one row per range on a single sheet', () => {
    const workbook = buildWorkbook(rows);
    expect(workbook.SheetNames).toEqual(['frames']);
    const sheet = workbook.Sheets.frames;
    expect(sheet['!ref']).toBe('A1:D2');
    expect(sheet.A1.v).toBe('/hpsans13/production/starwars/reel1/partA/1920x1080');
    expect(sheet.B1.v).toBe('32-34');
    expect(sheet.C2.v).toBe('00:00:52:03 - 00:00:52:05');
  });

  it('links each thumbnail cell to its image file', () => {
    const sheet = buildWorkbook(rows).Sheets.frames;
    expect(sheet.D2).toEqual({
      t: 's',
      v: 'thumbnails/frame-1252.png',
      l: { Target: 'thumbnails/frame-1252.png' }
    });
  });

  it('sizes columns and rows for the thumbnails', () => {
    const sheet = buildWorkbook(rows).Sheets.frames;
    expect(sheet['!cols']).toEqual([{ wch: 80 }, { wch: 15 }, { wch: 25 }, { wch: 15 }]);
    expect(sheet['!rows']).toEqual([{ hpt: 60 }, { hpt: 60 }]);
  });

  it('round-trips through the xlsx writer', () => {
    const buffer: Buffer = XLSX.write(buildWorkbook(rows), { type: 'buffer', bookType: 'xlsx' });
    const read = XLSX.read(buffer, { type: 'buffer' });
    expect(XLSX.utils.sheet_to_json(read.Sheets.frames, { header: 1 })).toEqual([
      [rows[0].location, rows[0].frameRange, rows[0].timeRange, rows[0].thumbnail],
      [rows[1].location, rows[1].frameRange, rows[1].timeRange, rows[1].thumbnail]
    ]);
  });
});
