import { describe, expect, it } from 'vitest';
import { ExportFileNameError } from '@/lib/errors';
import { getFileDate, grammarForMachine, parseExportFileName } from './file-name';

describe('getFileDate', () => {
  it('takes the eight characters before the extension', () => {
    expect(getFileDate('Baselight_GLopez_20230325.txt')).toBe('20230325');
    expect(getFileDate('Flame_DFlowers_20230323.txt')).toBe('20230323');
    expect(getFileDate('Xytech_20230323.txt')).toBe('20230323');
  });
});

describe('parseExportFileName', () => {
  it('reads machine, user and date from a Baselight export', () => {
    expect(parseExportFileName('exports/Baselight_GLopez_20230325.txt')).toEqual({
      machine: 'Baselight',
      userOnFile: 'GLopez',
      fileDate: new Date(Date.UTC(2023, 2, 25)),
      grammar: 'single-path'
    });
  });

  it('maps Flame exports to the dual-path grammar and accepts Windows paths', () => {
    const identity = parseExportFileName('C:\\exports\\Flame_DFlowers_20230323.txt');
    expect(identity.machine).toBe('Flame');
    expect(identity.userOnFile).toBe('DFlowers');
    expect(identity.grammar).toBe('dual-path');
  });

  it.each([
    ['Xytech_20230323.txt'],
    ['Nuke_TDanza_20230326.txt'],
    ['Flame_DFlowers_2023032.txt'],
    ['Flame_DFlowers_20230231.txt'],
    ['Flame__20230323.txt']
  ])('rejects %s', (name) => {
    expect(() => parseExportFileName(name)).toThrow(ExportFileNameError);
  });
});

describe('grammarForMachine', () => {
  it('pairs each review tool with its export grammar', () => {
    expect(grammarForMachine('Baselight')).toBe('single-path');
    expect(grammarForMachine('Flame')).toBe('dual-path');
  });
});
