import { ExportFileNameError } from '@/lib/errors';
import type { ExportFileIdentity, Grammar, Machine } from '../types';

const GRAMMAR_BY_MACHINE: Record<Machine, Grammar> = {
  Baselight: 'single-path',
  Flame: 'dual-path'
};

function isMachine(value: string): value is Machine {
  return value === 'Baselight' || value === 'Flame';
}

export function grammarForMachine(machine: Machine): Grammar {
  return GRAMMAR_BY_MACHINE[machine];
}

function baseName(path: string): string {
  const parts = path.replace(/\\/g, '/').split('/');
  return parts[parts.length - 1];
}

function stripExtension(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}

/**
 * The last eight characters of the name before its extension.
 * `Flame_DFlowers_20230323.txt` → `20230323`
 */
export function getFileDate(fileName: string): string {
  return stripExtension(baseName(fileName)).slice(-8);
}

/** `YYYYMMDD` → UTC midnight, or null for malformed or rolled-over dates. */
export function parseCompactDate(value: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 20230231 over into March; reject instead.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/** `Baselight_GLopez_20230325.txt` → machine, user on file, file date and grammar. */
export function parseExportFileName(pathOrName: string): ExportFileIdentity {
  const name = baseName(pathOrName);
  const parts = stripExtension(name).split('_');
  if (parts.length !== 3) {
    throw new ExportFileNameError(name, 'expected <Machine>_<User>_<YYYYMMDD>');
  }

  const [machine, userOnFile, rawDate] = parts;
  if (!isMachine(machine)) {
    throw new ExportFileNameError(name, `unknown machine "${machine}"`);
  }
  if (!userOnFile) {
    throw new ExportFileNameError(name, 'missing user');
  }
  const fileDate = parseCompactDate(rawDate);
  if (!fileDate) {
    throw new ExportFileNameError(name, `invalid date "${rawDate}"`);
  }

  return { machine, userOnFile, fileDate, grammar: grammarForMachine(machine) };
}
