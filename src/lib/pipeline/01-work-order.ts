import { WorkOrderError } from '@/lib/errors';
import type { WorkOrder } from './types';

const LOCATION_MARKER = 'Location:';
const NOTES_MARKER = 'Notes:';

/**
 * Reads a labelled single-line field such as `Producer: Joan Jett`.
 * The first occurrence wins; surrounding whitespace is trimmed.
 */
export function getField(label: string, content: string): string {
  const match = new RegExp(`${label}: ([^\\n]+)`).exec(content);
  if (!match?.[1]) {
    throw new WorkOrderError(label);
  }
  return match[1].trim();
}

function findMarker(lines: string[], marker: string, from: number): number {
  for (let i = from; i < lines.length; i += 1) {
    if (lines[i].trim() === marker) return i;
  }
  return -1;
}

export function parseWorkOrder(content: string): WorkOrder {
  const producer = getField('Producer', content);
  const operator = getField('Operator', content);
  const job = getField('Job', content);

  const lines = content.split('\n');
  const locationIndex = findMarker(lines, LOCATION_MARKER, 0);
  if (locationIndex === -1) {
    throw new WorkOrderError('Location');
  }
  const notesIndex = findMarker(lines, NOTES_MARKER, locationIndex + 1);
  if (notesIndex === -1) {
    throw new WorkOrderError('Notes');
  }

  // Separators are normalized here once; reconciliation compares as-is.
  const canonicalPaths = lines
    .slice(locationIndex + 1, notesIndex)
    .map((line) => line.trim().replace(/\\/g, '/'))
    .filter((line) => line.length > 0);

  const notes = lines
    .slice(notesIndex + 1)
    .join('\n')
    .trim();

  return Object.freeze({
    producer,
    operator,
    job,
    notes,
    canonicalPaths: Object.freeze(canonicalPaths)
  });
}
