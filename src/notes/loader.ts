import { readFile } from 'node:fs/promises';
import { logger } from '../observability/logger.js';
import type { NotesMap } from '../types.js';

const NOTE_LINE = /^(\S+)\s+(.+)$/;

export function parseVersionNotes(text: string): Map<string, string> {
  const notes = new Map<string, string>();

  for (const line of text.split(/\r\n|\r|\n/)) {
    const match = line.trim().match(NOTE_LINE);
    if (!match) continue;
    notes.set(match[1], match[2]);
  }

  return notes;
}

export async function loadVersionNotes(notesFile: string): Promise<NotesMap> {
  try {
    const text = await readFile(notesFile, 'utf-8');
    const notes = parseVersionNotes(text);
    logger.info('notes_loaded', 'Loaded version notes', { notesFile, count: notes.size });
    return notes;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.warn('notes_loaded', `${notesFile} not found`, { notesFile });
    } else {
      logger.error('notes_loaded', `Error reading ${notesFile}`, {
        notesFile,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
    return new Map();
  }
}
