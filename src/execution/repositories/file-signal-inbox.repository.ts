/**
 * File Signal Inbox - One JSON signal per file in STATE_DIR/inbox.
 *
 * A settled file moves to inbox/processed and its outcome is appended to
 * inbox/outcomes.ndjson. Files are taken in name order.
 */

import { appendFile, mkdir, readdir, readFile, rename } from 'fs/promises';
import path from 'path';
import type { InboxMessage, InboxOutcome, SignalInboxRepository } from '../interfaces/repository.interface';
import { isMissingFile } from './file-snapshot.repository';

export const INBOX_DIR = 'inbox';
export const PROCESSED_DIR = 'processed';
export const OUTCOMES_FILE = 'outcomes.ndjson';

export class FileSignalInboxRepository implements SignalInboxRepository {
  private readonly inboxDir: string;

  constructor(stateDir: string) {
    this.inboxDir = path.join(stateDir, INBOX_DIR);
  }

  async pending(): Promise<InboxMessage[]> {
    let names: string[];
    try {
      names = await readdir(this.inboxDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const messages: InboxMessage[] = [];
    for (const name of names.filter((candidate) => candidate.endsWith('.json')).sort()) {
      const text = await readFile(path.join(this.inboxDir, name), 'utf8');
      try {
        messages.push({ id: name, payload: JSON.parse(text) });
      } catch (error) {
        messages.push({
          id: name,
          payload: null,
          readError: `unreadable JSON: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    }
    return messages;
  }

  async settle(id: string, outcome: InboxOutcome, settledAt: Date): Promise<void> {
    const processedDir = path.join(this.inboxDir, PROCESSED_DIR);
    await mkdir(processedDir, { recursive: true });
    await rename(path.join(this.inboxDir, id), path.join(processedDir, id));
    await appendFile(
      path.join(this.inboxDir, OUTCOMES_FILE),
      `${JSON.stringify({ id, ...outcome, settledAt: settledAt.toISOString() })}\n`,
      'utf8'
    );
  }
}
