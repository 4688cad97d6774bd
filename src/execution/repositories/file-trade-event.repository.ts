/**
 * File Trade Event Repository - Append-only NDJSON event log
 */

import { appendFile, mkdir, readFile } from 'fs/promises';
import path from 'path';
import type { TradeEventRepository } from '../interfaces/repository.interface';
import type { TradeEvent, TradeEventFilter } from '../types/execution.types';
import { parseTradeEvent } from '../schemas/snapshot.schema';
import { matchesEventFilter } from './event-filter';
import { isMissingFile } from './file-snapshot.repository';
import { getComponentLogger } from '../../config/logger';

export const EVENT_LOG_FILE = 'trade-events.ndjson';

export class FileTradeEventRepository implements TradeEventRepository {
  private readonly logger = getComponentLogger('FileTradeEventRepository');
  private readonly logPath: string;

  constructor(private readonly stateDir: string) {
    this.logPath = path.join(stateDir, EVENT_LOG_FILE);
  }

  async append(event: TradeEvent): Promise<void> {
    await mkdir(this.stateDir, { recursive: true });
    await appendFile(this.logPath, `${JSON.stringify(event)}\n`, 'utf8');
  }

  async list(filter?: TradeEventFilter): Promise<TradeEvent[]> {
    let text: string;
    try {
      text = await readFile(this.logPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const events: TradeEvent[] = [];
    const lines = text.split('\n');
    lines.forEach((line, index) => {
      if (line.trim().length === 0) {
        return;
      }

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        this.logger.warn({ line: index + 1 }, 'Skipping unreadable event log line');
        return;
      }

      const parsed = parseTradeEvent(json);
      if (!parsed.success) {
        this.logger.warn({ line: index + 1, reason: parsed.error }, 'Skipping invalid event log line');
        return;
      }
      if (matchesEventFilter(parsed.data, filter)) {
        events.push(parsed.data);
      }
    });

    return events;
  }
}
