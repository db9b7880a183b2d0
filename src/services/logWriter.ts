import fs from 'fs/promises';
import path from 'path';

import { ERROR_MESSAGES } from '../constants/index.js';
import { LogRecord, LogWriter } from '../models/types.js';
import { createLogger } from '../utils/logger.js';
import { isNodeError } from '../utils/typeGuards.js';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local-time timestamp in the form YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Writes each record sequence to logs_<label>_<timestamp>.json.
 * An existing file is never overwritten; a numeric suffix is added instead.
 */
export class JsonLogWriter implements LogWriter {
  private readonly logger = createLogger('JsonLogWriter');

  constructor(
    private readonly directory: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async write(label: string, records: readonly LogRecord[]): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });

    const baseName = `logs_${label}_${formatTimestamp(this.now())}`;
    const body = JSON.stringify(records, null, 2);

    for (let attempt = 0; ; attempt++) {
      const fileName = attempt === 0 ? `${baseName}.json` : `${baseName}_${attempt}.json`;
      const filePath = path.join(this.directory, fileName);

      try {
        await fs.writeFile(filePath, body, { encoding: 'utf8', flag: 'wx' });
        this.logger.info(`💾 Wrote ${records.length} records`, { label, filePath });
        return filePath;
      } catch (error) {
        if (isNodeError(error) && error.code === 'EEXIST') {
          continue;
        }
        this.logger.error(`${ERROR_MESSAGES.WRITE_FAILED}: ${filePath}`, error);
        throw error;
      }
    }
  }
}
