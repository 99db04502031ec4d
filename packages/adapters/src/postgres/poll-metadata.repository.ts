import { z } from 'zod';
import { LAST_API_POLL_TIME } from '@location-bridge/domain';
import type { PollMetadataPort } from '@location-bridge/domain';
import type { Queryable } from './pool.js';

const metadataRowSchema = z.object({ value: z.string() });

/** Key/value rows in `bridge.metadata`; the poll time is one of them. */
export class PgPollMetadataStore implements PollMetadataPort {
  constructor(private readonly db: Queryable) {}

  async getValue(name: string): Promise<string | null> {
    const { rows } = await this.db.query(
      `SELECT value FROM bridge.metadata WHERE name = $1`,
      [name],
    );
    return rows[0] === undefined ? null : metadataRowSchema.parse(rows[0]).value;
  }

  async setValue(name: string, value: string): Promise<void> {
    await this.db.query(
      `INSERT INTO bridge.metadata (name, value)
       VALUES ($1, $2)
       ON CONFLICT (name) DO UPDATE SET value = EXCLUDED.value`,
      [name, value],
    );
  }

  async getLastPollTime(): Promise<number | null> {
    const raw = await this.getValue(LAST_API_POLL_TIME);
    if (raw === null) return null;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : null;
  }

  async setLastPollTime(unixSeconds: number): Promise<void> {
    await this.setValue(LAST_API_POLL_TIME, String(Math.floor(unixSeconds)));
  }
}
