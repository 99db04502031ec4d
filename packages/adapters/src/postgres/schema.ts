import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { Logger } from '@location-bridge/domain';
import type { Queryable } from './pool.js';

function readSchemaFile(): string {
  const schemaPath = resolve(__dirname, '../../sql/schema.sql');
  try {
    return readFileSync(schemaPath, 'utf-8');
  } catch {
    // dist layout
    return readFileSync(resolve(process.cwd(), 'packages/adapters/sql/schema.sql'), 'utf-8');
  }
}

/** Splits a SQL script on semicolons, dropping `--` comments and blanks. */
export function splitStatements(script: string): string[] {
  return script
    .split(';')
    .map((s) => s.replace(/--.*$/gm, '').trim())
    .filter((s) => s.length > 0);
}

/**
 * Creates the bridge schema if missing. Safe to run on every start.
 * Returns the number of statements executed.
 */
export async function applySchema(
  db: Queryable,
  logger: Logger,
  script: string = readSchemaFile(),
): Promise<number> {
  const statements = splitStatements(script);
  for (const stmt of statements) {
    await db.query(stmt);
  }
  logger.info(`schema applied (${statements.length} statements)`);
  return statements.length;
}
