import { UTCDate } from '@date-fns/utc';
import { format } from 'date-fns';

export const MAX_MIGRATION_NAME_LENGTH = 200;

/**
 * Builds a migration directory name such as `20240131093000_add_posts`. The
 * timestamp is in UTC.
 */
export function formatMigrationName(name: string, date: Date): string {
  const timestamp = format(new UTCDate(date), 'yyyyMMddHHmmss');
  const slug = name.replace(/[^A-Za-z0-9_]+/g, '_').slice(0, MAX_MIGRATION_NAME_LENGTH);
  return slug ? `${timestamp}_${slug}` : timestamp;
}
