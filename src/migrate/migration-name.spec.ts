import { formatMigrationName, MAX_MIGRATION_NAME_LENGTH } from './migration-name';

describe('formatMigrationName', () => {
  const date = new Date(Date.UTC(2024, 0, 31, 9, 30, 5));

  it('should prefix the name with a UTC timestamp', () => {
    expect(formatMigrationName('init', date)).toBe('20240131093005_init');
  });

  it('should replace runs of other characters with underscores', () => {
    expect(formatMigrationName('add posts & tags!', date)).toBe('20240131093005_add_posts_tags_');
  });

  it('should return only the timestamp for an empty name', () => {
    expect(formatMigrationName('', date)).toBe('20240131093005');
  });

  it('should cut long names', () => {
    const result = formatMigrationName('a'.repeat(250), date);
    expect(result).toBe(`20240131093005_${'a'.repeat(MAX_MIGRATION_NAME_LENGTH)}`);
  });

  describe('outside UTC', () => {
    beforeEach(() => {
      vi.stubEnv('TZ', 'America/New_York');
    });

    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('should keep the UTC time on the night clocks move forward', () => {
      expect(formatMigrationName('x', new Date('2024-03-10T06:30:00Z'))).toBe('20240310063000_x');
    });

    it('should keep the UTC time on the night clocks move back', () => {
      expect(formatMigrationName('x', new Date('2024-11-03T05:30:00Z'))).toBe('20241103053000_x');
    });
  });
});
