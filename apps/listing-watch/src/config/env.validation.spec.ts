import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('accepts an empty environment', () => {
    expect(validateEnvironment({})).toEqual({});
  });

  it('passes valid values through unchanged', () => {
    const env = { DB_TYPE: 'postgres', DB_PORT: '5432', ADDRESS_MATCH_THRESHOLD: '0.9', SMTP_PASSWORD: 'test-secret' };

    expect(validateEnvironment(env)).toBe(env);
  });

  it('accepts the sql.js engine', () => {
    expect(validateEnvironment({ DB_TYPE: 'sqljs', DB_PATH: 'data/listings.db' })).toEqual({
      DB_TYPE: 'sqljs',
      DB_PATH: 'data/listings.db',
    });
  });

  it('rejects an unknown database type', () => {
    expect(() => validateEnvironment({ DB_TYPE: 'mysql' })).toThrow('DB_TYPE must be one of the following values');
    expect(() => validateEnvironment({ DB_TYPE: 'better-sqlite3' })).toThrow(
      'DB_TYPE must be one of the following values',
    );
  });

  it('rejects an out of range threshold', () => {
    expect(() => validateEnvironment({ ADDRESS_MATCH_THRESHOLD: '1.5' })).toThrow(
      'Invalid environment: ADDRESS_MATCH_THRESHOLD must not be greater than 1',
    );
  });
});
