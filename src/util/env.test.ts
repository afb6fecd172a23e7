import { loadEnv, outputFileOverride, parseEnv } from './env';
import { ConfigError } from './errors';

describe('parseEnv', () => {
  it('should convert numeric, boolean and list variables', () => {
    const result = parseEnv({
      MAX_PAGES: '3',
      MAX_MOVIES: '40',
      BASE_DELAY: '2.5',
      SKIP_DETAILS: 'TRUE',
      EXCLUDE_COUNTRIES: 'Россия, США ,',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.MAX_PAGES).toBe(3);
      expect(result.data.MAX_MOVIES).toBe(40);
      expect(result.data.BASE_DELAY).toBe(2.5);
      expect(result.data.SKIP_DETAILS).toBe(true);
      expect(result.data.EXCLUDE_COUNTRIES).toEqual(['Россия', 'США']);
      expect(result.data.LOG_LEVEL).toBe('info');
    }
  });

  it('should leave unset variables undefined', () => {
    const result = parseEnv({});

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.SKIP_DETAILS).toBeUndefined();
      expect(result.data.EXCLUDE_COUNTRIES).toBeUndefined();
      expect(result.data.NODE_ENV).toBe('development');
    }
  });

  it('should reject a non-numeric page count', () => {
    expect(parseEnv({ MAX_PAGES: 'many' }).success).toBe(false);
  });

  it('should reject an invalid schedule URL', () => {
    expect(parseEnv({ SCHEDULE_URL: 'not-a-url' }).success).toBe(false);
  });
});

describe('loadEnv', () => {
  it('should throw ConfigError listing every invalid variable', () => {
    let error: unknown;
    try {
      loadEnv({ MAX_PAGES: 'abc', HTTP_CONCURRENCY: '9' });
    } catch (e: unknown) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.issues.map(issue => issue.split(':')[0])).toEqual([
      'MAX_PAGES',
      'HTTP_CONCURRENCY',
    ]);
  });

  it('should return the parsed environment when valid', () => {
    expect(loadEnv({ MAX_MOVIES: '5' }).MAX_MOVIES).toBe(5);
  });
});

describe('outputFileOverride', () => {
  it('should read the output file alongside invalid variables', () => {
    expect(outputFileOverride({ OUTPUT_FILE: 'out/perm.ics', MAX_PAGES: 'abc' })).toBe('out/perm.ics');
  });

  it('should ignore an empty value', () => {
    expect(outputFileOverride({ OUTPUT_FILE: '' })).toBeUndefined();
  });
});
