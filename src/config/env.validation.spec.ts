import { tleConfig } from './configuration';
import { validate } from './env.validation';

describe('environment', () => {
  describe('validate', () => {
    it('accepts an empty environment', () => {
      expect(() => validate({})).not.toThrow();
    });

    it('converts the port to a number', () => {
      expect(validate({ PORT: '8080', TLE_VERIFY_CHECKSUM: 'true' })).toMatchObject({
        PORT: 8080,
        TLE_VERIFY_CHECKSUM: 'true',
      });
    });

    it('rejects bad values', () => {
      expect(() => validate({ PORT: '0' })).toThrow();
      expect(() => validate({ TLE_KEEP_REMAINDER: 'yes' })).toThrow();
      expect(() => validate({ TLE_BATCH_POLICY: 'skip' })).toThrow();
    });
  });

  describe('tleConfig', () => {
    const saved = { ...process.env };

    afterEach(() => {
      process.env = { ...saved };
    });

    it('defaults to lenient parsing that aborts batches', () => {
      delete process.env.TLE_VERIFY_CHECKSUM;
      delete process.env.TLE_KEEP_REMAINDER;
      delete process.env.TLE_BATCH_POLICY;
      expect(tleConfig()).toEqual({ verifyChecksum: false, keepRemainder: false, batchPolicy: 'abort' });
    });

    it('reads the environment', () => {
      process.env.TLE_VERIFY_CHECKSUM = 'true';
      process.env.TLE_KEEP_REMAINDER = 'true';
      process.env.TLE_BATCH_POLICY = 'collect';
      expect(tleConfig()).toEqual({ verifyChecksum: true, keepRemainder: true, batchPolicy: 'collect' });
    });
  });
});
