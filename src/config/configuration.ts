import { registerAs } from '@nestjs/config';

export type BatchPolicy = 'abort' | 'collect';

export const BATCH_POLICIES: readonly BatchPolicy[] = ['abort', 'collect'];

export interface TleConfig {
  /** Reject element lines whose checksum column does not match. */
  verifyChecksum: boolean;
  /** Parse a short trailing group of a batch instead of dropping it. */
  keepRemainder: boolean;
  /** Abort a batch on the first bad record, or collect failures per record. */
  batchPolicy: BatchPolicy;
}

function isBatchPolicy(value: string | undefined): value is BatchPolicy {
  return BATCH_POLICIES.some((policy) => policy === value);
}

export const tleConfig = registerAs('tle', (): TleConfig => {
  const policy = process.env.TLE_BATCH_POLICY;
  return {
    verifyChecksum: process.env.TLE_VERIFY_CHECKSUM === 'true',
    keepRemainder: process.env.TLE_KEEP_REMAINDER === 'true',
    batchPolicy: isBatchPolicy(policy) ? policy : 'abort',
  };
});
