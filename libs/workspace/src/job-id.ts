import { randomUUID } from 'crypto';

/** Canonical lowercase UUID, the only form `generateJobId()` produces */
const JOB_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

/** 122 random bits from the CSPRNG, rendered as a v4 UUID */
export function generateJobId(): string {
  return randomUUID();
}

export function isJobId(value: string): boolean {
  return JOB_ID_PATTERN.test(value);
}
