import * as crypto from 'crypto';

export const SECRET_BYTES = 64;

/** 64 random bytes from the OS CSPRNG, hex-encoded (128 characters) */
export function generateSecret(bytes: number = SECRET_BYTES): string {
  return crypto.randomBytes(bytes).toString('hex');
}
