import crypto from 'crypto';
import { config } from '../config';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;

/**
 * Encrypt connector credentials (SMTP password, Twilio token, Slack token) for storage.
 * Output format is iv:authTag:ciphertext, all hex.
 */
export function encryptCredential(data: Record<string, unknown>): string {
  const key = Buffer.from(config.credentialEncryptionKey, 'hex');
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

  let encrypted = cipher.update(JSON.stringify(data), 'utf8', 'hex');
  encrypted += cipher.final('hex');

  const authTag = cipher.getAuthTag();
  return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
}

export function decryptCredential(encrypted: string): Record<string, unknown> {
  const key = Buffer.from(config.credentialEncryptionKey, 'hex');
  const [ivHex, authTagHex, ciphertext] = encrypted.split(':');
  if (!ivHex || !authTagHex || ciphertext === undefined) {
    throw new Error('Malformed encrypted credential');
  }

  const decipher = crypto.createDecipheriv(ALGORITHM, key, Buffer.from(ivHex, 'hex'));
  decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));

  let decrypted = decipher.update(ciphertext, 'hex', 'utf8');
  decrypted += decipher.final('utf8');

  const parsed: unknown = JSON.parse(decrypted);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Encrypted credential is not an object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Constant-time string comparison for the API key header.
 */
export function safeCompare(a: string, b: string): boolean {
  const left = crypto.createHash('sha256').update(a).digest();
  const right = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(left, right);
}
