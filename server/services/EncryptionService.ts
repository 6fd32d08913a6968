import crypto from 'node:crypto';

import { env } from '../env';

export interface EncryptedData {
  encryptedData: string;
  iv: string;
}

const SEALED_PREFIX = 'v1';

/**
 * AES-256-GCM encryption for integration credentials. The 16-byte auth tag is
 * appended to the hex ciphertext.
 */
export class EncryptionService {
  private static readonly ALGORITHM = 'aes-256-gcm';
  private static readonly KEY_LENGTH = 32; // bytes
  private static readonly IV_LENGTH = 12; // 96-bit IV recommended for GCM
  private static readonly AAD = Buffer.from('integration-credentials', 'utf8');

  private readonly key: Buffer;

  constructor(masterKey: string = env.ENCRYPTION_MASTER_KEY) {
    if (!masterKey || masterKey.trim().length === 0) {
      throw new Error('ENCRYPTION_MASTER_KEY must be set to store integration credentials');
    }
    this.key = crypto.scryptSync(masterKey, 'conduit-integration-tokens', EncryptionService.KEY_LENGTH);
  }

  encrypt(plaintext: string): EncryptedData {
    const iv = crypto.randomBytes(EncryptionService.IV_LENGTH);
    const cipher = crypto.createCipheriv(EncryptionService.ALGORITHM, this.key, iv);
    cipher.setAAD(EncryptionService.AAD);

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag(); // 16 bytes

    return {
      encryptedData: Buffer.concat([encrypted, tag]).toString('hex'),
      iv: iv.toString('hex'),
    };
  }

  decrypt(encryptedData: string, ivHex: string): string {
    const iv = Buffer.from(ivHex, 'hex');
    const buf = Buffer.from(encryptedData, 'hex');
    const tag = buf.subarray(buf.length - 16);
    const ciphertext = buf.subarray(0, buf.length - 16);

    const decipher = crypto.createDecipheriv(EncryptionService.ALGORITHM, this.key, iv);
    decipher.setAAD(EncryptionService.AAD);
    decipher.setAuthTag(tag);

    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
  }

  /** Encrypts into a single `v1:<iv>:<payload>` column value. */
  seal(plaintext: string): string {
    const { encryptedData, iv } = this.encrypt(plaintext);
    return `${SEALED_PREFIX}:${iv}:${encryptedData}`;
  }

  open(sealed: string): string {
    const [prefix, iv, payload] = sealed.split(':');
    if (prefix !== SEALED_PREFIX || !iv || !payload) {
      throw new Error('Unrecognised sealed credential format');
    }
    return this.decrypt(payload, iv);
  }
}
