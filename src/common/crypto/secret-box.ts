import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';

const VERSION = 'v1';
const ALGORITHM = 'aes-256-gcm';

export class SecretBoxError extends Error {}

/**
 * AES-256-GCM secret box.
 * Sealed format: "v1:<ivB64>:<cipherB64>:<tagB64>"
 */
export class SecretBox {
  private static deriveKey(secret: string): Buffer {
    if (!secret) throw new SecretBoxError('Secret box key is empty');
    return createHash('sha256').update(secret).digest(); // 32 bytes
  }

  static isSealed(value: string): boolean {
    const parts = value.split(':');
    return parts.length === 4 && parts[0] === VERSION && parts.slice(1).every((p) => p.length > 0);
  }

  static encrypt(plain: string, secret: string): string {
    const key = this.deriveKey(secret);
    const iv = randomBytes(12);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const ciphertext = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return [VERSION, iv.toString('base64'), ciphertext.toString('base64'), tag.toString('base64')].join(':');
  }

  static decrypt(box: string, secret: string): string {
    if (!this.isSealed(box)) throw new SecretBoxError('Invalid secret box format');
    const [, ivB64, cipherB64, tagB64] = box.split(':');
    const key = this.deriveKey(secret);
    try {
      const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(ivB64, 'base64'));
      decipher.setAuthTag(Buffer.from(tagB64, 'base64'));
      const plain = Buffer.concat([decipher.update(Buffer.from(cipherB64, 'base64')), decipher.final()]);
      return plain.toString('utf8');
    } catch {
      // GCM auth fail: не тот ключ или данные испорчены
      throw new SecretBoxError('Secret box authentication failed');
    }
  }
}
