import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ServiceError, errorMessage } from '../errors/panel.errors';
import { SecretBox } from './secret-box';

export type PanelCredentials = { username: string; password: string };

type SealedCredentials = { id: number; usernameEnc: string; passwordEnc: string };

/** Шифрует креды панелей в БД. Открытый текст живёт только внутри вызова. */
@Injectable()
export class CredentialVault {
  constructor(private readonly config: ConfigService) {}

  private secret(): string {
    return this.config.getOrThrow<string>('PANEL_CRED_SECRET');
  }

  seal(plain: string): string {
    return SecretBox.encrypt(plain, this.secret());
  }

  open(box: string): string {
    return SecretBox.decrypt(box, this.secret());
  }

  sealCredentials(credentials: PanelCredentials): { usernameEnc: string; passwordEnc: string } {
    return { usernameEnc: this.seal(credentials.username), passwordEnc: this.seal(credentials.password) };
  }

  openCredentials(panel: SealedCredentials): PanelCredentials {
    let username: string;
    let password: string;
    try {
      username = this.open(panel.usernameEnc);
      password = this.open(panel.passwordEnc);
    } catch (e) {
      throw new ServiceError(`Credential decryption failed for panel ${panel.id}: ${errorMessage(e)}`);
    }
    if (!username || !password) throw new ServiceError(`Decrypted credentials are empty for panel ${panel.id}`);
    return { username, password };
  }
}
