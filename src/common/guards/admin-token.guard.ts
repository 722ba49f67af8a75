import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';

type HeaderBag = { headers: Record<string, string | string[] | undefined> };

/** `Authorization: Bearer <ADMIN_API_TOKEN>` */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<HeaderBag>();
    const header = req.headers['authorization'];
    const value = Array.isArray(header) ? header[0] : header;
    const match = /^Bearer\s+(.+)$/i.exec(value ?? '');
    if (!match) throw new UnauthorizedException('Admin token required');

    const expected = Buffer.from(this.config.getOrThrow<string>('ADMIN_API_TOKEN'));
    const given = Buffer.from(match[1].trim());
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      throw new UnauthorizedException('Invalid admin token');
    }
    return true;
  }
}
