import { applyDecorators, UseGuards } from '@nestjs/common';
import { AdminTokenGuard } from './admin-token.guard';

export function AdminAuth() {
  return applyDecorators(UseGuards(AdminTokenGuard));
}
