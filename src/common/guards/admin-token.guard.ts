import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';

/**
 * Protects endpoints that replace or drop loaded datasets. Open when no
 * ADMIN_TOKEN is configured (local debugging).
 */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.get<string>('ADMIN_TOKEN')?.trim();
    if (!expected) return true;
    const req = context.switchToHttp().getRequest<Request>();
    const header = req.headers['x-admin-token'];
    const token = Array.isArray(header) ? header[0] : header;
    if (!token) return false;
    return token === expected;
  }
}
