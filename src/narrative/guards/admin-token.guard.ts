import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';

interface HeaderCarrier {
  headers: Record<string, string | string[] | undefined>;
}

function readBearer(header: string | string[] | undefined): string {
  const raw = Array.isArray(header) ? (header[0] ?? '') : (header ?? '');
  return raw.replace(/^Bearer\s+/i, '').trim();
}

/**
 * Protects mutating routes with `Authorization: Bearer <ADMIN_TOKEN>`.
 * Without ADMIN_TOKEN configured every request passes (local runs).
 */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const expected = (process.env.ADMIN_TOKEN ?? '').trim();
    if (!expected) {
      return true;
    }

    const request = context.switchToHttp().getRequest<HeaderCarrier>();
    if (readBearer(request.headers.authorization) !== expected) {
      throw new UnauthorizedException('admin token required');
    }
    return true;
  }
}
