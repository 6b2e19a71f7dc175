import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';

export const API_KEY_HEADER = 'x-api-key';

interface HeaderBag {
  headers: Record<string, string | string[] | undefined>;
}

function sameSecret(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Open when no NOTIFY_API_KEY is configured. */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.get<string | null>('notifyApiKey');
    if (!expected) return true;

    const request = context.switchToHttp().getRequest<HeaderBag>();
    const header = request.headers[API_KEY_HEADER];
    const given = Array.isArray(header) ? header[0] : header;
    if (!given || !sameSecret(given, expected)) {
      throw new UnauthorizedException('Unauthorized');
    }
    return true;
  }
}
