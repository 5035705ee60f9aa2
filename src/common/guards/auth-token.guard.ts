import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

interface HttpRequest {
  headers: Record<string, string | string[] | undefined>;
}

/**
 * Bearer check against OPERATOR_API_TOKEN. With no token configured every
 * request is refused, so the operator routes stay closed by default.
 */
@Injectable()
export class AuthTokenGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<HttpRequest>();
    const authHeader = request.headers['authorization'];
    if (typeof authHeader !== 'string' || !authHeader.startsWith('Bearer ')) {
      return false;
    }
    const expected = this.configService.get<string>('OPERATOR_API_TOKEN');
    if (!expected) return false;
    return authHeader.slice(7) === expected;
  }
}
