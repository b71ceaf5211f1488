import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import { TokenService } from '../token.service';
import type { Caller } from '../types/caller.type';

export interface AuthenticatedRequest extends Request {
  user?: Caller;
}

const BEARER_PREFIX = 'Bearer ';

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly tokenService: TokenService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const header = request.headers.authorization;

    if (!header) {
      throw new UnauthorizedException('Authorization header required');
    }

    if (!header.startsWith(BEARER_PREFIX)) {
      throw new UnauthorizedException('Invalid token');
    }

    request.user = this.tokenService.validate(
      header.slice(BEARER_PREFIX.length).trim(),
    );

    return true;
  }
}
