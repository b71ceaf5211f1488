import {
  Injectable,
  InternalServerErrorException,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as jwt from 'jsonwebtoken';
import { z } from 'zod';
import { Role } from '../users/enums/role.enum';
import type { Caller } from './types/caller.type';

export const SESSION_TTL = '24h';
const SIGNING_ALGORITHM = 'HS256';

const sessionClaimsSchema = z.object({
  userId: z.string().min(1),
  role: z.nativeEnum(Role),
});

/**
 * Issues and validates signed session tokens. The secret is read once at
 * construction; without it both directions refuse to work.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly secret: string | undefined;

  constructor(configService: ConfigService) {
    const secret = configService.get<string>('JWT_SECRET');
    this.secret = secret && secret.length > 0 ? secret : undefined;

    if (!this.secret) {
      this.logger.error(
        'JWT_SECRET is not configured. Session tokens can be neither issued nor validated.',
      );
    }
  }

  issue(caller: Caller): string {
    if (!this.secret) {
      throw new InternalServerErrorException('Could not generate token');
    }

    const claims: Caller = { userId: caller.userId, role: caller.role };

    return jwt.sign(claims, this.secret, {
      algorithm: SIGNING_ALGORITHM,
      expiresIn: SESSION_TTL,
    });
  }

  validate(token: string): Caller {
    if (!this.secret) {
      throw new UnauthorizedException('Invalid token');
    }

    let decoded: string | jwt.JwtPayload;

    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [SIGNING_ALGORITHM],
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unknown';
      this.logger.debug(`Rejected session token: ${reason}`);
      throw new UnauthorizedException('Invalid token');
    }

    const claims = sessionClaimsSchema.safeParse(decoded);

    if (!claims.success) {
      throw new UnauthorizedException('Invalid token');
    }

    return claims.data;
  }
}
