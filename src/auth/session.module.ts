import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TokenService } from './token.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';

/**
 * Token validation and the guard built on it. Split from AuthModule so
 * feature modules can protect routes without importing registration/login.
 */
@Module({
  imports: [ConfigModule],
  providers: [TokenService, JwtAuthGuard],
  exports: [TokenService, JwtAuthGuard],
})
export class SessionModule {}
