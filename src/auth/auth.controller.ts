import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import type { LoginResult } from './auth.service';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { loginSchema, registerSchema } from './dto/auth.schemas';
import type { LoginDto, RegisterDto } from './dto/auth.schemas';
import type { PublicUser } from '../users/ports/user-directory.port';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  register(
    @Body(new ZodValidationPipe(registerSchema)) body: RegisterDto,
  ): Promise<PublicUser> {
    return this.authService.register(body);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(
    @Body(new ZodValidationPipe(loginSchema)) body: LoginDto,
  ): Promise<LoginResult> {
    return this.authService.login(body);
  }
}
