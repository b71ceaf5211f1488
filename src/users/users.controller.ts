import { Body, Controller, Get, Put, UseGuards } from '@nestjs/common';
import { UsersService } from './users.service';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { Caller } from '../auth/types/caller.type';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { updateProfileSchema } from './dto/user.schemas';
import type { UpdateProfileDto } from './dto/user.schemas';
import type { PublicUser } from './ports/user-directory.port';

// The :id segment is kept for route compatibility; the session decides whose
// profile is read or written.
@Controller('api/user')
@UseGuards(JwtAuthGuard)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get(':id')
  getProfile(@CurrentUser() caller: Caller): Promise<PublicUser> {
    return this.usersService.getProfile(caller);
  }

  @Put(':id')
  updateProfile(
    @CurrentUser() caller: Caller,
    @Body(new ZodValidationPipe(updateProfileSchema)) body: UpdateProfileDto,
  ): Promise<PublicUser> {
    return this.usersService.updateProfile(caller, body);
  }
}
