import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { assertAuthorized, Operation } from '../access/access-policy';
import type { Caller } from '../auth/types/caller.type';
import { USER_DIRECTORY, toPublicUser } from './ports/user-directory.port';
import type {
  PublicUser,
  UserDirectoryPort,
} from './ports/user-directory.port';
import type { UpdateProfileDto } from './dto/user.schemas';

/**
 * Profile management. Always acts on the caller's own identity from the
 * session; appointment snapshots of the patient name are left as booked.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(USER_DIRECTORY)
    private readonly userDirectory: UserDirectoryPort,
  ) {}

  async getProfile(caller: Caller): Promise<PublicUser> {
    assertAuthorized(caller, Operation.VIEW_PROFILE);

    const user = await this.userDirectory.findById(caller.userId);

    if (!user) {
      throw new NotFoundException('User not found');
    }

    return toPublicUser(user);
  }

  async updateProfile(
    caller: Caller,
    changes: UpdateProfileDto,
  ): Promise<PublicUser> {
    assertAuthorized(caller, Operation.UPDATE_PROFILE);

    const fullName = changes.fullName?.trim();

    if (!fullName) {
      throw new BadRequestException('No update fields provided');
    }

    const updated = await this.userDirectory.updateFullName(
      caller.userId,
      fullName,
    );

    if (!updated) {
      throw new NotFoundException('User not found');
    }

    this.logger.log(`Profile updated for user ${caller.userId}`);
    return toPublicUser(updated);
  }
}
