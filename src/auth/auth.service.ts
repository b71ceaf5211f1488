import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { PasswordService } from './password.service';
import { TokenService } from './token.service';
import { Role } from '../users/enums/role.enum';
import { USER_DIRECTORY, toPublicUser } from '../users/ports/user-directory.port';
import type {
  PublicUser,
  UserDirectoryPort,
} from '../users/ports/user-directory.port';
import type { LoginDto, RegisterDto } from './dto/auth.schemas';

export interface LoginResult {
  token: string;
  user: PublicUser;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(USER_DIRECTORY)
    private readonly userDirectory: UserDirectoryPort,
    private readonly passwordService: PasswordService,
    private readonly tokenService: TokenService,
  ) {}

  /**
   * Creates an account. Role defaults to client.
   *
   * @throws ConflictException if the email already has an account
   */
  async register(input: RegisterDto): Promise<PublicUser> {
    const existing = await this.userDirectory.findByEmail(input.email);

    if (existing) {
      throw new ConflictException('An account with this email already exists');
    }

    const passwordHash = await this.passwordService.hash(input.password);
    const user = await this.userDirectory.create({
      fullName: input.fullName,
      email: input.email,
      passwordHash,
      role: input.role ?? Role.CLIENT,
      phone: input.phone ?? null,
    });

    this.logger.log(`🆕 Registered user ${user.id} (${user.role})`);
    return toPublicUser(user);
  }

  /**
   * Unknown email and wrong password fail the same way, so the response
   * does not reveal which accounts exist.
   */
  async login(input: LoginDto): Promise<LoginResult> {
    const user = await this.userDirectory.findByEmail(input.email);

    const valid =
      user !== null &&
      (await this.passwordService.verify(input.password, user.passwordHash));

    if (!user || !valid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const token = this.tokenService.issue({ userId: user.id, role: user.role });

    return { token, user: toPublicUser(user) };
  }
}
