import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { UserAdapter } from './user.adapter';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';
import { USER_DIRECTORY } from './ports/user-directory.port';
import { SessionModule } from '../auth/session.module';

@Module({
  imports: [TypeOrmModule.forFeature([User]), SessionModule],
  controllers: [UsersController],
  providers: [
    UsersService,
    {
      provide: USER_DIRECTORY,
      useClass: UserAdapter,
    },
  ],
  exports: [USER_DIRECTORY],
})
export class UsersModule {}
