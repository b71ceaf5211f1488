import { Injectable } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';

/** bcrypt cost factor; fixed so every stored hash has the same work factor. */
export const PASSWORD_HASH_ROUNDS = 12;

@Injectable()
export class PasswordService {
  hash(password: string): Promise<string> {
    return bcrypt.hash(password, PASSWORD_HASH_ROUNDS);
  }

  verify(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }
}
