import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import { CHAT_COMPLETION } from './ports/chat-completion.port';
import type { ChatCompletionPort } from './ports/chat-completion.port';
import { assertAuthorized, Operation } from '../access/access-policy';
import type { Caller } from '../auth/types/caller.type';
import { extractErrorMessage } from '../common/utils/error.utils';

export const CHAT_CACHE_TTL_MS = 3600 * 1000;

export interface ChatReply {
  success: true;
  message: string;
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    @Inject(CHAT_COMPLETION)
    private readonly chatCompletion: ChatCompletionPort,
    @Inject(CACHE_MANAGER)
    private readonly cacheManager: Cache,
  ) {}

  /**
   * Price and service questions repeat a lot, so answers are cached for an
   * hour by normalized question.
   */
  async ask(caller: Caller, message: string): Promise<ChatReply> {
    assertAuthorized(caller, Operation.ASK_ASSISTANT);

    const cacheKey = `chat:${message.toLowerCase().trim()}`;
    const cached = await this.cacheManager.get<string>(cacheKey);

    if (cached) {
      this.logger.debug(`Cache hit for question "${message.slice(0, 30)}"`);
      return { success: true, message: cached };
    }

    let answer: string;

    try {
      answer = await this.chatCompletion.complete(message);
    } catch (error: unknown) {
      const err = error instanceof Error ? error : undefined;
      this.logger.error(
        `AI service call failed: ${extractErrorMessage(error)}`,
        err?.stack,
      );
      throw new InternalServerErrorException('AI service returned an error');
    }

    if (answer.trim().length === 0) {
      throw new InternalServerErrorException(
        'AI returned an empty or invalid response',
      );
    }

    await this.cacheManager.set(cacheKey, answer, CHAT_CACHE_TTL_MS);

    return { success: true, message: answer };
  }
}
