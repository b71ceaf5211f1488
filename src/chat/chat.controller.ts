import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { z } from 'zod';
import { ChatService } from './chat.service';
import type { ChatReply } from './chat.service';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { Caller } from '../auth/types/caller.type';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';

const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Message cannot be empty').max(2000),
});

type ChatRequestDto = z.infer<typeof chatRequestSchema>;

@Controller('api/chat')
@UseGuards(JwtAuthGuard)
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  ask(
    @CurrentUser() caller: Caller,
    @Body(new ZodValidationPipe(chatRequestSchema)) body: ChatRequestDto,
  ): Promise<ChatReply> {
    return this.chatService.ask(caller, body.message);
  }
}
