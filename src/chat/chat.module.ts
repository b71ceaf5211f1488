import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { LangchainChatAdapter } from './adapters/langchain-chat.adapter';
import { CHAT_COMPLETION } from './ports/chat-completion.port';
import { SessionModule } from '../auth/session.module';

@Module({
  imports: [ConfigModule, SessionModule],
  controllers: [ChatController],
  providers: [
    ChatService,
    {
      provide: CHAT_COMPLETION,
      useClass: LangchainChatAdapter,
    },
  ],
})
export class ChatModule {}
