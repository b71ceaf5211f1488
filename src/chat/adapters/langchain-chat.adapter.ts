import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { PromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { ChatCompletionPort } from '../ports/chat-completion.port';
import {
  CLINIC_ASSISTANT_TEMPLATE,
  CLINIC_SERVICES,
  formatServiceCatalog,
} from '../clinic-assistant.prompt';

/**
 * Adapter: answers through an OpenAI-compatible endpoint (OpenRouter), so
 * the model can be swapped with CHAT_MODEL alone.
 */
@Injectable()
export class LangchainChatAdapter implements ChatCompletionPort {
  private readonly logger = new Logger(LangchainChatAdapter.name);
  private readonly chatModel: ChatOpenAI;
  private readonly clinicName: string;

  private readonly LLM_TIMEOUT_MS = 30_000;
  private readonly LLM_MAX_RETRIES = 2;

  constructor(private readonly configService: ConfigService) {
    const model =
      this.configService.get<string>('CHAT_MODEL') ?? 'google/gemini-flash-1.5';
    const apiKey = this.configService.get<string>('OPENROUTER_API_KEY');
    this.clinicName =
      this.configService.get<string>('CLINIC_NAME') ?? 'the clinic';

    if (!apiKey) {
      this.logger.error(
        'OPENROUTER_API_KEY is not configured; chat requests will fail',
      );
    }

    this.chatModel = new ChatOpenAI({
      apiKey,
      model,
      temperature: 0.3,
      maxTokens: 300,
      timeout: this.LLM_TIMEOUT_MS,
      maxRetries: this.LLM_MAX_RETRIES,
      configuration: {
        baseURL: 'https://openrouter.ai/api/v1',
      },
    });

    this.logger.log(
      `Chat model: ${model} (timeout=${this.LLM_TIMEOUT_MS}ms, retries=${this.LLM_MAX_RETRIES})`,
    );
  }

  async complete(question: string): Promise<string> {
    const chain = PromptTemplate.fromTemplate(CLINIC_ASSISTANT_TEMPLATE)
      .pipe(this.chatModel)
      .pipe(new StringOutputParser());

    return chain.invoke({
      clinicName: this.clinicName,
      services: formatServiceCatalog(CLINIC_SERVICES),
      question,
    });
  }
}
