/**
 * Output port: answers one visitor question. The domain does not know
 * which model or provider sits behind it.
 */
export interface ChatCompletionPort {
  complete(question: string): Promise<string>;
}

export const CHAT_COMPLETION = Symbol('CHAT_COMPLETION');
