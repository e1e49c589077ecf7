import { Injectable } from '@nestjs/common';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { messageContentToText } from '../utils/message-content';

/** Direct completion against the local language model, no document grounding. */
@Injectable()
export class GenerationService {
  constructor(private readonly chatModel: BaseChatModel) {}

  async *completeStream(prompt: string): AsyncGenerator<string> {
    const response = await this.chatModel.stream(prompt);
    for await (const chunk of response) {
      const delta = messageContentToText(chunk.content);
      if (delta) yield delta;
    }
  }
}
