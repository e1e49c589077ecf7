import { Test, TestingModule } from '@nestjs/testing';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { GenerationService } from './generation.service';

const collect = async (fragments: AsyncIterable<string>) => {
  const out: string[] = [];
  for await (const fragment of fragments) out.push(fragment);
  return out;
};

describe('GenerationService', () => {
  let service: GenerationService;
  let chatModel: FakeListChatModel;

  beforeEach(async () => {
    chatModel = new FakeListChatModel({ responses: ['Hi there'] });
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GenerationService,
        { provide: BaseChatModel, useValue: chatModel },
      ],
    }).compile();

    service = module.get<GenerationService>(GenerationService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should stream the completion as text fragments', async () => {
    const fragments = await collect(service.completeStream('Hello'));
    expect(fragments.join('')).toBe('Hi there');
    expect(fragments.length).toBeGreaterThan(1);
  });

  it('should pass the raw prompt to the model', async () => {
    const streamSpy = jest.spyOn(chatModel, 'stream');
    await collect(service.completeStream('  Hello  '));
    expect(streamSpy).toHaveBeenCalledWith('  Hello  ');
  });

  it('should not start the model until the stream is consumed', () => {
    const streamSpy = jest.spyOn(chatModel, 'stream');
    service.completeStream('Hello');
    expect(streamSpy).not.toHaveBeenCalled();
  });

  it('should propagate model failures', async () => {
    jest.spyOn(chatModel, 'stream').mockRejectedValue(new Error('connection refused'));
    await expect(collect(service.completeStream('Hello'))).rejects.toThrow(
      'connection refused',
    );
  });
});
