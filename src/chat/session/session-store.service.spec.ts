import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SessionStoreService } from './session-store.service';
import { SessionNotFoundError } from './session.errors';
import { createTestConfig } from '../../testing/test-config';

describe('SessionStoreService', () => {
  let service: SessionStoreService;

  const compile = async (overrides: Record<string, unknown> = {}) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SessionStoreService,
        { provide: ConfigService, useValue: createTestConfig(overrides) },
      ],
    }).compile();

    return module.get<SessionStoreService>(SessionStoreService);
  };

  beforeEach(async () => {
    service = await compile();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should open sessions seeded with the default greeting', () => {
    const session = service.open();
    expect(session.renderAll()).toEqual([
      { role: 'assistant', content: 'How can I help you?', elapsedTime: 0 },
    ]);
  });

  it('should seed nothing when the greeting is empty', async () => {
    service = await compile({ CHAT_GREETING: '' });
    expect(service.open().renderAll()).toEqual([]);
  });

  it('should keep sessions isolated', () => {
    const first = service.open();
    const second = service.open();
    first.appendUser('only in the first');

    expect(first.id).not.toEqual(second.id);
    expect(service.get(second.id).renderAll()).toHaveLength(1);
    expect(service.get(first.id).renderAll()).toHaveLength(2);
  });

  it('should discard closed sessions', () => {
    const session = service.open();
    service.close(session.id);
    expect(() => service.get(session.id)).toThrow(SessionNotFoundError);
  });

  describe('idle expiry', () => {
    let now: jest.SpyInstance<number, []>;

    beforeEach(async () => {
      now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
      service = await compile({ SESSION_IDLE_TTL_MS: 60_000 });
    });

    afterEach(() => {
      now.mockRestore();
    });

    it('should discard sessions idle for longer than the ttl', () => {
      const session = service.open();
      now.mockReturnValue(1_060_001);
      expect(() => service.get(session.id)).toThrow(SessionNotFoundError);
    });

    it('should keep sessions that stay active', () => {
      const session = service.open();
      now.mockReturnValue(1_050_000);
      service.get(session.id);
      now.mockReturnValue(1_100_000);
      expect(service.get(session.id)).toBe(session);
    });

    it('should sweep idle sessions when another one opens', () => {
      const idle = service.open();
      now.mockReturnValue(1_060_001);
      service.open();
      now.mockReturnValue(1_060_002);
      expect(() => service.close(idle.id)).toThrow(SessionNotFoundError);
    });
  });

  it('should reject unknown session ids', () => {
    expect(() => service.get('missing')).toThrow(
      'Chat session missing not found',
    );
    expect(() => service.close('missing')).toThrow(SessionNotFoundError);
  });
});
