import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import type { Env } from '../../config/env.validation';
import { ChatSession } from './chat-session';
import { SessionNotFoundError } from './session.errors';

interface SessionEntry {
  session: ChatSession;
  lastActive: number;
}

/**
 * Owns one chat session per id. A session ends when the client closes it or
 * after it has been idle for the configured time; idle sessions are swept
 * whenever a session is opened or looked up.
 */
@Injectable()
export class SessionStoreService {
  private readonly logger = new Logger(SessionStoreService.name);
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly greeting: string;
  private readonly idleTtlMs: number;

  constructor(configService: ConfigService<Env, true>) {
    this.greeting = configService.get('CHAT_GREETING', { infer: true });
    this.idleTtlMs = configService.get('SESSION_IDLE_TTL_MS', { infer: true });
  }

  open(): ChatSession {
    const now = Date.now();
    this.evictIdle(now);
    const session = new ChatSession(uuidv4(), this.greeting);
    session.initialize();
    this.sessions.set(session.id, { session, lastActive: now });
    this.logger.log(`Opened session ${session.id}`);
    return session;
  }

  get(sessionId: string): ChatSession {
    const now = Date.now();
    this.evictIdle(now);
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }
    entry.lastActive = now;
    return entry.session;
  }

  close(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    this.logger.log(`Closed session ${sessionId}`);
  }

  private evictIdle(now: number) {
    for (const [id, entry] of this.sessions) {
      if (now - entry.lastActive > this.idleTtlMs) {
        this.sessions.delete(id);
        this.logger.log(`Expired idle session ${id}`);
      }
    }
  }
}
