import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'stream';
import type { AssistantTurn, ChatEvent, RouteMode } from '../types/chat';
import { ChatRouterService } from './chat-router.service';
import { SessionStoreService } from './session/session-store.service';

const toSeconds = (ms: number) => Math.round(ms / 10) / 100;

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly sessionStore: SessionStoreService,
    private readonly router: ChatRouterService,
  ) {}

  openSession() {
    const session = this.sessionStore.open();
    return { sessionId: session.id, messages: session.renderAll() };
  }

  getMessages(sessionId: string) {
    return this.sessionStore.get(sessionId).renderAll();
  }

  closeSession(sessionId: string) {
    this.sessionStore.close(sessionId);
  }

  /**
   * Records the prompt, streams the routed answer fragment by fragment and
   * records the assembled answer with its latency once the stream ends.
   * A failing stream leaves the user turn without an answer.
   */
  async *converse(sessionId: string, prompt: string): AsyncGenerator<ChatEvent> {
    const session = this.sessionStore.get(sessionId);
    session.appendUser(prompt);

    const startTime = performance.now();
    const fragments = this.router.route(prompt);
    let content = '';
    let step = await fragments.next();
    while (!step.done) {
      content += step.value;
      yield { type: 'fragment', content: step.value };
      step = await fragments.next();
    }
    const mode = step.value;
    const elapsedTime = toSeconds(performance.now() - startTime);

    const turn = session.appendAssistant(content, elapsedTime);
    this.logger.log(
      `Session ${sessionId}: ${mode.kind} answer in ${elapsedTime}s`,
    );
    yield { type: 'done', mode: mode.kind, turn };
  }

  /** Drains the conversation stream and returns the recorded answer. */
  async complete(
    sessionId: string,
    prompt: string,
  ): Promise<{ mode: RouteMode['kind']; turn: AssistantTurn }> {
    for await (const event of this.converse(sessionId, prompt)) {
      if (event.type === 'done') {
        return { mode: event.mode, turn: event.turn };
      }
    }
    throw new Error('Chat stream ended without an answer');
  }

  /**
   * Frames each event as one JSON line for the event-stream response. The
   * first event is awaited before the stream is handed out, so a failure
   * ahead of the first fragment rejects here instead of inside the stream.
   */
  async sendChat(sessionId: string, prompt: string) {
    this.sessionStore.get(sessionId);
    const frames = toFrames(this.converse(sessionId, prompt));
    const first = await frames.next();
    return Readable.from(
      (async function* () {
        if (first.done) return;
        yield first.value;
        yield* frames;
      })(),
    );
  }
}

async function* toFrames(events: AsyncIterable<ChatEvent>) {
  for await (const event of events) {
    const frame =
      event.type === 'fragment'
        ? { message: { role: 'assistant', content: event.content } }
        : { done: true, mode: event.mode, turn: event.turn };
    yield `${JSON.stringify(frame)} \n\n`;
  }
}
