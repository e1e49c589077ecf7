import type { AssistantTurn, ChatTurn, UserTurn } from '../../types/chat';

/**
 * Append-only turn log of one chat session. Turns are frozen on append and
 * never edited or removed while the session lives.
 */
export class ChatSession {
  private turns: ChatTurn[] | undefined;

  constructor(
    readonly id: string,
    private readonly greeting?: string,
  ) {}

  /** Creates the log on first call, seeded with the greeting if there is one. */
  initialize(): void {
    if (this.turns) return;
    this.turns = this.greeting
      ? [Object.freeze({ role: 'assistant', content: this.greeting, elapsedTime: 0 })]
      : [];
  }

  appendUser(content: string): UserTurn {
    const turn: UserTurn = Object.freeze({ role: 'user', content });
    this.log().push(turn);
    return turn;
  }

  appendAssistant(content: string, elapsedTime: number): AssistantTurn {
    const turn: AssistantTurn = Object.freeze({
      role: 'assistant',
      content,
      elapsedTime,
    });
    this.log().push(turn);
    return turn;
  }

  renderAll(): readonly ChatTurn[] {
    return [...this.log()];
  }

  private log(): ChatTurn[] {
    this.initialize();
    return this.turns ?? [];
  }
}
