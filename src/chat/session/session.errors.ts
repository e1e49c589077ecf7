export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Chat session ${sessionId} not found`);
    this.name = SessionNotFoundError.name;
  }
}
