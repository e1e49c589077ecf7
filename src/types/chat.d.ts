export interface UserTurn {
  role: 'user';
  content: string;
}

export interface AssistantTurn {
  role: 'assistant';
  content: string;
  /** seconds, rounded to two decimals */
  elapsedTime: number;
}

export type ChatTurn = UserTurn | AssistantTurn;

export interface UploadedDocument {
  filename: string;
  bytes: Buffer;
  mimeType?: string;
}

export interface SaveAcknowledgement {
  filename: string;
  path: string;
  size: number;
  message: string;
}

/** Which service answers a prompt; decided per call from the document store. */
export type RouteMode =
  | { kind: 'direct' }
  | { kind: 'retrieval'; corpusDir: string };

export type ChatEvent =
  | { type: 'fragment'; content: string }
  | { type: 'done'; mode: RouteMode['kind']; turn: AssistantTurn };
