import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Logger,
  NotFoundException,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { ChatService } from './chat.service';
import { CreateChatDto, createChatSchema } from './dto/create-chat.dto';
import { SessionNotFoundError } from './session/session.errors';

@Controller('chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly chatService: ChatService) {}

  @Post('/sessions')
  openSession() {
    return this.chatService.openSession();
  }

  @Get('/sessions/:sessionId/messages')
  getMessages(@Param('sessionId') sessionId: string) {
    return withSession(() => ({
      messages: this.chatService.getMessages(sessionId),
    }));
  }

  @Delete('/sessions/:sessionId')
  @HttpCode(204)
  closeSession(@Param('sessionId') sessionId: string) {
    withSession(() => this.chatService.closeSession(sessionId));
  }

  @Post('/sessions/:sessionId/messages')
  async sendChat(
    @Param('sessionId') sessionId: string,
    @Body() body: unknown,
    @Res() res: Response,
  ) {
    const parsed = createChatSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((i) => i.message));
    }
    const { prompt, stream }: CreateChatDto = parsed.data;

    if (!stream) {
      const answer = await withSessionAsync(() =>
        this.chatService.complete(sessionId, prompt),
      );
      res.status(201).json(answer);
      return;
    }

    // failures before the first fragment surface as a regular error response
    const readableStream = await withSessionAsync(() =>
      this.chatService.sendChat(sessionId, prompt),
    );
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    readableStream.on('error', (error) => {
      this.logger.error(`Chat stream failed: ${error.message}`, error.stack);
      res.end(`${JSON.stringify({ error: { message: error.message } })} \n\n`);
    });
    readableStream.pipe(res);
    // pipe stops reading when the client goes away; keep draining so the
    // answer still completes and is recorded
    res.on('close', () => {
      if (!readableStream.readableEnded) {
        readableStream.unpipe(res);
        readableStream.resume();
      }
    });
  }
}

function withSession<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toHttpError(error);
  }
}

async function withSessionAsync<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toHttpError(error);
  }
}

function toHttpError(error: unknown) {
  return error instanceof SessionNotFoundError
    ? new NotFoundException(error.message)
    : error;
}
