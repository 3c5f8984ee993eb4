import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { SessionsService } from './sessions.service.js';
import {
  CreateSessionBodySchema,
  type CreateSessionBody,
} from './dto/create-session.dto.js';
import {
  ActionBodySchema,
  EventChoiceBodySchema,
  type ActionBody,
  type EventChoiceBody,
} from './dto/submit-choice.dto.js';

@Controller('v1/sessions')
export class SessionsController {
  constructor(private readonly sessionsService: SessionsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createSession(
    @Body(new ZodValidationPipe(CreateSessionBodySchema)) body: CreateSessionBody,
  ) {
    return this.sessionsService.createSession(body.seed);
  }

  @Get(':sessionId')
  getSession(@Param('sessionId') sessionId: string) {
    return this.sessionsService.getSession(sessionId);
  }

  @Get(':sessionId/history')
  getHistory(@Param('sessionId') sessionId: string) {
    return this.sessionsService.getHistory(sessionId);
  }

  @Post(':sessionId/event-choice')
  @HttpCode(HttpStatus.OK)
  submitEventChoice(
    @Param('sessionId') sessionId: string,
    @Body(new ZodValidationPipe(EventChoiceBodySchema)) body: EventChoiceBody,
  ) {
    return this.sessionsService.submitEventChoice(sessionId, body.choiceIndex);
  }

  @Post(':sessionId/action')
  @HttpCode(HttpStatus.OK)
  submitAction(
    @Param('sessionId') sessionId: string,
    @Body(new ZodValidationPipe(ActionBodySchema)) body: ActionBody,
  ) {
    return this.sessionsService.submitAction(sessionId, body.actionIndex);
  }

  @Delete(':sessionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  removeSession(@Param('sessionId') sessionId: string): void {
    this.sessionsService.removeSession(sessionId);
  }
}
