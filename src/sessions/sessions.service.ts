import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { AppConfigService } from '../config/app-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { WorldStateService } from '../engine/state/world-state.service.js';
import { TurnPipelineService } from '../engine/session/turn-pipeline.service.js';
import type { SimulationSession } from '../engine/session/simulation-session.js';
import { NotFoundError } from '../common/errors/game-errors.js';
import type { TurnReport } from '../types/index.js';
import type { SessionView } from './session-view.js';

/** 프로세스 메모리 세션 저장소: 영속화 없음. 상한 초과 시 종료된 세션부터 오래된 순으로 제거 */
@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);
  private readonly sessions = new Map<string, SimulationSession>();

  constructor(
    private readonly appConfig: AppConfigService,
    private readonly content: ContentLoaderService,
    private readonly rngService: RngService,
    private readonly worldState: WorldStateService,
    private readonly pipeline: TurnPipelineService,
  ) {}

  createSession(seed?: string): SessionView {
    const session = this.pipeline.createSession({
      id: randomUUID(),
      config: this.content.getConfig(),
      catalog: this.content.getCatalog(),
      rng: this.rngService.create(seed),
    });
    this.sessions.set(session.id, session);
    this.logger.log(`Session ${session.id} started (seed=${session.rng.seed})`);
    this.evictOverflow();
    return this.toView(session);
  }

  removeSession(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    this.logger.log(`Session ${sessionId} removed`);
  }

  getSession(sessionId: string): SessionView {
    return this.toView(this.find(sessionId));
  }

  getHistory(sessionId: string): TurnReport[] {
    return [...this.find(sessionId).history];
  }

  submitEventChoice(sessionId: string, choiceIndex: number): SessionView {
    const session = this.find(sessionId);
    this.pipeline.resolveEventChoice(session, choiceIndex);
    return this.toView(session);
  }

  submitAction(sessionId: string, actionIndex: number | null): SessionView {
    const session = this.find(sessionId);
    this.pipeline.chooseAction(session, actionIndex);
    return this.toView(session);
  }

  private evictOverflow(): void {
    while (this.sessions.size > this.appConfig.maxSessions) {
      // Map은 삽입 순서: 첫 ENDED 세션, 없으면 가장 오래된 세션
      let victim: string | undefined;
      for (const [id, s] of this.sessions) {
        if (s.phase === 'ENDED') {
          victim = id;
          break;
        }
      }
      victim ??= this.sessions.keys().next().value;
      if (victim === undefined) return;
      this.sessions.delete(victim);
      this.logger.log(`Session ${victim} evicted (limit ${this.appConfig.maxSessions})`);
    }
  }

  private find(sessionId: string): SimulationSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    return session;
  }

  private toView(session: SimulationSession): SessionView {
    const names = session.config.generationNames;
    const event = session.pendingEvent;
    return {
      sessionId: session.id,
      seed: session.rng.seed,
      rngCursor: session.rng.cursor,
      phase: session.phase,
      outcome: session.phase === 'ENDED' ? session.outcome : null,
      generation: session.generation,
      generationName:
        session.generation > 0
          ? names[(session.generation - 1) % names.length] ?? null
          : null,
      state: this.worldState.snapshot(session.state),
      pendingEvent: event
        ? {
            id: event.id,
            name: event.name,
            text: event.text,
            choices: event.choices.map((c) => c.text),
          }
        : null,
      offeredActions: session.offeredActions.map((a, index) => ({
        index,
        id: a.id,
        name: a.name,
        description: a.description,
        category: a.category,
        cost: a.cost,
      })),
      lastTurn: session.history.at(-1) ?? null,
    };
  }
}
