// 턴 파이프라인
// 1. 이벤트 추첨 → 효과 적용 (interactive면 선택 대기)
// 2. 세대 길이만큼 연간 드리프트
// 3. 액션 제시 → 선택 대기
// 4. 액션 적용 → 종료 판정 → 다음 턴

import { Injectable, Logger } from '@nestjs/common';
import type {
  Catalog,
  EndingOutcome,
  EventRecord,
  SessionPhase,
  SimulationConfig,
  TerminalOutcome,
  TurnReport,
} from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { WorldStateService } from '../state/world-state.service.js';
import { EffectEngineService } from '../effects/effect-engine.service.js';
import { EligibilityService } from '../eligibility/eligibility.service.js';
import { DriftService } from '../drift/drift.service.js';
import {
  EndingService,
  assertKnownOutcome,
  isTerminal,
} from '../ending/ending.service.js';
import {
  IneligibleSelectionError,
  PhaseMismatchError,
} from '../../common/errors/game-errors.js';
import type { SimulationSession, TurnDraft } from './simulation-session.js';

export interface CreateSessionInput {
  id: string;
  config: SimulationConfig;
  catalog: Catalog;
  rng: Rng;
}

@Injectable()
export class TurnPipelineService {
  private readonly logger = new Logger(TurnPipelineService.name);

  constructor(
    private readonly worldState: WorldStateService,
    private readonly effects: EffectEngineService,
    private readonly eligibility: EligibilityService,
    private readonly drift: DriftService,
    private readonly ending: EndingService,
  ) {}

  /** 세션 생성 + 첫 턴 시작. 시작 상태가 이미 종료 조건이면 바로 ENDED */
  createSession(input: CreateSessionInput): SimulationSession {
    const session: SimulationSession = {
      id: input.id,
      rng: input.rng,
      config: input.config,
      catalog: input.catalog,
      state: this.worldState.createInitialState(input.config),
      phase: 'AWAITING_ACTION',
      outcome: 'running',
      generation: 0,
      pendingEvent: null,
      offeredActions: [],
      draft: null,
      history: [],
    };

    const outcome = this.evaluate(session);
    if (isTerminal(outcome)) {
      this.end(session, outcome);
    } else {
      this.beginTurn(session);
    }
    return session;
  }

  /** interactive 이벤트의 선택지 적용 */
  resolveEventChoice(session: SimulationSession, choiceIndex: number): void {
    this.assertPhase(session, 'AWAITING_EVENT_CHOICE');
    const event = session.pendingEvent;
    const draft = session.draft;
    if (!event || !draft) {
      throw new PhaseMismatchError('No pending event', { sessionId: session.id });
    }

    const choice = Number.isInteger(choiceIndex) ? event.choices[choiceIndex] : undefined;
    if (!choice) {
      throw new IneligibleSelectionError(`Choice index out of range: ${choiceIndex}`, {
        eventId: event.id,
        choiceCount: event.choices.length,
      });
    }

    this.effects.applyEffects(session.state, choice.effects);
    session.state.lastEvent = event.name;
    session.state.lastEventChoice = choice.text;
    draft.event = {
      eventId: event.id,
      name: event.name,
      kind: event.kind,
      choiceIndex,
      choiceText: choice.text,
      effects: { ...choice.effects },
    };
    session.pendingEvent = null;

    this.runGenerationDrift(session, draft);
    this.offerActions(session);
  }

  /** 액션 선택. null = 현상 유지 */
  chooseAction(session: SimulationSession, actionIndex: number | null): void {
    this.assertPhase(session, 'AWAITING_ACTION');
    const draft = session.draft;
    if (!draft) {
      throw new PhaseMismatchError('No turn in progress', { sessionId: session.id });
    }

    let actionSummary: TurnReport['action'] = null;
    if (actionIndex !== null) {
      const action = Number.isInteger(actionIndex)
        ? session.offeredActions[actionIndex]
        : undefined;
      if (!action) {
        throw new IneligibleSelectionError(`Action index out of range: ${actionIndex}`, {
          offeredCount: session.offeredActions.length,
        });
      }

      const state = session.state;
      this.effects.applyActionCost(state, action.cost);
      this.effects.applyEffects(state, action.effects);
      if (!action.repeatable) {
        this.worldState.markActionUsed(state, action.id);
      }
      state.lastAction = action.name;
      state.lastActionEffects = { ...action.effects };
      actionSummary = {
        actionId: action.id,
        name: action.name,
        cost: action.cost,
        effects: { ...action.effects },
      };
    } else {
      session.state.lastAction = null;
      session.state.lastActionEffects = null;
    }
    session.offeredActions = [];

    this.finishTurn(session, draft, actionSummary);
  }

  private beginTurn(session: SimulationSession): void {
    session.generation += 1;
    const names = session.config.generationNames;
    const draft: TurnDraft = {
      generation: session.generation,
      generationName: names[(session.generation - 1) % names.length] ?? '',
      fromTick: session.state.tick,
      event: null,
      years: [],
    };
    session.draft = draft;

    const event = this.eligibility.pickEvent(
      session.catalog.events,
      session.state.tick,
      session.rng,
    );

    if (event?.kind === 'interactive') {
      session.pendingEvent = event;
      session.phase = 'AWAITING_EVENT_CHOICE';
      this.logger.debug(
        `[${session.id}] gen ${draft.generation}: awaiting choice for ${event.id}`,
      );
      return;
    }

    if (event) {
      this.applyAutomaticEvent(session, draft, event);
    }
    this.runGenerationDrift(session, draft);
    this.offerActions(session);
  }

  private applyAutomaticEvent(
    session: SimulationSession,
    draft: TurnDraft,
    event: EventRecord,
  ): void {
    this.effects.applyEffects(session.state, event.effects);
    session.state.lastEvent = event.name;
    session.state.lastEventChoice = null;
    draft.event = {
      eventId: event.id,
      name: event.name,
      kind: event.kind,
      choiceIndex: null,
      choiceText: null,
      effects: { ...event.effects },
    };
  }

  private runGenerationDrift(session: SimulationSession, draft: TurnDraft): void {
    const { state, config } = session;
    for (let year = 0; year < config.generationLength; year++) {
      const drift = this.drift.applyYearlyDrift(state, config);
      this.worldState.advanceTick(state);
      draft.years.push({
        tick: state.tick,
        pollution: state.pollution,
        vitality: state.vitality,
        trust: state.trust,
        treasury: state.treasury,
        drift,
      });
    }
  }

  private offerActions(session: SimulationSession): void {
    session.offeredActions = this.eligibility.availableActions(
      session.catalog.actions,
      session.state,
      session.rng,
    );
    session.phase = 'AWAITING_ACTION';
  }

  private finishTurn(
    session: SimulationSession,
    draft: TurnDraft,
    action: TurnReport['action'],
  ): void {
    this.worldState.assertInvariants(session.state);
    const outcome = this.evaluate(session);

    const report: TurnReport = {
      generation: draft.generation,
      generationName: draft.generationName,
      fromTick: draft.fromTick,
      toTick: session.state.tick,
      event: draft.event,
      years: draft.years,
      action,
      outcome,
      state: this.worldState.snapshot(session.state),
    };
    session.history.push(report);
    session.draft = null;

    this.logger.debug(
      `[${session.id}] gen ${report.generation} done: tick=${report.toTick} ` +
        `event=${report.event?.eventId ?? '-'} action=${action?.actionId ?? 'hold'} outcome=${outcome}`,
    );

    if (isTerminal(outcome)) {
      this.end(session, outcome);
    } else {
      this.beginTurn(session);
    }
  }

  private evaluate(session: SimulationSession): EndingOutcome {
    return assertKnownOutcome(this.ending.checkEnding(session.state, session.config));
  }

  private end(session: SimulationSession, outcome: TerminalOutcome): void {
    session.phase = 'ENDED';
    session.outcome = outcome;
    session.pendingEvent = null;
    session.offeredActions = [];
    this.logger.log(`[${session.id}] ended: ${outcome} at tick ${session.state.tick}`);
  }

  private assertPhase(session: SimulationSession, expected: SessionPhase): void {
    if (session.phase !== expected) {
      throw new PhaseMismatchError(`Expected phase ${expected}, got ${session.phase}`, {
        sessionId: session.id,
        phase: session.phase,
      });
    }
  }
}
