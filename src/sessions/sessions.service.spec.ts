import { join } from 'path';
import { SessionsService } from './sessions.service.js';
import { SessionsController } from './sessions.controller.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { AppConfigService } from '../config/app-config.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { WorldStateService } from '../engine/state/world-state.service.js';
import { EffectEngineService } from '../engine/effects/effect-engine.service.js';
import { EligibilityService } from '../engine/eligibility/eligibility.service.js';
import { DriftService } from '../engine/drift/drift.service.js';
import { EndingService } from '../engine/ending/ending.service.js';
import { TurnPipelineService } from '../engine/session/turn-pipeline.service.js';
import {
  IneligibleSelectionError,
  NotFoundError,
  PhaseMismatchError,
} from '../common/errors/game-errors.js';
import type { SessionView } from './session-view.js';

const SHIPPED_DIR = join(__dirname, '..', '..', 'content', 'tidewarden');

function buildService(content: ContentLoaderService, appConfig: AppConfigService): SessionsService {
  const worldState = new WorldStateService();
  return new SessionsService(
    appConfig,
    content,
    new RngService(),
    worldState,
    new TurnPipelineService(
      worldState,
      new EffectEngineService(),
      new EligibilityService(),
      new DriftService(),
      new EndingService(),
    ),
  );
}

/** MAX_SESSIONS를 잠시 바꿔 설정 생성 */
function configWithLimit(limit: number): AppConfigService {
  const prev = process.env.MAX_SESSIONS;
  process.env.MAX_SESSIONS = String(limit);
  try {
    return new AppConfigService();
  } finally {
    if (prev === undefined) delete process.env.MAX_SESSIONS;
    else process.env.MAX_SESSIONS = prev;
  }
}

describe('SessionsService', () => {
  let content: ContentLoaderService;
  let service: SessionsService;

  beforeAll(async () => {
    content = new ContentLoaderService(new AppConfigService());
    await content.load(SHIPPED_DIR);
  });

  beforeEach(() => {
    service = buildService(content, new AppConfigService());
  });

  /** 결정적 진행: 이벤트는 첫 선택지, 액션은 첫 번째 (없으면 현상 유지) */
  const advance = (view: SessionView): SessionView => {
    if (view.phase === 'AWAITING_EVENT_CHOICE') {
      return service.submitEventChoice(view.sessionId, 0);
    }
    return service.submitAction(
      view.sessionId,
      view.offeredActions.length > 0 ? 0 : null,
    );
  };

  describe('createSession', () => {
    it('첫 세대: tick 0에는 automatic 이벤트만 있어 바로 액션 단계', () => {
      const view = service.createSession('seed-a');
      expect(view.seed).toBe('seed-a');
      expect(view.phase).toBe('AWAITING_ACTION');
      expect(view.outcome).toBeNull();
      expect(view.generation).toBe(1);
      expect(view.generationName).toBe('The Shallow Tide');
      expect(view.state.tick).toBe(5);
      expect(view.pendingEvent).toBeNull();
      expect(view.lastTurn).toBeNull();
    });

    it('적격 액션이 7개여도 제시는 5개, index 0~4', () => {
      const view = service.createSession('seed-a');
      expect(view.offeredActions.map((a) => a.index)).toEqual([0, 1, 2, 3, 4]);
      expect(new Set(view.offeredActions.map((a) => a.id)).size).toBe(5);
    });

    it('seed 생략 시 UUID seed', () => {
      const view = service.createSession();
      expect(view.seed).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('같은 seed → 세션 id 외에는 동일', () => {
      const a = service.createSession('same-seed');
      const b = service.createSession('same-seed');
      expect({ ...a, sessionId: '' }).toEqual({ ...b, sessionId: '' });
    });
  });

  describe('명령 처리', () => {
    it('없는 세션 → NotFoundError', () => {
      expect(() => service.getSession('nope')).toThrow(NotFoundError);
      expect(() => service.submitAction('nope', null)).toThrow(NotFoundError);
    });

    it('범위 밖 액션 → IneligibleSelectionError, 세션 유지', () => {
      const view = service.createSession('seed-b');
      expect(() => service.submitAction(view.sessionId, 99)).toThrow(IneligibleSelectionError);
      expect(service.getSession(view.sessionId)).toEqual(view);
    });

    it('액션 단계에서 이벤트 선택 → PhaseMismatchError', () => {
      const view = service.createSession('seed-c');
      expect(() => service.submitEventChoice(view.sessionId, 0)).toThrow(PhaseMismatchError);
    });

    it('현상 유지 → 다음 세대, 이력 1건', () => {
      const view = service.createSession('seed-d');
      const next = service.submitAction(view.sessionId, null);
      expect(next.lastTurn?.generation).toBe(1);
      expect(next.lastTurn?.action).toBeNull();
      expect(next.lastTurn?.toTick).toBe(5);
      expect(next.generation).toBe(2);
      expect(next.generationName).toBe('The Kelp Dawn');
      expect(service.getHistory(view.sessionId)).toHaveLength(1);
    });

    it('액션 선택 → 비반복 액션은 usedActionIds에 기록', () => {
      const view = service.createSession('seed-e');
      const picked = view.offeredActions[0];
      const next = service.submitAction(view.sessionId, 0);
      expect(next.lastTurn?.action?.actionId).toBe(picked.id);
      const repeatable = content.getCatalog().actions.find((a) => a.id === picked.id)?.repeatable;
      expect(next.state.usedActionIds.includes(picked.id)).toBe(!repeatable);
    });
  });

  describe('세션 정리', () => {
    it('제거한 세션은 NotFoundError', () => {
      const view = service.createSession('to-remove');
      service.removeSession(view.sessionId);
      expect(() => service.getSession(view.sessionId)).toThrow(NotFoundError);
      expect(() => service.submitAction(view.sessionId, null)).toThrow(NotFoundError);
    });

    it('없는 세션 제거 → NotFoundError', () => {
      expect(() => service.removeSession('nope')).toThrow(NotFoundError);
    });

    it('상한 초과 시 가장 오래된 세션부터 제거', () => {
      const limited = buildService(content, configWithLimit(2));
      const first = limited.createSession('limit-1');
      const second = limited.createSession('limit-2');
      const third = limited.createSession('limit-3');

      expect(() => limited.getSession(first.sessionId)).toThrow(NotFoundError);
      expect(limited.getSession(second.sessionId).seed).toBe('limit-2');
      expect(limited.getSession(third.sessionId).seed).toBe('limit-3');
    });

    it('view의 rngCursor는 세션 RNG 소비량', () => {
      const view = service.createSession('cursor');
      // 첫 턴: 이벤트 1회 + 적격 액션 7개 중 5개 표본 5회
      expect(view.rngCursor).toBe(6);
      const next = service.submitAction(view.sessionId, null);
      expect(next.rngCursor).toBeGreaterThan(view.rngCursor);
    });
  });

  describe('전체 런', () => {
    it('종료 또는 40세대까지: 매 세대 불변식 유지', () => {
      let view = service.createSession('full-run');
      for (let i = 0; i < 40 && view.phase !== 'ENDED'; i++) {
        view = advance(view);
        const s = view.state;
        for (const v of [s.pollution, s.vitality, s.trust]) {
          expect(v).toBeGreaterThanOrEqual(0);
          expect(v).toBeLessThanOrEqual(100);
        }
        expect(s.treasury).toBeGreaterThanOrEqual(0);
        expect(s.incomeBase).toBeGreaterThanOrEqual(0);
        expect(view.offeredActions.length).toBeLessThanOrEqual(5);
      }

      const history = service.getHistory(view.sessionId);
      history.forEach((turn, i) => {
        expect(turn.generation).toBe(i + 1);
        expect(turn.years).toHaveLength(5);
        expect(turn.toTick - turn.fromTick).toBe(5);
      });
      if (view.phase === 'ENDED') {
        expect(view.outcome).not.toBe('running');
        expect(history.at(-1)?.outcome).toBe(view.outcome);
      }
    });

    it('같은 seed + 같은 명령 → 같은 이력', () => {
      const play = (): string => {
        let view = service.createSession('replay');
        for (let i = 0; i < 15 && view.phase !== 'ENDED'; i++) view = advance(view);
        return JSON.stringify(service.getHistory(view.sessionId));
      };
      expect(play()).toEqual(play());
    });
  });
});

describe('SessionsController', () => {
  it('서비스에 위임', async () => {
    const content = new ContentLoaderService(new AppConfigService());
    await content.load(SHIPPED_DIR);
    const controller = new SessionsController(buildService(content, new AppConfigService()));

    const created = controller.createSession({ seed: 'ctrl' });
    expect(controller.getSession(created.sessionId)).toEqual(created);
    const next = controller.submitAction(created.sessionId, { actionIndex: null });
    expect(next.generation).toBe(2);
    expect(controller.getHistory(created.sessionId)).toHaveLength(1);
    controller.removeSession(created.sessionId);
    expect(() => controller.getSession(created.sessionId)).toThrow(NotFoundError);
  });
});
