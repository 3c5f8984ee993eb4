import type {
  ActionRecord,
  Catalog,
  EndingOutcome,
  EventRecord,
  SessionPhase,
  SimulationConfig,
  TurnEventSummary,
  TurnReport,
  WorldState,
  YearLedgerEntry,
} from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';

/** 진행 중인 턴의 부분 리포트 */
export type TurnDraft = {
  generation: number;
  generationName: string;
  fromTick: number;
  event: TurnEventSummary | null;
  years: YearLedgerEntry[];
};

/**
 * 시뮬레이션 세션: 자신의 RNG, 설정, 카탈로그, 월드 상태를 단독 소유한다.
 * 프로세스 전역 상태 없이 모든 엔진 호출에 이 값이 넘어간다.
 */
export type SimulationSession = {
  readonly id: string;
  readonly rng: Rng;
  readonly config: SimulationConfig;
  readonly catalog: Catalog;
  readonly state: WorldState;
  phase: SessionPhase;
  outcome: EndingOutcome;
  generation: number; // 0 = 시작 전
  pendingEvent: EventRecord | null;
  offeredActions: ActionRecord[];
  draft: TurnDraft | null;
  readonly history: TurnReport[];
};
