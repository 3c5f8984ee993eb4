import type {
  ActionCategory,
  EndingOutcome,
  SessionPhase,
  StateSnapshot,
  TurnReport,
} from '../types/index.js';

export type PendingEventView = {
  id: string;
  name: string;
  text: string;
  choices: string[];
};

export type OfferedActionView = {
  index: number;
  id: string;
  name: string;
  description: string;
  category: ActionCategory;
  cost: number;
};

/** 표시 계층에 넘기는 세션 상태 */
export type SessionView = {
  sessionId: string;
  seed: string;
  rngCursor: number; // seed 이후 소비한 추첨 수
  phase: SessionPhase;
  outcome: EndingOutcome | null; // ENDED일 때만
  generation: number;
  generationName: string | null;
  state: StateSnapshot;
  pendingEvent: PendingEventView | null;
  offeredActions: OfferedActionView[];
  lastTurn: TurnReport | null;
};
