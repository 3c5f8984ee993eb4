import type { EffectBundle } from './effect-bundle.js';

export const STAT_MIN = 0;
export const STAT_MAX = 100;

/** 세션이 단독 소유하는 가변 월드 상태. tick 1 = 1년 */
export type WorldState = {
  tick: number;
  treasury: number; // 0 이상, 상한 없음
  pollution: number; // 0~100
  vitality: number; // 0~100
  trust: number; // 0~100
  incomeBase: number; // 0 이상
  growthModifier: number; // clamp 없음, 런 종료까지 누적
  usedActionIds: Set<string>;
  // 표시 계층용 감사 필드: 엔진 규칙은 참조하지 않음
  lastEvent: string | null;
  lastEventChoice: string | null;
  lastAction: string | null;
  lastActionEffects: EffectBundle | null;
};

/** 응답/리포트용 분리 복사본 */
export type StateSnapshot = Omit<WorldState, 'usedActionIds'> & {
  usedActionIds: string[];
};
