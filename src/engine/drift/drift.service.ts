import { Injectable } from '@nestjs/common';
import type {
  DriftReport,
  SimulationConfig,
  WorldState,
} from '../../types/index.js';
import { clampStat } from '../state/world-state.service.js';

/** 오염도가 높을수록 성장률 가속: (1 + pollution/100 * 0.5) */
const POLLUTION_ACCELERATION = 0.5;

// [하한, 값]: 위에서부터 첫 매칭
const VITALITY_DECLINE_STEPS: ReadonlyArray<readonly [number, number]> = [
  [80, 8],
  [60, 5],
  [40, 3],
  [20, 1],
];

const INCOME_MULTIPLIER_STEPS: ReadonlyArray<readonly [number, number]> = [
  [80, 1.0],
  [60, 0.8],
  [40, 0.6],
  [20, 0.4],
];
const INCOME_MULTIPLIER_FLOOR = 0.2;

const SUPPORT_MULTIPLIER_STEPS: ReadonlyArray<readonly [number, number]> = [
  [80, 1.0],
  [60, 0.9],
  [40, 0.7],
  [20, 0.5],
];
const SUPPORT_MULTIPLIER_FLOOR = 0.3;

function stepLookup(
  value: number,
  steps: ReadonlyArray<readonly [number, number]>,
  fallback: number,
): number {
  for (const [threshold, result] of steps) {
    if (value >= threshold) return result;
  }
  return fallback;
}

@Injectable()
export class DriftService {
  /**
   * 1년치 자연 변화. 각 단계는 바로 앞 단계가 바꾼 값을 읽는다 (스냅샷 없음).
   * 1. 오염 성장  2. 오염 기반 활력 감소  3. 활력/신뢰 기반 수입
   * tick은 건드리지 않는다: 호출자가 호출마다 1씩 진행.
   */
  applyYearlyDrift(state: WorldState, config: SimulationConfig): DriftReport {
    // 1. 오염 성장 (0 방향 절삭)
    const baseRate = config.baseGrowth + state.growthModifier;
    const acceleration = 1 + (state.pollution / 100) * POLLUTION_ACCELERATION;
    const growth = Math.trunc(baseRate * acceleration);
    state.pollution = clampStat(state.pollution + growth);

    // 2. 성장 후 오염도로 활력 감소
    const vitalityDecline = this.vitalityDecline(state.pollution);
    state.vitality = clampStat(state.vitality - vitalityDecline);

    // 3. 감소 후 활력 + 신뢰로 수입
    const incomeMultiplier = this.incomeMultiplier(state.vitality);
    const supportMultiplier = this.supportMultiplier(state.trust);
    const grossIncome = Math.floor(state.incomeBase * incomeMultiplier);
    const income = Math.floor(grossIncome * supportMultiplier);
    state.treasury += income;

    return { growth, vitalityDecline, incomeMultiplier, supportMultiplier, income };
  }

  vitalityDecline(pollution: number): number {
    return stepLookup(pollution, VITALITY_DECLINE_STEPS, 0);
  }

  incomeMultiplier(vitality: number): number {
    return stepLookup(vitality, INCOME_MULTIPLIER_STEPS, INCOME_MULTIPLIER_FLOOR);
  }

  supportMultiplier(trust: number): number {
    return stepLookup(trust, SUPPORT_MULTIPLIER_STEPS, SUPPORT_MULTIPLIER_FLOOR);
  }
}
