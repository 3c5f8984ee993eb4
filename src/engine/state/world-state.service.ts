import { Injectable } from '@nestjs/common';
import {
  STAT_MAX,
  STAT_MIN,
  type SimulationConfig,
  type StateSnapshot,
  type WorldState,
} from '../../types/index.js';
import { InternalError } from '../../common/errors/game-errors.js';

/** pollution / vitality / trust 범위 clamp */
export function clampStat(value: number): number {
  return Math.max(STAT_MIN, Math.min(STAT_MAX, value));
}

/** treasury / incomeBase: 하한 0, 상한 없음 */
export function floorZero(value: number): number {
  return Math.max(0, value);
}

@Injectable()
export class WorldStateService {
  createInitialState(config: SimulationConfig): WorldState {
    return {
      tick: config.startTick,
      treasury: floorZero(Math.trunc(config.startTreasury)),
      pollution: clampStat(Math.trunc(config.startPollution)),
      vitality: clampStat(Math.trunc(config.startVitality)),
      trust: clampStat(Math.trunc(config.startTrust)),
      incomeBase: floorZero(Math.trunc(config.startIncome)),
      growthModifier: 0,
      usedActionIds: new Set<string>(),
      lastEvent: null,
      lastEventChoice: null,
      lastAction: null,
      lastActionEffects: null,
    };
  }

  /** 1년 경과 */
  advanceTick(state: WorldState): void {
    state.tick += 1;
  }

  markActionUsed(state: WorldState, actionId: string): void {
    state.usedActionIds.add(actionId);
  }

  snapshot(state: WorldState): StateSnapshot {
    return {
      ...state,
      usedActionIds: [...state.usedActionIds].sort(),
      lastActionEffects: state.lastActionEffects
        ? { ...state.lastActionEffects }
        : null,
    };
  }

  /** 범위 불변식 위반 시 결함으로 간주 */
  assertInvariants(state: WorldState): void {
    const violations: string[] = [];
    for (const key of ['pollution', 'vitality', 'trust'] as const) {
      const v = state[key];
      if (!Number.isInteger(v) || v < STAT_MIN || v > STAT_MAX) {
        violations.push(`${key}=${v}`);
      }
    }
    for (const key of ['treasury', 'incomeBase'] as const) {
      const v = state[key];
      if (!Number.isInteger(v) || v < 0) {
        violations.push(`${key}=${v}`);
      }
    }
    if (!Number.isFinite(state.growthModifier)) {
      violations.push(`growthModifier=${state.growthModifier}`);
    }
    if (violations.length > 0) {
      throw new InternalError('WorldState invariant violated', { violations });
    }
  }
}
