import { Injectable } from '@nestjs/common';
import type {
  ActionRecord,
  EventRecord,
  WorldState,
} from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';

/** 한 턴에 제시되는 액션 상한 */
export const MAX_OFFERED_ACTIONS = 5;

@Injectable()
export class EligibilityService {
  /**
   * tick이 [minTick, maxTick]에 드는 이벤트를 weight만큼 반복한 모집단.
   * 여기서 균등 추첨 1회 = weight 비례 추첨.
   */
  availableEvents(events: readonly EventRecord[], tick: number): EventRecord[] {
    const population: EventRecord[] = [];
    for (const event of events) {
      if (tick >= event.minTick && tick <= event.maxTick) {
        for (let i = 0; i < event.weight; i++) population.push(event);
      }
    }
    return population;
  }

  /** 모집단에서 1개 추첨. 후보가 없으면 null (RNG 소비 없음) */
  pickEvent(
    events: readonly EventRecord[],
    tick: number,
    rng: Rng,
  ): EventRecord | null {
    return rng.pick(this.availableEvents(events, tick)) ?? null;
  }

  /**
   * 요구 조건(해금 tick, 최소 trust, 비용, 미사용)을 통과한 액션.
   * 5개 초과면 비복원 균등 표본 5개, 이하면 카탈로그 순서 그대로 (RNG 소비 없음).
   */
  availableActions(
    actions: readonly ActionRecord[],
    state: WorldState,
    rng: Rng,
  ): ActionRecord[] {
    const eligible = actions.filter((a) => this.isActionEligible(a, state));
    if (eligible.length <= MAX_OFFERED_ACTIONS) return eligible;
    return rng.sample(eligible, MAX_OFFERED_ACTIONS);
  }

  isActionEligible(action: ActionRecord, state: WorldState): boolean {
    return (
      state.tick >= action.unlockTick &&
      state.trust >= action.minTrust &&
      state.treasury >= action.cost &&
      !state.usedActionIds.has(action.id)
    );
  }
}
