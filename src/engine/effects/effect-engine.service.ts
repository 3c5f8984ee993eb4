import { Injectable, Logger } from '@nestjs/common';
import type { EffectBundle, EffectKey, WorldState } from '../../types/index.js';
import { clampStat, floorZero } from '../state/world-state.service.js';

@Injectable()
export class EffectEngineService {
  private readonly logger = new Logger(EffectEngineService.name);

  /**
   * 효과 번들을 상태에 적용 (in-place).
   * - treasury / incomeBase: 합산 후 하한 0
   * - pollution / vitality / trust: 합산 후 0~100 clamp
   * - growthRate: growthModifier에 누적, clamp 없음
   * 각 키는 서로 다른 필드에만 닿으므로 처리 순서와 무관하다.
   */
  applyEffects(state: WorldState, bundle: EffectBundle): void {
    const treasury = this.readInt(bundle, 'treasury');
    const pollution = this.readInt(bundle, 'pollution');
    const vitality = this.readInt(bundle, 'vitality');
    const trust = this.readInt(bundle, 'trust');
    const incomeBase = this.readInt(bundle, 'incomeBase');
    const growthRate = this.read(bundle, 'growthRate');

    if (treasury !== undefined) state.treasury = floorZero(state.treasury + treasury);
    if (pollution !== undefined) state.pollution = clampStat(state.pollution + pollution);
    if (vitality !== undefined) state.vitality = clampStat(state.vitality + vitality);
    if (trust !== undefined) state.trust = clampStat(state.trust + trust);
    if (incomeBase !== undefined) state.incomeBase = floorZero(state.incomeBase + incomeBase);
    if (growthRate !== undefined) state.growthModifier += growthRate;
  }

  /** 액션 비용 차감: treasury와 같은 하한 규칙 */
  applyActionCost(state: WorldState, cost: number): void {
    state.treasury = floorZero(state.treasury - Math.trunc(cost));
  }

  private readInt(bundle: EffectBundle, key: EffectKey): number | undefined {
    const value = this.read(bundle, key);
    return value === undefined ? undefined : Math.trunc(value);
  }

  /** 숫자가 아닌 값은 키가 없는 것으로 취급 */
  private read(bundle: EffectBundle, key: EffectKey): number | undefined {
    const value: unknown = bundle[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.logger.warn(`Malformed effect value ignored: ${key}=${String(value)}`);
      return undefined;
    }
    return value;
  }
}
