import { Injectable } from '@nestjs/common';
import {
  ENDING_OUTCOME,
  type EndingOutcome,
  type SimulationConfig,
  type TerminalOutcome,
  type WorldState,
} from '../../types/index.js';
import { InternalError } from '../../common/errors/game-errors.js';

/** 다섯 결과 외의 값은 프로그램 결함 */
export function assertKnownOutcome(value: string): EndingOutcome {
  const known = ENDING_OUTCOME.find((o) => o === value);
  if (known === undefined) {
    throw new InternalError(`Unknown ending outcome: ${value}`);
  }
  return known;
}

export function isTerminal(outcome: EndingOutcome): outcome is TerminalOutcome {
  return outcome !== 'running';
}

@Injectable()
export class EndingService {
  /**
   * 종료 판정: 순서대로 첫 매칭이 이긴다.
   * collapse → toxicSeas → uprising → victory → running
   */
  checkEnding(state: WorldState, config: SimulationConfig): EndingOutcome {
    if (state.vitality <= 0) return 'collapse';
    if (state.pollution >= 100) return 'toxicSeas';
    if (state.trust <= 0) return 'uprising';
    if (
      state.tick >= config.endTick &&
      state.pollution < config.winPollutionThreshold &&
      state.vitality >= config.winVitalityThreshold
    ) {
      return 'victory';
    }
    return 'running';
  }
}
