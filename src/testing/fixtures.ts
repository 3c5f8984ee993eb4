// 테스트 전용 픽스처: 빌드 산출물에서 제외

import type {
  ActionRecord,
  EventRecord,
  SimulationConfig,
  WorldState,
} from '../types/index.js';

export const TEST_CONFIG: SimulationConfig = {
  startTick: 0,
  startTreasury: 100,
  startPollution: 10,
  startVitality: 80,
  startTrust: 60,
  startIncome: 20,
  baseGrowth: 2,
  generationLength: 5,
  endTick: 150,
  winPollutionThreshold: 30,
  winVitalityThreshold: 60,
  generationNames: ['First Current', 'Second Current', 'Third Current'],
};

export function makeState(overrides: Partial<WorldState> = {}): WorldState {
  return {
    tick: 0,
    treasury: 100,
    pollution: 10,
    vitality: 80,
    trust: 60,
    incomeBase: 20,
    growthModifier: 0,
    usedActionIds: new Set<string>(),
    lastEvent: null,
    lastEventChoice: null,
    lastAction: null,
    lastActionEffects: null,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    id: 'evt_test',
    name: 'Test Event',
    text: 'Something happens.',
    minTick: 0,
    maxTick: 200,
    weight: 1,
    kind: 'automatic',
    effects: {},
    choices: [],
    ...overrides,
  };
}

export function makeAction(overrides: Partial<ActionRecord> = {}): ActionRecord {
  return {
    id: 'act_test',
    name: 'Test Action',
    description: 'Does something.',
    category: 'CLEANUP',
    unlockTick: 0,
    minTrust: 0,
    cost: 0,
    effects: {},
    repeatable: false,
    ...overrides,
  };
}
