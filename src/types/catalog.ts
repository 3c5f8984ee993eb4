import type { EffectBundle } from './effect-bundle.js';
import type { ActionCategory, EventKind } from './enums.js';

export type EventChoice = {
  text: string;
  effects: EffectBundle;
};

export type EventRecord = {
  id: string;
  name: string;
  text: string;
  minTick: number;
  maxTick: number; // inclusive
  weight: number;
  kind: EventKind;
  effects: EffectBundle;
  choices: EventChoice[]; // interactive 전용, 1~3개
};

export type ActionRecord = {
  id: string;
  name: string;
  description: string;
  category: ActionCategory;
  unlockTick: number;
  minTrust: number;
  cost: number;
  effects: EffectBundle; // incomeBase 포함
  repeatable: boolean;
};

/** 세션 시작 시 한 번 로드되고 런 전체에서 읽기 전용으로 공유 */
export type Catalog = {
  events: readonly EventRecord[];
  actions: readonly ActionRecord[];
};
