import type { EffectBundle } from './effect-bundle.js';
import type { EndingOutcome } from './enums.js';
import type { StateSnapshot } from './world-state.js';

/** applyYearlyDrift 1회 결과 */
export type DriftReport = {
  growth: number;
  vitalityDecline: number;
  incomeMultiplier: number;
  supportMultiplier: number;
  income: number;
};

export type YearLedgerEntry = {
  tick: number; // 드리프트 적용 후 tick
  pollution: number;
  vitality: number;
  trust: number;
  treasury: number;
  drift: DriftReport;
};

export type TurnEventSummary = {
  eventId: string;
  name: string;
  kind: 'automatic' | 'interactive';
  choiceIndex: number | null;
  choiceText: string | null;
  effects: EffectBundle;
};

export type TurnActionSummary = {
  actionId: string;
  name: string;
  cost: number;
  effects: EffectBundle;
};

export type TurnReport = {
  generation: number; // 1부터
  generationName: string;
  fromTick: number;
  toTick: number;
  event: TurnEventSummary | null;
  years: YearLedgerEntry[];
  action: TurnActionSummary | null; // null = 현상 유지
  outcome: EndingOutcome;
  state: StateSnapshot;
};
