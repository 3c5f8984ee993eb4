import { DriftService } from './drift.service.js';
import { TEST_CONFIG, makeState } from '../../testing/fixtures.js';

describe('DriftService', () => {
  let service: DriftService;

  beforeEach(() => {
    service = new DriftService();
  });

  describe('applyYearlyDrift: 오염 성장', () => {
    it('pollution 40, modifier 0, baseGrowth 5 → +6 (5 * 1.2), 활력 -3', () => {
      const state = makeState({ pollution: 40, vitality: 85 });
      const report = service.applyYearlyDrift(state, { ...TEST_CONFIG, baseGrowth: 5 });
      expect(report.growth).toBe(6);
      expect(state.pollution).toBe(46);
      expect(report.vitalityDecline).toBe(3);
      expect(state.vitality).toBe(82);
    });

    it('음수 성장률은 0 방향으로 절삭', () => {
      // (2 - 5) * 1.1 = -3.3 → -3
      const state = makeState({ pollution: 20, growthModifier: -5 });
      const report = service.applyYearlyDrift(state, TEST_CONFIG);
      expect(report.growth).toBe(-3);
      expect(state.pollution).toBe(17);
    });

    it('100 초과 성장은 clamp', () => {
      // 10 * 1.475 = 14.75 → 14, 95 + 14 → 100
      const state = makeState({ pollution: 95 });
      service.applyYearlyDrift(state, { ...TEST_CONFIG, baseGrowth: 10 });
      expect(state.pollution).toBe(100);
    });
  });

  describe('applyYearlyDrift: 수입', () => {
    it('vitality 85, trust 85, incomeBase 100 → 배율 1.0 / 1.0, treasury +100', () => {
      const state = makeState({ vitality: 85, trust: 85, incomeBase: 100, treasury: 40 });
      const report = service.applyYearlyDrift(state, TEST_CONFIG);
      expect(report.incomeMultiplier).toBe(1.0);
      expect(report.supportMultiplier).toBe(1.0);
      expect(report.income).toBe(100);
      expect(state.treasury).toBe(140);
    });

    it('vitality 50, trust 50, incomeBase 100 → floor(floor(60) * 0.7) = 42', () => {
      const state = makeState({
        pollution: 0,
        vitality: 50,
        trust: 50,
        incomeBase: 100,
        treasury: 0,
      });
      const report = service.applyYearlyDrift(state, { ...TEST_CONFIG, baseGrowth: 0 });
      expect(report.incomeMultiplier).toBe(0.6);
      expect(report.supportMultiplier).toBe(0.7);
      expect(report.income).toBe(42);
      expect(state.treasury).toBe(42);
    });

    it('붕괴 상태의 최저 배율 0.2 / 0.3', () => {
      const state = makeState({ pollution: 0, vitality: 0, trust: 10, incomeBase: 100, treasury: 0 });
      const report = service.applyYearlyDrift(state, { ...TEST_CONFIG, baseGrowth: 0 });
      expect(report.income).toBe(6);
      expect(state.treasury).toBe(6);
    });
  });

  it('각 단계는 앞 단계가 바꾼 값을 읽는다', () => {
    // 성장: 2 * 1.39 → 2, pollution 78 → 80 → 감소 8
    // 활력 62 → 54 → 수입 배율 0.6 (감소 전 값이면 0.8)
    // floor(floor(50 * 0.6) * 0.9) = 27
    const state = makeState({ pollution: 78, vitality: 62, trust: 60, incomeBase: 50, treasury: 0 });
    const report = service.applyYearlyDrift(state, TEST_CONFIG);
    expect(state.pollution).toBe(80);
    expect(report.vitalityDecline).toBe(8);
    expect(state.vitality).toBe(54);
    expect(report.incomeMultiplier).toBe(0.6);
    expect(report.income).toBe(27);
  });

  it('tick은 진행하지 않는다', () => {
    const state = makeState({ tick: 12 });
    service.applyYearlyDrift(state, TEST_CONFIG);
    expect(state.tick).toBe(12);
  });

  it('결정적: 같은 입력이면 같은 결과', () => {
    const a = makeState({ pollution: 37, vitality: 66, trust: 41, incomeBase: 33, growthModifier: 0.7 });
    const b = makeState({ pollution: 37, vitality: 66, trust: 41, incomeBase: 33, growthModifier: 0.7 });
    for (let i = 0; i < 10; i++) {
      expect(service.applyYearlyDrift(a, TEST_CONFIG)).toEqual(
        service.applyYearlyDrift(b, TEST_CONFIG),
      );
    }
    expect(a).toEqual(b);
  });

  describe('단계 함수 경계값', () => {
    it.each([
      [100, 8], [80, 8], [79, 5], [60, 5], [59, 3], [40, 3], [39, 1], [20, 1], [19, 0], [0, 0],
    ])('pollution %i → 감소 %i', (pollution, expected) => {
      expect(service.vitalityDecline(pollution)).toBe(expected);
    });

    it.each([
      [80, 1.0], [79, 0.8], [60, 0.8], [59, 0.6], [40, 0.6], [39, 0.4], [20, 0.4], [19, 0.2],
    ])('vitality %i → 수입 배율 %d', (vitality, expected) => {
      expect(service.incomeMultiplier(vitality)).toBe(expected);
    });

    it.each([
      [80, 1.0], [79, 0.9], [60, 0.9], [59, 0.7], [40, 0.7], [39, 0.5], [20, 0.5], [19, 0.3],
    ])('trust %i → 지지 배율 %d', (trust, expected) => {
      expect(service.supportMultiplier(trust)).toBe(expected);
    });
  });
});
