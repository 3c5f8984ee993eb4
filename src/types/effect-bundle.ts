/** 효과 번들: 고정된 키 집합의 수치 델타. 키가 없으면 해당 스탯에 영향 없음 */
export type EffectBundle = {
  treasury?: number;
  pollution?: number;
  vitality?: number;
  trust?: number;
  growthRate?: number;
  incomeBase?: number;
};

export type EffectKey = keyof EffectBundle;

export const EFFECT_KEYS = [
  'treasury',
  'pollution',
  'vitality',
  'trust',
  'growthRate',
  'incomeBase',
] as const satisfies readonly EffectKey[];
