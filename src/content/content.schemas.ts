// 콘텐츠 JSON 경계 검증: 엔진에는 닫힌 형태의 레코드만 넘어간다

import { z } from 'zod';
import { ACTION_CATEGORY, EVENT_KIND } from '../types/index.js';

const delta = z.number().int();

/** 알 수 없는 키는 버림 (상위 호환) */
export const EffectBundleSchema = z.object({
  treasury: delta.optional(),
  pollution: delta.optional(),
  vitality: delta.optional(),
  trust: delta.optional(),
  growthRate: z.number().finite().optional(),
  incomeBase: delta.optional(),
});

export const EventChoiceSchema = z.object({
  text: z.string().min(1),
  effects: EffectBundleSchema.default({}),
});

export const EventRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    text: z.string().default(''),
    minTick: z.number().int().min(0),
    maxTick: z.number().int().min(0),
    weight: z.number().int().positive(),
    kind: z.enum(EVENT_KIND),
    effects: EffectBundleSchema.default({}),
    choices: z.array(EventChoiceSchema).max(3).default([]),
  })
  .superRefine((e, ctx) => {
    if (e.minTick > e.maxTick) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxTick'],
        message: `maxTick (${e.maxTick}) is before minTick (${e.minTick})`,
      });
    }
    if (e.kind === 'interactive' && e.choices.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['choices'],
        message: 'interactive event needs 1-3 choices',
      });
    }
    if (e.kind === 'automatic' && e.choices.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['choices'],
        message: 'automatic event cannot have choices',
      });
    }
  });

export const ActionRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  category: z.enum(ACTION_CATEGORY),
  unlockTick: z.number().int().min(0),
  minTrust: z.number().int().min(0).max(100),
  cost: z.number().int().min(0),
  effects: EffectBundleSchema.default({}),
  repeatable: z.boolean().default(false),
});

export const SimulationConfigSchema = z
  .object({
    startTick: z.number().int().min(0),
    startTreasury: z.number().int().min(0),
    startPollution: z.number().int().min(0).max(100),
    startVitality: z.number().int().min(0).max(100),
    startTrust: z.number().int().min(0).max(100),
    startIncome: z.number().int().min(0),
    baseGrowth: z.number().finite(),
    generationLength: z.number().int().positive(),
    endTick: z.number().int().min(0),
    winPollutionThreshold: z.number().int().min(0).max(100),
    winVitalityThreshold: z.number().int().min(0).max(100),
    generationNames: z.array(z.string().min(1)).min(1),
  })
  .refine((c) => c.endTick >= c.startTick, {
    path: ['endTick'],
    message: 'endTick must not precede startTick',
  });

export const EventListSchema = z.array(EventRecordSchema);
export const ActionListSchema = z.array(ActionRecordSchema);
