import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { WorldStateService } from './state/world-state.service.js';
import { EffectEngineService } from './effects/effect-engine.service.js';
import { EligibilityService } from './eligibility/eligibility.service.js';
import { DriftService } from './drift/drift.service.js';
import { EndingService } from './ending/ending.service.js';
import { TurnPipelineService } from './session/turn-pipeline.service.js';

const providers = [
  // Layer 1
  RngService,
  WorldStateService,
  // Layer 2
  EffectEngineService,
  EligibilityService,
  DriftService,
  EndingService,
  // Layer 3: Turn
  TurnPipelineService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
