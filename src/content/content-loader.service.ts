// tidewarden JSON 로드 + 검증 + 메모리 캐시

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { AppConfigService } from '../config/app-config.service.js';
import { ContentError } from '../common/errors/game-errors.js';
import { formatZodIssues } from '../common/pipes/zod-validation.pipe.js';
import type {
  ActionRecord,
  Catalog,
  EventRecord,
  SimulationConfig,
} from '../types/index.js';
import {
  ActionListSchema,
  EventListSchema,
  SimulationConfigSchema,
} from './content.schemas.js';

export const CONTENT_FILES = {
  config: 'config.json',
  events: 'events.json',
  actions: 'actions.json',
} as const;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private config: SimulationConfig | null = null;
  private catalog: Catalog | null = null;

  constructor(private readonly appConfig: AppConfigService) {}

  async onModuleInit() {
    await this.load(this.appConfig.contentDir);
  }

  async load(dir: string): Promise<void> {
    const [configRaw, eventsRaw, actionsRaw] = await Promise.all([
      this.readJson(dir, CONTENT_FILES.config),
      this.readJson(dir, CONTENT_FILES.events),
      this.readJson(dir, CONTENT_FILES.actions),
    ]);

    const config: SimulationConfig = this.validate(
      CONTENT_FILES.config,
      SimulationConfigSchema,
      configRaw,
    );
    const events: EventRecord[] = this.validate(
      CONTENT_FILES.events,
      EventListSchema,
      eventsRaw,
    );
    const actions: ActionRecord[] = this.validate(
      CONTENT_FILES.actions,
      ActionListSchema,
      actionsRaw,
    );

    this.assertUniqueIds(CONTENT_FILES.events, events);
    this.assertUniqueIds(CONTENT_FILES.actions, actions);

    this.config = deepFreeze(config);
    this.catalog = deepFreeze({ events, actions });

    this.logger.log(
      `Content loaded from ${dir}: ${events.length} events, ${actions.length} actions`,
    );
  }

  getConfig(): SimulationConfig {
    if (!this.config) throw new ContentError('Content not loaded');
    return this.config;
  }

  getCatalog(): Catalog {
    if (!this.catalog) throw new ContentError('Content not loaded');
    return this.catalog;
  }

  private async readJson(dir: string, file: string): Promise<unknown> {
    const path = join(dir, file);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      throw new ContentError(`Cannot read ${file}`, {
        path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      throw new ContentError(`Malformed JSON in ${file}`, {
        path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private validate<T>(
    file: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    value: unknown,
  ): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ContentError(`Invalid content in ${file}`, {
        issues: formatZodIssues(result.error.issues),
      });
    }
    return result.data;
  }

  private assertUniqueIds(file: string, records: ReadonlyArray<{ id: string }>): void {
    const seen = new Set<string>();
    for (const r of records) {
      if (seen.has(r.id)) {
        throw new ContentError(`Duplicate id in ${file}: ${r.id}`);
      }
      seen.add(r.id);
    }
  }
}
