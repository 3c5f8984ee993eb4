// 프로세스 설정: 환경변수 + 기본값

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';

export interface AppConfig {
  port: number;
  contentDir: string;
  maxSessions: number; // 메모리에 유지하는 세션 수 상한
}

const DEFAULT_PORT = 3000;
const DEFAULT_MAX_SESSIONS = 1000;

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw ?? '', 10);
  return Number.isNaN(n) || n < 1 ? fallback : n;
}

export function readAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    contentDir:
      env.CONTENT_DIR ?? join(process.cwd(), 'content', 'tidewarden'),
    maxSessions: positiveInt(env.MAX_SESSIONS, DEFAULT_MAX_SESSIONS),
  };
}

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);
  private readonly config: AppConfig;

  constructor() {
    this.config = readAppConfig();
    this.logger.log(`Content dir: ${this.config.contentDir}`);
  }

  get port(): number {
    return this.config.port;
  }

  get contentDir(): string {
    return this.config.contentDir;
  }

  get maxSessions(): number {
    return this.config.maxSessions;
  }
}
