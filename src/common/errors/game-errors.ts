import { HttpStatus } from '@nestjs/common';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

/** EligibilityResolver가 돌려준 범위 밖의 선택: 상태 변경 전에 거부 */
export class IneligibleSelectionError extends GameError {
  constructor(message = 'Ineligible selection', details?: Record<string, unknown>) {
    super('INELIGIBLE_SELECTION', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

/** 현재 세션 phase에서 받을 수 없는 명령 */
export class PhaseMismatchError extends GameError {
  constructor(message = 'Phase mismatch', details?: Record<string, unknown>) {
    super('PHASE_MISMATCH', message, HttpStatus.CONFLICT, details);
  }
}

/** 콘텐츠 파일 검증 실패: 기동 중단 */
export class ContentError extends GameError {
  constructor(message = 'Invalid content', details?: Record<string, unknown>) {
    super('CONTENT_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
