// 정규 열거값: 콘텐츠, 엔진, API가 모두 이 목록을 공유한다

export const EVENT_KIND = ['automatic', 'interactive'] as const;
export type EventKind = (typeof EVENT_KIND)[number];

/** 서사 분기용 키. 표시 텍스트를 런타임에 매칭하지 않고 콘텐츠 작성 시점에 지정 */
export const ACTION_CATEGORY = [
  'CLEANUP',
  'REGULATION',
  'RESEARCH',
  'ECONOMY',
  'COMMUNITY',
  'RESTORATION',
] as const;
export type ActionCategory = (typeof ACTION_CATEGORY)[number];

export const ENDING_OUTCOME = [
  'running',
  'collapse',
  'toxicSeas',
  'uprising',
  'victory',
] as const;
export type EndingOutcome = (typeof ENDING_OUTCOME)[number];
export type TerminalOutcome = Exclude<EndingOutcome, 'running'>;

export const SESSION_PHASE = [
  'AWAITING_EVENT_CHOICE',
  'AWAITING_ACTION',
  'ENDED',
] as const;
export type SessionPhase = (typeof SESSION_PHASE)[number];
