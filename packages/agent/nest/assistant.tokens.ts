import type { LLM } from '../llm/types.js';
import type { Clock } from '../clock.js';
import type { IntentParser } from '../intents/intent-parser.js';
import type { SessionStore } from '../conversation/session-store.js';
import type { SimilarityOracle } from '../similarity/types.js';
import type { WorkingHours } from '../scheduling/working-hours.js';

export const ASSISTANT_OPTIONS = Symbol('ASSISTANT_OPTIONS');
export const ASSISTANT_CLOCK = Symbol('ASSISTANT_CLOCK');
export const INTENT_PARSER = Symbol('INTENT_PARSER');
export const SESSION_STORE = Symbol('SESSION_STORE');
export const SIMILARITY_ORACLE = Symbol('SIMILARITY_ORACLE');
export const SCHEDULING_OPTIONS = Symbol('SCHEDULING_OPTIONS');

export interface SchedulingOptions {
  /** IANA zone working hours and wall-clock recurrence are read in. */
  timeZone: string;
  workingHours: WorkingHours;
}

export interface AssistantModuleOptions {
  scheduling?: Partial<SchedulingOptions>;
  /** Backs the default intent parser; ignored when `intentParser` is given. */
  llm?: LLM;
  clock?: Clock;
  intentParser?: IntentParser;
  sessionStore?: SessionStore;
  similarity?: SimilarityOracle;
}
