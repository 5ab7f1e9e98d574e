import type { MonthDay, TimeOfDay } from '../utils/timeTokens';
import type { Weekday } from '../utils/schedule';

export const CONVERSATION_STATES = [
  'MENU',
  'GENERAL_MENU',
  'SINGLE_DATE',
  'SINGLE_TIME',
  'SINGLE_TEXT',
  'CYCLE_WEEKDAY',
  'CYCLE_TIME',
  'CYCLE_TEXT',
  'CYCLE_MENTIONS',
  'APK_WEEKDAY',
  'APK_TIME',
  'APK_TEXT',
  'APK_MENTIONS',
  'REMINDER_LIST',
  'PEOPLE_MENU',
  'PEOPLE_ADD',
  'PEOPLE_DELETE'
] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

/** Partial input of the reminder being built. */
export type Scratch = {
  date?: MonthDay;
  time?: TimeOfDay;
  weekdays: Weekday[];
  text?: string;
  mentionIds: number[];
};

export type Session = {
  state: ConversationState;
  scratch: Scratch;
};

export type ConversationEvent =
  | { kind: 'command'; command: 'start' | 'menu' | 'cancel' }
  | { kind: 'selection'; token: string }
  | { kind: 'text'; text: string };

export const emptyScratch = (): Scratch => ({ weekdays: [], mentionIds: [] });

export const initialSession = (): Session => ({ state: 'MENU', scratch: emptyScratch() });

/** In-memory sessions keyed by chat id. Not persisted across restarts. */
export class SessionStore {
  private readonly sessions = new Map<number, Session>();

  get(chatId: number): Session {
    const existing = this.sessions.get(chatId);
    if (existing) return existing;
    const fresh = initialSession();
    this.sessions.set(chatId, fresh);
    return fresh;
  }

  set(chatId: number, session: Session): void {
    this.sessions.set(chatId, session);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export const assertNever = (value: never): never => {
  throw new Error(`Unhandled conversation value: ${JSON.stringify(value)}`);
};
