import { SessionStateLostError } from '../errors';
import type { MessagingGateway } from '../services/gateway';
import { addMembersFromText, buildMentionSuffix, type MentionDirectory } from '../services/mentionTargets';
import type { ReminderService } from '../services/reminderService';
import type { MentionTargetRow, ReminderKind, ReminderRow } from '../types/rows';
import { composeReminderBody, labels } from '../ui/labels';
import { errorMessage, logError, logWarn } from '../utils/logger';
import { nextOccurrence, nextOccurrenceForDate, type Weekday } from '../utils/schedule';
import { parseDate, parseTime } from '../utils/timeTokens';
import { toEpochSeconds } from '../utils/time';
import { parseAction, type Action } from './actions';
import * as screens from './screens';
import type { Reply, WeeklyFlow } from './screens';
import {
  assertNever,
  emptyScratch,
  initialSession,
  SessionStore,
  type ConversationEvent,
  type ConversationState,
  type Scratch,
  type Session
} from './session';

export type ConversationDeps = {
  reminders: ReminderService;
  mentions: MentionDirectory;
  timezone: string;
};

export type Transition = {
  session: Session;
  replies: Reply[];
};

type StepContext = {
  chatId: number;
  session: Session;
  deps: ConversationDeps;
};

type WeeklyStates = {
  weekday: ConversationState;
  time: ConversationState;
  text: ConversationState;
  mentions: ConversationState;
  kind: ReminderKind;
};

const WEEKLY_FLOWS: Record<WeeklyFlow, WeeklyStates> = {
  cycle: {
    weekday: 'CYCLE_WEEKDAY',
    time: 'CYCLE_TIME',
    text: 'CYCLE_TEXT',
    mentions: 'CYCLE_MENTIONS',
    kind: 'weekly-cycle'
  },
  apk: {
    weekday: 'APK_WEEKDAY',
    time: 'APK_TIME',
    text: 'APK_TEXT',
    mentions: 'APK_MENTIONS',
    kind: 'apk-weekly'
  }
};

const to = (state: ConversationState, scratch: Scratch, ...replies: Reply[]): Transition => ({
  session: { state, scratch },
  replies
});

const stay = (session: Session, ...replies: Reply[]): Transition => ({ session, replies });

const home = (...replies: Reply[]): Transition => ({
  session: initialSession(),
  replies: replies.length > 0 ? replies : [screens.mainMenu()]
});

const toggle = <T>(values: readonly T[], value: T): T[] =>
  values.includes(value) ? values.filter((item) => item !== value) : [...values, value];

const missingFields = (scratch: Scratch, keys: (keyof Scratch)[]): string[] =>
  keys.filter((key) => {
    const value = scratch[key];
    return value === undefined || (Array.isArray(value) && value.length === 0);
  });

function singleDraft(scratch: Scratch) {
  const { date, time, text } = scratch;
  if (!date || !time || text === undefined) {
    throw new SessionStateLostError(missingFields(scratch, ['date', 'time', 'text']));
  }
  return { date, time, text };
}

function weeklyDraft(scratch: Scratch) {
  const { time, text, weekdays } = scratch;
  if (!time || text === undefined || weekdays.length === 0) {
    throw new SessionStateLostError(missingFields(scratch, ['weekdays', 'time', 'text']));
  }
  return { time, text, weekdays: [...weekdays].sort((a, b) => a - b) };
}

// --- finalize -------------------------------------------------------------

async function finalizeSingle({ chatId, session, deps }: StepContext): Promise<Transition> {
  const { date, time, text } = singleDraft(session.scratch);
  const fireAt = nextOccurrenceForDate(date.month, date.day, time.hour, time.minute, deps.reminders.now());
  const reminder = await deps.reminders.schedule({
    chat_id: chatId,
    kind: 'single-date',
    fire_at: toEpochSeconds(fireAt),
    body: text
  });
  return home(screens.recorded([reminder.fire_at], deps.timezone));
}

async function finalizeWeekly(
  { chatId, session, deps }: StepContext,
  flow: WeeklyFlow,
  targets: readonly MentionTargetRow[]
): Promise<Transition> {
  const { time, text, weekdays } = weeklyDraft(session.scratch);
  const { kind } = WEEKLY_FLOWS[flow];
  const mentions = buildMentionSuffix([...targets], session.scratch.mentionIds);
  const now = deps.reminders.now();
  const created: ReminderRow[] = [];

  try {
    for (const weekday of weekdays) {
      const fireAt = nextOccurrence(weekday, time.hour, time.minute, now);
      created.push(
        await deps.reminders.schedule({
          chat_id: chatId,
          kind,
          fire_at: toEpochSeconds(fireAt),
          body: composeReminderBody({ kind, text, mentions, weekday })
        })
      );
    }
  } catch (error) {
    // All weekdays are saved or none are.
    await rollBack(deps, created);
    throw error;
  }

  return home(screens.recorded(created.map((reminder) => reminder.fire_at), deps.timezone));
}

async function rollBack(deps: ConversationDeps, created: readonly ReminderRow[]): Promise<void> {
  for (const reminder of created) {
    try {
      await deps.reminders.cancel(reminder.id);
    } catch (error) {
      logError('Partial reminder left behind', { scope: 'conversation', event: 'rollback_failed', reminderId: reminder.id, error: errorMessage(error) });
    }
  }
}

// --- list screens -----------------------------------------------------------

async function showReminderList({ chatId, deps }: StepContext, notice?: string): Promise<Transition> {
  const reminders = await deps.reminders.list(chatId);
  return to('REMINDER_LIST', emptyScratch(), screens.reminderList(reminders, deps.timezone, notice));
}

async function showPeopleDelete({ chatId, deps }: StepContext, notice?: string): Promise<Transition> {
  const targets = await deps.mentions.list(chatId);
  if (targets.length === 0) {
    return to('PEOPLE_MENU', emptyScratch(), screens.peopleMenu(notice ? `${notice}\n${labels.people.empty()}` : labels.people.empty()));
  }
  return to('PEOPLE_DELETE', emptyScratch(), screens.peopleDeletePicker(targets, notice));
}

// --- selections ---------------------------------------------------------------

async function openMenuTarget(ctx: StepContext, target: Extract<Action, { type: 'menu' }>['target']): Promise<Transition> {
  switch (target) {
    case 'general':
      return to('GENERAL_MENU', emptyScratch(), screens.generalMenu());
    case 'apk':
      return to('APK_WEEKDAY', emptyScratch(), screens.weekdayPicker('apk', []));
    case 'people':
      return to('PEOPLE_MENU', emptyScratch(), screens.peopleMenu());
    case 'list':
      return showReminderList(ctx);
    default:
      return assertNever(target);
  }
}

async function onWeekdaySelection(ctx: StepContext, flow: WeeklyFlow, action: Action): Promise<Transition> {
  const { session } = ctx;
  const { weekdays } = session.scratch;

  if (action.type === 'weekday_toggle') {
    const next = toggle<Weekday>(weekdays, action.weekday);
    return to(session.state, { ...session.scratch, weekdays: next }, screens.weekdayPicker(flow, next));
  }

  if (action.type === 'weekday_next') {
    if (weekdays.length === 0) {
      return stay(session, screens.weekdayPicker(flow, weekdays, labels.errors.noWeekdays()));
    }
    return to(WEEKLY_FLOWS[flow].time, session.scratch, screens.askTime());
  }

  return stay(session);
}

async function onMentionSelection(ctx: StepContext, flow: WeeklyFlow, action: Action): Promise<Transition> {
  const { chatId, session, deps } = ctx;

  if (action.type === 'mention_toggle') {
    const targets = await deps.mentions.list(chatId);
    const known = targets.some((target) => target.id === action.id);
    const mentionIds = known ? toggle(session.scratch.mentionIds, action.id) : session.scratch.mentionIds;
    return to(session.state, { ...session.scratch, mentionIds }, screens.mentionPicker(targets, mentionIds));
  }

  if (action.type === 'mention_done') {
    const targets = await deps.mentions.list(chatId);
    return finalizeWeekly(ctx, flow, targets);
  }

  return stay(session);
}

async function onPeopleSelection(ctx: StepContext, action: Action): Promise<Transition> {
  const { chatId, session, deps } = ctx;

  switch (session.state) {
    case 'PEOPLE_MENU':
      if (action.type !== 'people') return stay(session);
      if (action.verb === 'add') return to('PEOPLE_ADD', emptyScratch(), screens.peopleAddPrompt());
      if (action.verb === 'delete') return showPeopleDelete(ctx);
      if (action.verb === 'list') return stay(session, screens.peopleListing(await deps.mentions.list(chatId)));
      return stay(session);
    case 'PEOPLE_ADD':
      return action.type === 'people' && action.verb === 'done'
        ? to('PEOPLE_MENU', emptyScratch(), screens.peopleMenu())
        : stay(session);
    case 'PEOPLE_DELETE': {
      if (action.type !== 'people_delete') return stay(session);
      const removed = await deps.mentions.delete(chatId, action.id);
      return showPeopleDelete(ctx, removed ? labels.people.deleted() : labels.people.alreadyGone());
    }
    default:
      return stay(session);
  }
}

async function onReminderListSelection(ctx: StepContext, action: Action): Promise<Transition> {
  const { chatId, session, deps } = ctx;

  switch (action.type) {
    case 'reminder_list':
      return showReminderList(ctx);
    case 'reminder_view': {
      const reminder = await deps.reminders.get(action.id);
      if (!reminder || reminder.chat_id !== chatId) {
        return showReminderList(ctx, labels.reminders.alreadyGone());
      }
      return stay(session, screens.reminderDetail(reminder, deps.timezone));
    }
    case 'reminder_delete': {
      const reminder = await deps.reminders.get(action.id);
      if (reminder && reminder.chat_id !== chatId) {
        return showReminderList(ctx, labels.reminders.alreadyGone());
      }
      const removed = await deps.reminders.cancel(action.id);
      return showReminderList(ctx, removed ? labels.reminders.deleted() : labels.reminders.alreadyGone());
    }
    default:
      return stay(session);
  }
}

async function onSelection(ctx: StepContext, action: Action): Promise<Transition> {
  const { session } = ctx;

  // Main-menu buttons stay valid on old messages, whatever the current state.
  if (action.type === 'menu') {
    return openMenuTarget(ctx, action.target);
  }

  switch (session.state) {
    case 'MENU':
      return stay(session);
    case 'GENERAL_MENU':
      if (action.type !== 'general') return stay(session);
      return action.target === 'single'
        ? to('SINGLE_DATE', emptyScratch(), screens.askDate())
        : to('CYCLE_WEEKDAY', emptyScratch(), screens.weekdayPicker('cycle', []));
    case 'CYCLE_WEEKDAY':
      return onWeekdaySelection(ctx, 'cycle', action);
    case 'APK_WEEKDAY':
      return onWeekdaySelection(ctx, 'apk', action);
    case 'CYCLE_MENTIONS':
      return onMentionSelection(ctx, 'cycle', action);
    case 'APK_MENTIONS':
      return onMentionSelection(ctx, 'apk', action);
    case 'PEOPLE_MENU':
    case 'PEOPLE_ADD':
    case 'PEOPLE_DELETE':
      return onPeopleSelection(ctx, action);
    case 'REMINDER_LIST':
      return onReminderListSelection(ctx, action);
    case 'SINGLE_DATE':
    case 'SINGLE_TIME':
    case 'SINGLE_TEXT':
    case 'CYCLE_TIME':
    case 'CYCLE_TEXT':
    case 'APK_TIME':
    case 'APK_TEXT':
      return stay(session);
    default:
      return assertNever(session.state);
  }
}

// --- back navigation -----------------------------------------------------------

async function onBack(ctx: StepContext): Promise<Transition> {
  const { session } = ctx;
  const { scratch } = session;

  switch (session.state) {
    case 'MENU':
    case 'GENERAL_MENU':
    case 'APK_WEEKDAY':
    case 'REMINDER_LIST':
    case 'PEOPLE_MENU':
      return home();
    case 'SINGLE_DATE':
    case 'CYCLE_WEEKDAY':
      return to('GENERAL_MENU', emptyScratch(), screens.generalMenu());
    case 'SINGLE_TIME':
      return to('SINGLE_DATE', scratch, screens.askDate());
    case 'SINGLE_TEXT':
      return to('SINGLE_TIME', scratch, screens.askTime());
    case 'CYCLE_TIME':
    case 'APK_TIME': {
      const flow: WeeklyFlow = session.state === 'APK_TIME' ? 'apk' : 'cycle';
      return to(WEEKLY_FLOWS[flow].weekday, scratch, screens.weekdayPicker(flow, scratch.weekdays));
    }
    case 'CYCLE_TEXT':
      return to('CYCLE_TIME', scratch, screens.askTime());
    case 'APK_TEXT':
      return to('APK_TIME', scratch, screens.askTime());
    case 'CYCLE_MENTIONS':
      return to('CYCLE_TEXT', { ...scratch, mentionIds: [] }, screens.askText());
    case 'APK_MENTIONS':
      return to('APK_TEXT', { ...scratch, mentionIds: [] }, screens.askText());
    case 'PEOPLE_ADD':
    case 'PEOPLE_DELETE':
      return to('PEOPLE_MENU', emptyScratch(), screens.peopleMenu());
    default:
      return assertNever(session.state);
  }
}

// --- free text -------------------------------------------------------------------

async function onWeeklyText(ctx: StepContext, flow: WeeklyFlow, text: string): Promise<Transition> {
  const { chatId, session, deps } = ctx;
  if (!text) {
    return stay(session, screens.askText(labels.errors.emptyText()));
  }

  const scratch: Scratch = { ...session.scratch, text, mentionIds: [] };
  const targets = await deps.mentions.list(chatId);
  if (targets.length > 0) {
    return to(WEEKLY_FLOWS[flow].mentions, scratch, screens.mentionPicker(targets, []));
  }
  return finalizeWeekly({ ...ctx, session: { state: session.state, scratch } }, flow, targets);
}

async function onText(ctx: StepContext, text: string): Promise<Transition> {
  const { chatId, session, deps } = ctx;

  switch (session.state) {
    case 'SINGLE_DATE': {
      const date = parseDate(text);
      if (!date) return stay(session, screens.askDate(labels.errors.invalidDate()));
      return to('SINGLE_TIME', { ...session.scratch, date }, screens.askTime());
    }
    case 'SINGLE_TIME': {
      const time = parseTime(text);
      if (!time) return stay(session, screens.askTime(labels.errors.invalidTime()));
      return to('SINGLE_TEXT', { ...session.scratch, time }, screens.askText());
    }
    case 'SINGLE_TEXT':
      if (!text) return stay(session, screens.askText(labels.errors.emptyText()));
      return finalizeSingle({ ...ctx, session: { state: session.state, scratch: { ...session.scratch, text } } });
    case 'CYCLE_TIME':
    case 'APK_TIME': {
      const time = parseTime(text);
      if (!time) return stay(session, screens.askTime(labels.errors.invalidTime()));
      const flow: WeeklyFlow = session.state === 'APK_TIME' ? 'apk' : 'cycle';
      return to(WEEKLY_FLOWS[flow].text, { ...session.scratch, time }, screens.askText());
    }
    case 'CYCLE_TEXT':
      return onWeeklyText(ctx, 'cycle', text);
    case 'APK_TEXT':
      return onWeeklyText(ctx, 'apk', text);
    case 'PEOPLE_ADD': {
      const result = await addMembersFromText(deps.mentions, chatId, text);
      return stay(session, screens.peopleAddResult(result.added.length, result.errors));
    }
    case 'MENU':
    case 'GENERAL_MENU':
    case 'CYCLE_WEEKDAY':
    case 'APK_WEEKDAY':
    case 'CYCLE_MENTIONS':
    case 'APK_MENTIONS':
    case 'REMINDER_LIST':
    case 'PEOPLE_MENU':
    case 'PEOPLE_DELETE':
      return stay(session);
    default:
      return assertNever(session.state);
  }
}

/**
 * One step of the conversation. Store writes and timer arming happen through
 * `deps`; the returned replies are not sent yet.
 */
export async function transition(
  chatId: number,
  session: Session,
  event: ConversationEvent,
  deps: ConversationDeps
): Promise<Transition> {
  const ctx: StepContext = { chatId, session, deps };

  switch (event.kind) {
    case 'command':
      return event.command === 'cancel' ? home(screens.mainMenu(labels.menu.cancelled())) : home();
    case 'selection': {
      const action = parseAction(event.token);
      if (!action) return stay(session);
      if (action.type === 'home') return home();
      if (action.type === 'back') return onBack(ctx);
      return onSelection(ctx, action);
    }
    case 'text':
      return onText(ctx, event.text.trim());
    default:
      return assertNever(event);
  }
}

/** Owns the per-chat sessions and sends each step's replies through the gateway. */
export class ConversationEngine {
  readonly sessions = new SessionStore();

  constructor(
    private readonly deps: ConversationDeps,
    private readonly gateway: MessagingGateway
  ) {}

  async handle(chatId: number, event: ConversationEvent): Promise<void> {
    const session = this.sessions.get(chatId);
    let result: Transition;

    try {
      result = await transition(chatId, session, event, this.deps);
    } catch (error) {
      if (error instanceof SessionStateLostError) {
        logWarn('Session state lost', { scope: 'conversation', event: 'state_lost', chatId, state: session.state, missing: error.missing });
        result = home(screens.stateLost());
      } else {
        logError('Conversation step failed', { scope: 'conversation', event: 'step_error', chatId, state: session.state, error: errorMessage(error) });
        result = home(screens.failure());
      }
    }

    this.sessions.set(chatId, result.session);

    for (const reply of result.replies) {
      await this.gateway.send(chatId, reply.text, { buttons: reply.buttons });
    }
  }
}
