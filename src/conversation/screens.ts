import type { ButtonRows, InlineButton } from '../services/gateway';
import type { MentionTargetRow, ReminderRow } from '../types/rows';
import { toggleMark } from '../ui/emoji';
import { labels, weekdayShort } from '../ui/labels';
import { renderScreen } from '../ui/render';
import { preview } from '../ui/text';
import { WEEKDAYS, type Weekday } from '../utils/schedule';
import { formatFireAt } from '../utils/time';
import { ACTIONS } from './actions';

export type Reply = { text: string; buttons?: ButtonRows };

export type WeeklyFlow = 'cycle' | 'apk';

const button = (label: string, action: string): InlineButton => ({ label, action });

const navRows = (): ButtonRows => [[button(labels.nav.back(), ACTIONS.back), button(labels.nav.home(), ACTIONS.home)]];

const homeRow = (): InlineButton[] => [button(labels.nav.home(), ACTIONS.home)];

const mainMenuRows = (): ButtonRows => [
  [button(labels.menu.general(), ACTIONS.menuGeneral)],
  [button(labels.menu.apk(), ACTIONS.menuApk)],
  [button(labels.menu.people(), ACTIONS.menuPeople)],
  [button(labels.menu.list(), ACTIONS.menuList)]
];

export const mainMenu = (notice?: string): Reply => ({
  text: renderScreen({ header: notice, body: labels.menu.title() }),
  buttons: mainMenuRows()
});

export const generalMenu = (): Reply => ({
  text: labels.general.title(),
  buttons: [
    [button(labels.general.single(), ACTIONS.generalSingle)],
    [button(labels.general.cycle(), ACTIONS.generalCycle)],
    [button(labels.nav.back(), ACTIONS.back)]
  ]
});

const inputPrompt = (text: string, notice?: string): Reply => ({
  text: renderScreen({ header: notice, body: text }),
  buttons: navRows()
});

export const askDate = (notice?: string): Reply => inputPrompt(labels.prompts.date(), notice);

export const askTime = (notice?: string): Reply => inputPrompt(labels.prompts.time(), notice);

export const askText = (notice?: string): Reply => inputPrompt(labels.prompts.text(), notice);

const flowTitle = (flow: WeeklyFlow): string => (flow === 'apk' ? labels.flows.apkTitle() : labels.flows.cycleTitle());

export const weekdayPicker = (flow: WeeklyFlow, selected: readonly Weekday[], notice?: string): Reply => {
  const dayButton = (weekday: Weekday) =>
    button(`${toggleMark(selected.includes(weekday))} ${weekdayShort(weekday)}`, ACTIONS.weekdayToggle(weekday));
  return {
    text: renderScreen({ header: notice, body: labels.prompts.weekdays(flowTitle(flow)) }),
    buttons: [
      WEEKDAYS.slice(0, 4).map(dayButton),
      WEEKDAYS.slice(4).map(dayButton),
      [button(labels.nav.next(), ACTIONS.weekdayNext)],
      ...navRows()
    ]
  };
};

export const mentionPicker = (targets: readonly MentionTargetRow[], selected: readonly number[]): Reply => ({
  text: labels.prompts.mentions(),
  buttons: [
    ...targets.map((target) => [
      button(
        `${toggleMark(selected.includes(target.id))} ${labels.people.targetLabel(target.display_name, target.handle)}`,
        ACTIONS.mentionToggle(target.id)
      )
    ]),
    [button(labels.nav.done(), ACTIONS.mentionDone)],
    ...navRows()
  ]
});

export const recorded = (fireAts: readonly number[], timezone: string): Reply =>
  mainMenu(labels.confirm.recorded([...fireAts].sort((a, b) => a - b).map((fireAt) => formatFireAt(fireAt, timezone))));

export const reminderList = (reminders: readonly ReminderRow[], timezone: string, notice?: string): Reply => {
  if (reminders.length === 0) {
    return {
      text: renderScreen({ header: notice, body: labels.reminders.empty() }),
      buttons: [homeRow()]
    };
  }

  return {
    text: renderScreen({ header: notice, body: labels.reminders.title() }),
    buttons: [
      ...reminders.map((reminder) => [
        button(
          `${labels.reminders.itemLabel(formatFireAt(reminder.fire_at, timezone), reminder.kind)} · ${preview(reminder.body)}`,
          ACTIONS.reminderView(reminder.id)
        )
      ]),
      homeRow()
    ]
  };
};

export const reminderDetail = (reminder: ReminderRow, timezone: string): Reply => ({
  text: labels.reminders.detail({ fireTime: formatFireAt(reminder.fire_at, timezone), kind: reminder.kind, body: reminder.body }),
  buttons: [
    [button(labels.reminders.delete(), ACTIONS.reminderDelete(reminder.id))],
    [button(labels.reminders.backToList(), ACTIONS.reminderList)]
  ]
});

export const peopleMenu = (notice?: string): Reply => ({
  text: renderScreen({ header: notice, body: labels.people.title() }),
  buttons: [
    [button(labels.people.add(), ACTIONS.peopleAdd)],
    [button(labels.people.delete(), ACTIONS.peopleDelete)],
    [button(labels.people.show(), ACTIONS.peopleList)],
    [button(labels.nav.back(), ACTIONS.back)]
  ]
});

export const peopleAddPrompt = (): Reply => ({
  text: labels.people.addPrompt(),
  buttons: [[button(labels.nav.done(), ACTIONS.peopleDone)]]
});

export const peopleAddResult = (added: number, errors: readonly { line: string; lineNumber: number }[]): Reply => ({
  text: [labels.people.added(added), ...errors.map((error) => labels.people.lineError(error.lineNumber, error.line))].join('\n'),
  buttons: [[button(labels.nav.done(), ACTIONS.peopleDone)]]
});

export const peopleDeletePicker = (targets: readonly MentionTargetRow[], notice?: string): Reply => ({
  text: renderScreen({ header: notice, body: labels.people.deletePrompt() }),
  buttons: [
    ...targets.map((target) => [
      button(labels.people.targetLabel(target.display_name, target.handle), ACTIONS.peopleDeleteOne(target.id))
    ]),
    [button(labels.nav.back(), ACTIONS.back)]
  ]
});

export const peopleListing = (targets: readonly MentionTargetRow[]): Reply =>
  peopleMenu(
    targets.length === 0
      ? labels.people.empty()
      : [labels.people.listHeader(), ...targets.map((target) => `• ${labels.people.targetLabel(target.display_name, target.handle)}`)].join('\n')
  );

export const stateLost = (): Reply => mainMenu(labels.errors.stateLost());

export const failure = (): Reply => mainMenu(labels.errors.failure());
