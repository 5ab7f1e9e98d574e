import { isWeekday, type Weekday } from '../utils/schedule';

/**
 * Button payloads. Tokens are `<domain>:<verb>[:<id>]`; `_` is accepted as a
 * separator too so older keyboards (`menu_general`, `people_del_7`) still parse.
 */
export type Action =
  | { type: 'home' }
  | { type: 'back' }
  | { type: 'menu'; target: 'general' | 'apk' | 'people' | 'list' }
  | { type: 'general'; target: 'single' | 'cycle' }
  | { type: 'weekday_toggle'; weekday: Weekday }
  | { type: 'weekday_next' }
  | { type: 'mention_toggle'; id: number }
  | { type: 'mention_done' }
  | { type: 'people'; verb: 'add' | 'delete' | 'list' | 'done' }
  | { type: 'people_delete'; id: number }
  | { type: 'reminder_list' }
  | { type: 'reminder_view'; id: number }
  | { type: 'reminder_delete'; id: number };

export const ACTIONS = {
  home: 'home:menu',
  back: 'nav:back',
  menuGeneral: 'menu:general',
  menuApk: 'menu:apk',
  menuPeople: 'menu:people',
  menuList: 'menu:list',
  generalSingle: 'gen:single',
  generalCycle: 'gen:cycle',
  weekdayToggle: (weekday: Weekday) => `wd:toggle:${weekday}`,
  weekdayNext: 'wd:next',
  mentionToggle: (id: number) => `mt:toggle:${id}`,
  mentionDone: 'mt:done',
  peopleAdd: 'ppl:add',
  peopleDelete: 'ppl:delete',
  peopleList: 'ppl:list',
  peopleDone: 'ppl:done',
  peopleDeleteOne: (id: number) => `ppl:del:${id}`,
  reminderList: 'rem:list',
  reminderView: (id: number) => `rem:view:${id}`,
  reminderDelete: (id: number) => `rem:del:${id}`
} as const;

const TOKEN_SHAPE = /^[a-z]+(?:[:_][a-z]+)?(?:[:_][0-9]{1,15})?$/;

const MENU_TARGETS = ['general', 'apk', 'people', 'list'] as const;
const GENERAL_TARGETS = ['single', 'cycle'] as const;
const PEOPLE_VERBS = ['add', 'delete', 'list', 'done'] as const;

const pick = <T extends string>(options: readonly T[], value: string): T | undefined =>
  options.find((option) => option === value);

export function parseAction(token: string): Action | null {
  const trimmed = token.trim();
  if (!TOKEN_SHAPE.test(trimmed)) return null;

  const [domain = '', verb = '', idPart] = trimmed.split(/[:_]/);
  const id = idPart === undefined ? null : Number(idPart);

  if (id === null) {
    switch (domain) {
      case 'home':
        return verb === 'menu' ? { type: 'home' } : null;
      case 'nav':
        return verb === 'back' ? { type: 'back' } : null;
      case 'menu': {
        const target = pick(MENU_TARGETS, verb);
        return target ? { type: 'menu', target } : null;
      }
      case 'gen': {
        const target = pick(GENERAL_TARGETS, verb);
        return target ? { type: 'general', target } : null;
      }
      case 'wd':
        return verb === 'next' ? { type: 'weekday_next' } : null;
      case 'mt':
        return verb === 'done' ? { type: 'mention_done' } : null;
      case 'ppl':
      case 'people': {
        const peopleVerb = pick(PEOPLE_VERBS, verb);
        return peopleVerb ? { type: 'people', verb: peopleVerb } : null;
      }
      case 'rem':
        return verb === 'list' ? { type: 'reminder_list' } : null;
      default:
        return null;
    }
  }

  switch (`${domain}:${verb}`) {
    case 'wd:toggle':
      return isWeekday(id) ? { type: 'weekday_toggle', weekday: id } : null;
    case 'mt:toggle':
      return { type: 'mention_toggle', id };
    case 'ppl:del':
    case 'people:del':
      return { type: 'people_delete', id };
    case 'rem:view':
      return { type: 'reminder_view', id };
    case 'rem:del':
      return { type: 'reminder_delete', id };
    default:
      return null;
  }
}
