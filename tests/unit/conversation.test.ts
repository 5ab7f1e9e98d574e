import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConversationEngine } from '../../src/conversation/machine';
import { emptyScratch } from '../../src/conversation/session';
import { ReminderService } from '../../src/services/reminderService';
import { MemoryMentionDirectory, MemoryReminderStore, RecordingGateway } from '../helpers/memoryStores';

const ZONE = 'Asia/Taipei';
const CHAT_ID = -100123;
const HOUR_MS = 3_600_000;

// Monday 2025-03-10 09:00 in Taipei (UTC+8).
const NOW_MS = Date.UTC(2025, 2, 10, 1, 0);
const utcSeconds = (month: number, day: number, hour: number, minute = 0, year = 2025) =>
  Date.UTC(year, month - 1, day, hour, minute) / 1000;

const MENU_TITLE = '📋 Choose a function:';

describe('ConversationEngine', () => {
  let store: MemoryReminderStore;
  let directory: MemoryMentionDirectory;
  let gateway: RecordingGateway;
  let reminders: ReminderService;
  let engine: ConversationEngine;

  const press = (token: string) => engine.handle(CHAT_ID, { kind: 'selection', token });
  const say = (text: string) => engine.handle(CHAT_ID, { kind: 'text', text });
  const state = () => engine.sessions.get(CHAT_ID).state;
  const lastText = () => gateway.last()?.text;

  const addSingle = async (date: string, time: string, body: string) => {
    await press('menu:general');
    await press('gen:single');
    await say(date);
    await say(time);
    await say(body);
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW_MS);
    store = new MemoryReminderStore();
    directory = new MemoryMentionDirectory();
    gateway = new RecordingGateway();
    reminders = new ReminderService({ store, gateway, timezone: ZONE });
    engine = new ConversationEngine({ reminders, mentions: directory, timezone: ZONE }, gateway);
  });

  afterEach(() => {
    reminders.stop();
    vi.useRealTimers();
  });

  it('shows the main menu on /start', async () => {
    await engine.handle(CHAT_ID, { kind: 'command', command: 'start' });

    expect(lastText()).toBe(MENU_TITLE);
    expect(gateway.actions()).toEqual(['menu:general', 'menu:apk', 'menu:people', 'menu:list']);
    expect(state()).toBe('MENU');
  });

  describe('single date reminders', () => {
    it('creates one reminder and confirms without echoing the body', async () => {
      await addSingle('1201', '0930', 'pay rent');

      expect(await store.listAll()).toEqual([
        { id: 1, chat_id: CHAT_ID, kind: 'single-date', fire_at: utcSeconds(12, 1, 1, 30), body: 'pay rent' }
      ]);
      expect(lastText()).toBe(`✅ Recorded, will remind at 12/01 09:30.\n${MENU_TITLE}`);
      expect(lastText()).not.toContain('pay rent');
      expect(state()).toBe('MENU');
      expect(reminders.scheduler.isArmed(1)).toBe(true);
    });

    it('schedules next year when the date has passed', async () => {
      await addSingle('0301', '1200', 'taxes');

      const [row] = await store.listAll();
      expect(row?.fire_at).toBe(utcSeconds(3, 1, 4, 0, 2026));
    });

    it('re-prompts on invalid input and keeps the state', async () => {
      await press('menu:general');
      await press('gen:single');

      await say('1345');
      expect(lastText()).toBe('⚠️ Invalid date. Use MMDD, e.g. 1201.\n📅 Enter the date as MMDD (e.g. 1201 for Dec 1).');
      expect(state()).toBe('SINGLE_DATE');

      await say('1201');
      await say('2460');
      expect(lastText()).toBe('⚠️ Invalid time. Use HHMM, e.g. 0930.\n🕒 Enter the time as HHMM in 24h (e.g. 0930).');
      expect(state()).toBe('SINGLE_TIME');

      await say('0930');
      await say('   ');
      expect(lastText()).toBe('⚠️ The reminder text cannot be empty.\n📝 Enter the reminder text.');
      expect(state()).toBe('SINGLE_TEXT');
      expect(store.rows.size).toBe(0);
    });

    it('goes back one step and keeps what was entered', async () => {
      await press('menu:general');
      await press('gen:single');
      await say('1201');
      await press('nav:back');

      expect(state()).toBe('SINGLE_DATE');
      expect(engine.sessions.get(CHAT_ID).scratch.date).toEqual({ month: 12, day: 1 });

      await press('nav:back');
      expect(state()).toBe('GENERAL_MENU');
      await press('nav:back');
      expect(state()).toBe('MENU');
    });
  });

  describe('weekly reminders', () => {
    it('creates one recurring reminder per weekday and rolls the fired one forward', async () => {
      await press('menu:general');
      await press('gen:cycle');
      await press('wd:toggle:0');
      await press('wd:toggle:2');
      expect(gateway.last()?.options?.buttons?.[0]?.map((button) => button.label)).toEqual(['✅ Mon', '⬜️ Tue', '✅ Wed', '⬜️ Thu']);

      await press('wd:next');
      await say('0800');
      await say('standup');

      expect(await store.listAll()).toEqual([
        { id: 2, chat_id: CHAT_ID, kind: 'weekly-cycle', fire_at: utcSeconds(3, 12, 0), body: 'standup' },
        { id: 1, chat_id: CHAT_ID, kind: 'weekly-cycle', fire_at: utcSeconds(3, 17, 0), body: 'standup' }
      ]);
      expect(lastText()).toBe(`✅ Recorded, will remind at:\n• 03/12 08:00\n• 03/17 08:00\n${MENU_TITLE}`);

      gateway.clear();
      // Monday 2025-03-17 08:00 in Taipei.
      await vi.advanceTimersByTimeAsync(utcSeconds(3, 17, 0) * 1000 - NOW_MS);

      expect(gateway.sent.map((message) => message.text)).toEqual(['🔁 standup', '🔁 standup']);
      const fireAts = (await store.listAll()).map((row) => row.fire_at);
      expect(fireAts).toEqual([utcSeconds(3, 19, 0), utcSeconds(3, 24, 0)]);
      expect(fireAts).not.toContain(utcSeconds(3, 17, 0));
    });

    it('removes already saved weekdays when a later one fails to save', async () => {
      const add = store.add.bind(store);
      vi.spyOn(store, 'add').mockImplementationOnce(add).mockRejectedValueOnce(new Error('db down'));

      await press('menu:general');
      await press('gen:cycle');
      await press('wd:toggle:0');
      await press('wd:toggle:2');
      await press('wd:next');
      await say('0800');
      await say('standup');

      expect(store.rows.size).toBe(0);
      expect(reminders.scheduler.size).toBe(0);
      expect(lastText()).toBe(`❌ Something went wrong. Back to the main menu.\n${MENU_TITLE}`);
      expect(state()).toBe('MENU');
    });

    it('refuses to continue without a weekday', async () => {
      await press('menu:general');
      await press('gen:cycle');
      await press('wd:next');

      expect(lastText()).toBe('⚠️ Select at least one weekday first.\n🔁 Weekly cycle reminder\n📅 Select one or more weekdays, then press Next.');
      expect(state()).toBe('CYCLE_WEEKDAY');
    });

    it('bakes the selected mentions into the body', async () => {
      await directory.upsert(CHAT_ID, '@alice', 'Ally');
      await directory.upsert(CHAT_ID, '@bob', 'Bob');

      await press('menu:general');
      await press('gen:cycle');
      await press('wd:toggle:4');
      await press('wd:next');
      await say('1730');
      await say('wrap up');

      expect(state()).toBe('CYCLE_MENTIONS');
      expect(gateway.actions()).toEqual(['mt:toggle:1', 'mt:toggle:2', 'mt:done', 'nav:back', 'home:menu']);

      await press('mt:toggle:2');
      await press('mt:toggle:99');
      await press('mt:done');

      expect(await store.listAll()).toEqual([
        { id: 1, chat_id: CHAT_ID, kind: 'weekly-cycle', fire_at: utcSeconds(3, 14, 9, 30), body: 'wrap up\n@bob' }
      ]);
      expect(state()).toBe('MENU');
    });

    it('labels APK release reminders with their weekday', async () => {
      await press('menu:apk');
      await press('wd:toggle:2');
      await press('wd:next');
      await say('1800');
      await say('Ship build');

      expect(await store.listAll()).toEqual([
        { id: 1, chat_id: CHAT_ID, kind: 'apk-weekly', fire_at: utcSeconds(3, 12, 10), body: 'APK release (Wednesday)\nShip build' }
      ]);

      gateway.clear();
      await vi.advanceTimersByTimeAsync(utcSeconds(3, 12, 10) * 1000 - NOW_MS);
      expect(gateway.sent.map((message) => message.text)).toEqual(['📦 APK release (Wednesday)\nShip build']);
    });
  });

  describe('members', () => {
    it('adds members line by line and reports bad lines', async () => {
      await press('menu:people');
      await press('ppl:add');
      await say('@alice Ally\nbadline\n@bob Bob');

      expect(lastText()).toBe('✅ Added 2 member(s).\n⚠️ Line 2 skipped: "badline"');
      expect((await directory.list(CHAT_ID)).map((row) => [row.handle, row.display_name])).toEqual([
        ['@alice', 'Ally'],
        ['@bob', 'Bob']
      ]);
      expect(state()).toBe('PEOPLE_ADD');

      await press('ppl:done');
      expect(state()).toBe('PEOPLE_MENU');

      await press('ppl:list');
      expect(lastText()).toBe('👥 Members:\n• Ally (@alice)\n• Bob (@bob)\n👥 Member list');
    });

    it('deletes members and returns to the menu when the list empties', async () => {
      await directory.upsert(CHAT_ID, '@alice', 'Ally');
      await press('menu:people');
      await press('ppl:delete');
      expect(gateway.actions()).toEqual(['ppl:del:1', 'nav:back']);

      await press('ppl:del:1');
      expect(lastText()).toBe('✅ Member deleted.\nℹ️ The member list is empty.\n👥 Member list');
      expect(state()).toBe('PEOPLE_MENU');
    });
  });

  describe('reminder list', () => {
    it('shows "no reminders" with only a main menu button', async () => {
      await press('menu:list');

      expect(lastText()).toBe('ℹ️ No reminders.');
      expect(gateway.actions()).toEqual(['home:menu']);
      expect(state()).toBe('REMINDER_LIST');
    });

    it('shows details of a reminder', async () => {
      await addSingle('1201', '0930', 'pay rent');
      await press('menu:list');
      expect(gateway.last()?.options?.buttons?.[0]).toEqual([{ label: '12/01 09:30 · ⏰ One-off · pay rent', action: 'rem:view:1' }]);

      await press('rem:view:1');
      expect(lastText()).toBe('🕒 12/01 09:30\n⏰ One-off\n\npay rent');
      expect(gateway.actions()).toEqual(['rem:del:1', 'rem:list']);
    });

    it('deleting an armed reminder means the timer sends nothing', async () => {
      await addSingle('0310', '1000', 'stand up');
      await press('menu:list');
      await press('rem:del:1');

      expect(lastText()).toBe('✅ Reminder deleted.\nℹ️ No reminders.');
      expect(reminders.scheduler.isArmed(1)).toBe(false);

      gateway.clear();
      await expect(reminders.fire({ reminderId: 1 })).resolves.toBeUndefined();
      await vi.advanceTimersByTimeAsync(2 * HOUR_MS);
      expect(gateway.sent).toEqual([]);
    });

    it('reports a reminder that is already gone', async () => {
      await press('menu:list');
      await press('rem:view:7');

      expect(lastText()).toBe('ℹ️ That reminder is already gone.\nℹ️ No reminders.');
    });
  });

  describe('errors and navigation', () => {
    it('resets with a notice when the scratch is incomplete at finalize', async () => {
      engine.sessions.set(CHAT_ID, { state: 'SINGLE_TEXT', scratch: emptyScratch() });
      await say('hi');

      expect(lastText()).toBe(`⚠️ Internal state lost, please restart with /start.\n${MENU_TITLE}`);
      expect(state()).toBe('MENU');
      expect(store.rows.size).toBe(0);
    });

    it('resets with a generic failure when a dependency throws', async () => {
      vi.spyOn(directory, 'list').mockRejectedValue(new Error('db down'));
      await press('menu:people');
      await press('ppl:list');

      expect(lastText()).toBe(`❌ Something went wrong. Back to the main menu.\n${MENU_TITLE}`);
      expect(state()).toBe('MENU');
    });

    it('cancels from anywhere', async () => {
      await press('menu:general');
      await press('gen:single');
      await engine.handle(CHAT_ID, { kind: 'command', command: 'cancel' });

      expect(lastText()).toBe(`ℹ️ Cancelled.\n${MENU_TITLE}`);
      expect(engine.sessions.get(CHAT_ID).scratch).toEqual(emptyScratch());
    });

    it('honours main menu buttons from an older message', async () => {
      await press('menu:general');
      await press('gen:single');
      await press('menu:list');

      expect(state()).toBe('REMINDER_LIST');
    });

    it('ignores unknown tokens and stray text', async () => {
      await press('menu:general');
      gateway.clear();

      await press('bogus:token');
      await say('hello');

      expect(gateway.sent).toEqual([]);
      expect(state()).toBe('GENERAL_MENU');
    });

    it('keeps sessions of different chats apart', async () => {
      await press('menu:general');
      await engine.handle(42, { kind: 'command', command: 'start' });

      expect(state()).toBe('GENERAL_MENU');
      expect(engine.sessions.get(42).state).toBe('MENU');
    });
  });
});
