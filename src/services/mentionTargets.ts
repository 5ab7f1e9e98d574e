import type { SupabaseClient } from '@supabase/supabase-js';
import { StoreError } from '../errors';
import { mentionTargetRowSchema, type MentionTargetRow } from '../types/rows';

const MENTION_TARGETS_TABLE = 'mention_targets';
const MENTION_COLUMNS = 'id, chat_id, handle, display_name';
const HANDLE_SIGIL = '@';

/** Per-chat list of people who can be tagged. `(chatId, handle)` is unique. */
export interface MentionDirectory {
  /** Inserts, or replaces the display name of an existing handle. */
  upsert(chatId: number, handle: string, displayName: string): Promise<MentionTargetRow>;
  list(chatId: number): Promise<MentionTargetRow[]>;
  /** Scoped to the chat; resolves `false` when nothing was removed. */
  delete(chatId: number, id: number): Promise<boolean>;
}

export function createMentionDirectory(client: SupabaseClient): MentionDirectory {
  return {
    async upsert(chatId, handle, displayName) {
      const { data, error } = await client
        .from(MENTION_TARGETS_TABLE)
        .upsert(
          { chat_id: chatId, handle: normalizeHandle(handle), display_name: displayName },
          { onConflict: 'chat_id,handle' }
        )
        .select(MENTION_COLUMNS)
        .single();

      if (error) {
        throw new StoreError('save mention target', error.message);
      }

      return mentionTargetRowSchema.parse(data);
    },

    async list(chatId) {
      const { data, error } = await client
        .from(MENTION_TARGETS_TABLE)
        .select(MENTION_COLUMNS)
        .eq('chat_id', chatId)
        .order('id', { ascending: true });

      if (error) {
        throw new StoreError('list mention targets', error.message);
      }

      return mentionTargetRowSchema.array().parse(data ?? []);
    },

    async delete(chatId, id) {
      const { data, error } = await client
        .from(MENTION_TARGETS_TABLE)
        .delete()
        .eq('chat_id', chatId)
        .eq('id', id)
        .select('id');

      if (error) {
        throw new StoreError('delete mention target', error.message);
      }

      return Array.isArray(data) && data.length > 0;
    }
  };
}

export const normalizeHandle = (handle: string): string => {
  const bare = handle.trim().replace(/^@+/, '');
  return `${HANDLE_SIGIL}${bare}`;
};

export type MemberLine = { handle: string; displayName: string };

export type MemberLineError = { line: string; lineNumber: number };

export type ParsedMemberLines = {
  entries: MemberLine[];
  errors: MemberLineError[];
};

/**
 * One member per line: `handle name`, split on the first whitespace run.
 * Blank lines are skipped silently; lines without a name are reported.
 */
export function parseMemberLines(text: string): ParsedMemberLines {
  const entries: MemberLine[] = [];
  const errors: MemberLineError[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;

    const match = line.match(/^(\S+)\s+(.+)$/);
    const handle = match?.[1]?.replace(/^@+/, '') ?? '';
    const displayName = match?.[2]?.trim() ?? '';
    if (!handle || !displayName) {
      errors.push({ line, lineNumber: index + 1 });
      return;
    }

    entries.push({ handle: normalizeHandle(handle), displayName });
  });

  return { entries, errors };
}

export type AddMembersResult = {
  added: MentionTargetRow[];
  errors: MemberLineError[];
};

export async function addMembersFromText(
  directory: MentionDirectory,
  chatId: number,
  text: string
): Promise<AddMembersResult> {
  const { entries, errors } = parseMemberLines(text);
  const added: MentionTargetRow[] = [];

  for (const entry of entries) {
    added.push(await directory.upsert(chatId, entry.handle, entry.displayName));
  }

  return { added, errors };
}

/** Space-separated handles of the selected targets, in directory order. */
export const buildMentionSuffix = (targets: MentionTargetRow[], selectedIds: readonly number[]): string =>
  targets
    .filter((target) => selectedIds.includes(target.id))
    .map((target) => target.handle)
    .join(' ');
