/**
 * Outline format constants.
 *
 * These values define the "wire format" of outline documents and the defaults
 * the hosts fall back to.
 */

/** Context that marks a recurring action as an inbox to be emptied. */
export const DEFAULT_INBOX_CONTEXT = 'inbox';

/** Context name that doubles as the waiting flag. */
export const WAITING_CONTEXT = 'waiting';

/** Keyword introducing a recurrence spec. */
export const RECURRENCE_KEYWORD = 'EVERY';

/** Timestamp layout used by completion stamps (luxon tokens). */
export const STAMP_FORMAT = 'yyyy-MM-dd HH:mm';

/** Time assumed for a due date written without a time. */
export const DEFAULT_DUE_TIME = '23:59';

/** Time assumed for a visible or reminder date written without a time. */
export const DEFAULT_VISIBLE_TIME = '00:01';

/** Width of a tab when measuring indentation. */
export const TAB_WIDTH = 4;

/** File extensions treated as outline documents when listing a root. */
export const OUTLINE_EXTENSIONS: readonly string[] = ['.gtd', '.outline', '.txt'];
