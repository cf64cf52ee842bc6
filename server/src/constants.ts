/**
 * Application-wide constants shared across server modules.
 */

/**
 * The name of the HTTP-only cookie used to store session IDs.
 * This cookie is set on login and cleared on logout.
 */
export const COOKIE_NAME = 'promptdeck_session';

/** Default colour for tags created without one. */
export const DEFAULT_TAG_COLOR = '#3B82F6';

export const MAX_PROMPT_TITLE_LENGTH = 255;
export const MAX_TAG_NAME_LENGTH = 100;
export const MAX_FAVORITE_SET_NAME_LENGTH = 150;

/** Total merged content above this size produces a validation warning. */
export const LARGE_MERGE_WARNING_CHARS = 50_000;
