export const DISCORD_BOT_EVENTS = {
  CONNECTED: 'discord-bot.connected',
  DISCONNECTED: 'discord-bot.disconnected',
  ERROR: 'discord-bot.error',
} as const;

/**
 * Accent colors for Discord embeds.
 * Values are decimal representations of hex colors for discord.js.
 */
export const EMBED_COLORS = {
  /** Announcements and neutral notices (Cyan) #38bdf8 */
  INFO: 0x38bdf8,
  /** Approved / promoted (Emerald) #34d399 */
  SUCCESS: 0x34d399,
  /** Needs attention (Amber) #f59e0b */
  WARNING: 0xf59e0b,
  /** Rejection / cancellation (Red) #ef4444 */
  DANGER: 0xef4444,
} as const;

/**
 * Custom ids of the application form flow.
 * The modal id carries the chosen events: `apply-form:3,7`.
 */
export const INTERACTION_IDS = {
  /** Event picker shown when more than one procedure is open */
  APPLY_SELECT: 'apply-select',
  /** Application form modal */
  APPLY_MODAL: 'apply-form',
} as const;

/** Modal field ids for the application form */
export const APPLY_FORM_FIELDS = {
  FULL_NAME: 'full_name',
  PHONE: 'phone',
} as const;

/**
 * Convert Discord.js errors into admin-friendly messages.
 */
export function friendlyDiscordErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return 'Failed to connect with provided token';
  const raw = error.message;

  if (/disallowed intent|privileged intent/i.test(raw)) {
    return 'Missing required privileged intent. Enable it in the Discord Developer Portal under Bot > Privileged Gateway Intents.';
  }
  if (/invalid token|TOKEN_INVALID/i.test(raw)) {
    return 'Invalid bot token. Please check the token and try again.';
  }
  if (/getaddrinfo|ENOTFOUND/i.test(raw)) {
    return 'Unable to reach Discord servers. Check your internet connection.';
  }
  if (/ECONNREFUSED/i.test(raw)) {
    return 'Connection to Discord was refused. Try again in a few moments.';
  }

  return 'Failed to connect with provided token';
}
