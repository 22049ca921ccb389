/**
 * Button ids for application actions.
 *
 * Admin buttons: `app:{action}:{applicationId}`, e.g. `app:approve:42`.
 * Candidate cancel button: `self-cancel:{applicationId}`.
 */
export const APPLICATION_ACTION_PREFIX = 'app';
export const SELF_CANCEL_PREFIX = 'self-cancel';

export const ADMIN_BUTTON_ACTIONS = [
  'approve',
  'reject',
  'promote',
  'cancel',
  'confirm-reject',
  'confirm-cancel',
  'keep',
] as const;

export type AdminButtonAction = (typeof ADMIN_BUTTON_ACTIONS)[number];

export function adminActionId(
  action: AdminButtonAction,
  applicationId: number,
): string {
  return `${APPLICATION_ACTION_PREFIX}:${action}:${applicationId}`;
}

export function selfCancelId(applicationId: number): string {
  return `${SELF_CANCEL_PREFIX}:${applicationId}`;
}

function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  return Number(raw);
}

export function parseAdminActionId(
  customId: string,
): { action: AdminButtonAction; applicationId: number } | null {
  const [prefix, action, rawId] = customId.split(':');
  if (prefix !== APPLICATION_ACTION_PREFIX) return null;
  const known = ADMIN_BUTTON_ACTIONS.find((a) => a === action);
  const applicationId = parseId(rawId);
  if (!known || applicationId === null) return null;
  return { action: known, applicationId };
}

export function parseSelfCancelId(customId: string): number | null {
  const [prefix, rawId] = customId.split(':');
  if (prefix !== SELF_CANCEL_PREFIX) return null;
  return parseId(rawId);
}
