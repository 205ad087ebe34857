/**
 * Permission vocabulary.
 *
 * The set is closed: a manifest naming a tag outside it is rejected at parse
 * time. Adding a tag here is the only way to extend what modules may declare.
 */

export const PERMISSION_TAGS = [
  'read_messages',
  'read_message_history',
  'send_messages',
  'send_messages_in_threads',
  'manage_messages',
  'embed_links',
  'attach_files',
  'add_reactions',
  'use_external_emojis',
  'mention_everyone',
  'manage_threads',
  'create_public_threads',
  'create_private_threads',
  'view_channel',
  'manage_channels',
  'manage_roles',
  'manage_nicknames',
  'change_nickname',
  'kick_members',
  'ban_members',
  'moderate_members',
  'view_audit_log',
  'manage_guild',
  'manage_webhooks',
  'connect',
  'speak',
  'administrator',
] as const;

export type PermissionTag = (typeof PERMISSION_TAGS)[number];

const TAG_SET: ReadonlySet<string> = new Set(PERMISSION_TAGS);

export function isPermissionTag(value: unknown): value is PermissionTag {
  return typeof value === 'string' && TAG_SET.has(value);
}

/**
 * Platform actions a module may ask the gateway to perform, and the
 * permission each one requires.
 */
export const PLATFORM_ACTIONS = Object.freeze({
  send_message: 'send_messages',
  edit_message: 'send_messages',
  reply: 'send_messages',
  delete_message: 'manage_messages',
  pin_message: 'manage_messages',
  add_reaction: 'add_reactions',
  create_thread: 'create_public_threads',
  set_nickname: 'manage_nicknames',
  add_role: 'manage_roles',
  remove_role: 'manage_roles',
  timeout_member: 'moderate_members',
  kick_member: 'kick_members',
  ban_member: 'ban_members',
  fetch_history: 'read_message_history',
} as const satisfies Record<string, PermissionTag>);

export type PlatformAction = keyof typeof PLATFORM_ACTIONS;

export function isPlatformAction(value: string): value is PlatformAction {
  return Object.prototype.hasOwnProperty.call(PLATFORM_ACTIONS, value);
}

/**
 * Whether a granted set covers a required permission. `administrator`
 * covers everything; a `null` requirement is always covered.
 */
export function covers(granted: ReadonlySet<PermissionTag>, required: PermissionTag | null): boolean {
  if (required === null) return true;
  return granted.has(required) || granted.has('administrator');
}

/**
 * Human-readable disclosure of what a module asks for, shown to the operator
 * before the grant.
 */
export function describePermissions(permissions: readonly PermissionTag[]): string {
  if (permissions.length === 0) return 'No permissions requested';
  return permissions.map((p) => `- ${p}`).join('\n');
}
