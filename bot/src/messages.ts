import type { MessageRecord, UserId } from "./types";

export const escapeHtml = (text: string) =>
  text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

const code = (value: string | number) => `<code>${escapeHtml(String(value))}</code>`;

export const splitDuration = (ms: number) => {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  return { hours: Math.floor(totalSeconds / 3600), minutes: Math.floor((totalSeconds % 3600) / 60) };
};

export const formatDuration = (ms: number) => {
  const { hours, minutes } = splitDuration(ms);
  return `${hours}h ${minutes}m`;
};

const hoursLabel = (hours: number) => (hours === 1 ? "1 hour" : `${hours} hours`);

export const formatCooldown = (hours: number) => (hours === 0 ? "unlimited" : hoursLabel(hours));

export const displayName = (username?: string, firstName?: string) =>
  username ? `@${username}` : firstName ?? "there";

export const formatWarningMessage = ({
  name,
  cooldownHours,
  remainingMs,
}: {
  name: string;
  cooldownHours: number;
  remainingMs: number;
}) =>
  `⚠️ ${escapeHtml(name)}, you can only send 1 message per ${hoursLabel(cooldownHours)}.\n` +
  `Please wait ${formatDuration(remainingMs)} before sending another message.`;

export const formatStatus = (records: MessageRecord[], now: number) => {
  if (!records.length) return "📊 No active message records.";
  const lines = records
    .slice()
    .sort((a, b) => b.lastSentAt - a.lastSentAt)
    .map((record) => `• User ID ${code(record.userId)}: ${formatDuration(now - record.lastSentAt)} ago`);
  return ["📊 <b>Active message records</b>", "", ...lines, "", `<b>Total: ${records.length} users</b>`].join("\n");
};

export const formatDuplicates = (userIds: UserId[]) =>
  userIds.length
    ? ["⚠️ <b>Duplicate users found today:</b>", ...userIds.map((id) => `• User ID: ${code(id)}`)].join("\n")
    : "✅ No duplicate user messages found today.";

export const formatCustomAdmins = (userIds: UserId[]) =>
  userIds.length
    ? ["👮 <b>Custom admins</b>", ...userIds.map((id) => `• ${code(id)}`)].join("\n")
    : "ℹ️ No custom admins in this chat.";

export const formatCooldowns = (overrides: Record<string, number>, defaultHours: number) => {
  const entries = Object.entries(overrides).sort(([a], [b]) => Number(a) - Number(b));
  const header = `⏱ <b>Cooldown overrides</b> (default: ${formatCooldown(defaultHours)})`;
  if (!entries.length) return `${header}\nNo overrides set.`;
  return [header, ...entries.map(([userId, hours]) => `• ${code(userId)}: ${formatCooldown(hours)}`)].join("\n");
};

export const formatHelp = (commands: { usage: string; description: string }[], defaultHours: number) =>
  [
    "🤖 <b>Topic Message Limiter</b>",
    "",
    `Members may send 1 message per ${formatCooldown(defaultHours)} in the monitored topic.`,
    "Extra messages are deleted and a short-lived warning is shown.",
    "",
    "<b>Commands (admin only):</b>",
    ...commands.map((command) => `• ${escapeHtml(command.usage)} - ${escapeHtml(command.description)}`),
  ].join("\n");
