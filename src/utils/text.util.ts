/**
 * Cuts a message to `maxLength` code points, marking the cut with "..."
 */
export function truncateMessage(message: string, maxLength: number): string {
  const chars = Array.from(message);
  if (chars.length <= maxLength) {
    return message;
  }
  return `${chars.slice(0, maxLength).join('')}...`;
}

/**
 * Escapes text for Telegram's HTML parse mode
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** "1m 5s" above a minute, "42s" below */
export function formatElapsed(elapsedMs: number): string {
  const totalSeconds = Math.floor(elapsedMs / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

export function formatUsd(amount: number, fractionDigits = 2): string {
  return `$${amount.toFixed(fractionDigits)}`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Everything after the command word, e.g. "/setmodel  veo-3.0-generate-001 " -> "veo-3.0-generate-001"
 */
export function getCommandArgument(text: string): string | undefined {
  const match = /^\S+\s+([\s\S]*)$/.exec(text.trim());
  const argument = match?.[1]?.trim();
  return argument ? argument : undefined;
}
