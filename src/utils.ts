export function formatElapsed(ms: number): string {
  const totalSeconds = ms / 1000;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds - minutes * 60;

  if (minutes > 0) {
    return `${minutes}m ${Math.floor(seconds)}s`;
  }
  return `${(Math.round(seconds * 10) / 10).toFixed(1)}s`;
}

export function maskSecret(secret?: string): string | undefined {
  if (!secret) {
    return undefined;
  }
  if (secret.length <= 4) {
    return "***";
  }
  return `${secret.slice(0, 2)}***${secret.slice(-2)}`;
}

/** Shortens model output and other large payloads before they reach the log. */
export function truncateForLog(value: string, maxLength = 200): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}…` : value;
}
