/** Format milliseconds to HH:MM:SS.mmm */
export function formatTime(ms: number): string {
  if (!isFinite(ms) || ms < 0) return '00:00:00.000';
  const hours = Math.floor(ms / 3600000);
  const mins = Math.floor((ms % 3600000) / 60000);
  const secs = Math.floor((ms % 60000) / 1000);
  const rest = Math.round(ms % 1000);
  return `${hours.toString().padStart(2, '0')}:${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}.${rest.toString().padStart(3, '0')}`;
}

/** Convert milliseconds to seconds */
export function msToSec(ms: number): number {
  return ms / 1000;
}

/** Current date as an ISO 8601 string with a UTC offset, as ELAN writes it */
export function today(): string {
  return new Date().toISOString().replace('Z', '+00:00');
}
