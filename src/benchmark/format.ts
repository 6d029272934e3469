export function formatTime(seconds: number | null): string {
  if (seconds === null) {
    return 'N/A';
  }
  if (seconds < 0.001) {
    return `${(seconds * 1_000_000).toFixed(1)} us`;
  }
  if (seconds < 1) {
    return `${(seconds * 1_000).toFixed(2)} ms`;
  }
  return `${seconds.toFixed(2)} s`;
}

export function formatBytes(bytes: number): string {
  return bytes.toLocaleString('en-US');
}

export function countLines(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  const lines = text.split(/\r\n|\r|\n/);
  // A trailing newline terminates the last line rather than starting a new one.
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
}
