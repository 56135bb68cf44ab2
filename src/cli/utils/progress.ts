/**
 * Spinner for long-running steps. Writes to stderr so stdout can be piped, and
 * stays silent apart from the final line when stderr is not a terminal.
 */
export class ProgressIndicator {
  private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private currentFrame = 0;
  private interval: NodeJS.Timeout | undefined;
  private message: string;
  private stream: NodeJS.WriteStream;

  constructor(message: string, stream: NodeJS.WriteStream = process.stderr) {
    this.message = message;
    this.stream = stream;
  }

  start(): void {
    if (!this.stream.isTTY) return;

    this.stream.write('\x1B[?25l'); // Hide cursor
    this.interval = setInterval(() => {
      this.stream.write(`\r${this.frames[this.currentFrame]} ${this.message}`);
      this.currentFrame = (this.currentFrame + 1) % this.frames.length;
    }, 100);
  }

  update(message: string): void {
    this.message = message;
  }

  stop(finalMessage?: string): void {
    this.finish(finalMessage ? `✅ ${finalMessage}` : undefined);
  }

  fail(errorMessage?: string): void {
    this.finish(errorMessage ? `❌ ${errorMessage}` : undefined);
  }

  private finish(line?: string): void {
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    if (this.stream.isTTY) {
      this.stream.write('\r\x1B[K\x1B[?25h'); // Clear line, show cursor
    }
    if (line) {
      this.stream.write(`${line}\n`);
    }
  }
}

export function formatSeconds(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }

  const whole = Math.floor(seconds);
  const minutes = Math.floor(whole / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${whole % 60}s`;
  }
  return `${minutes}m ${whole % 60}s`;
}

export function formatCost(usd: number): string {
  return `$${usd.toFixed(6)}`;
}

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}
