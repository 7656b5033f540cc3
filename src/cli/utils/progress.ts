const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Terminal spinner. Falls back to plain lines when stdout is not a TTY.
 */
export class ProgressIndicator {
  private currentFrame = 0;
  private interval: NodeJS.Timeout | undefined;
  private interactive = Boolean(process.stdout.isTTY);

  constructor(private message: string) {}

  start(): void {
    if (!this.interactive) {
      console.log(`… ${this.message}`);
      return;
    }
    process.stdout.write('\x1B[?25l'); // hide cursor
    this.interval = setInterval(() => {
      process.stdout.write(`\r${FRAMES[this.currentFrame] ?? ''} ${this.message}`);
      this.currentFrame = (this.currentFrame + 1) % FRAMES.length;
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
    if (this.interactive) {
      process.stdout.write('\r\x1B[K\x1B[?25h');
    }
    if (line) {
      console.log(line);
    }
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${(ms / 1000).toFixed(1)}s`;
}

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(unitIndex === 0 ? 0 : 1)} ${units[unitIndex] ?? 'B'}`;
}
