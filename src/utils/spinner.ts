/**
 * Simple spinner utility for showing loading indicators in CLI
 */

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private message: string;
  private frames: string[];
  private currentFrame: number = 0;
  private isRunning: boolean = false;

  constructor(message: string = 'Loading...') {
    this.message = message;
    this.frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  }

  /**
   * Start the spinner animation
   */
  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.currentFrame = 0;

    // Hide cursor
    process.stdout.write('\x1B[?25l');

    this.intervalId = setInterval(() => {
      const frame = this.frames[this.currentFrame % this.frames.length];
      process.stdout.write(`\r${frame} ${this.message}`);
      this.currentFrame++;
    }, 80);
  }

  update(message: string): void {
    this.message = message;
  }

  /**
   * Stop the spinner and clear its line
   */
  stop(): void {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    process.stdout.write('\r' + ' '.repeat(process.stdout.columns || 80) + '\r');
    process.stdout.write('\x1B[?25h');
  }
}
