/**
 * Keep-alive only: sends a ping on a fixed period while the socket is
 * open.  Dead peers are detected by the transport's own close/error.
 */
export class HeartbeatMonitor {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly intervalMs: number) {}

  start(sendPing: () => void): void {
    this.stop();
    this.timer = setInterval(sendPing, this.intervalMs);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
