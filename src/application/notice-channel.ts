import type { NoticeSink, TerminationNotice } from '../domain/index.js';

/**
 * Single-slot hand-off between the listeners and the daemon.
 *
 * The first `send` fills the slot; later sends are refused. `receive`
 * resolves with the notice, or with null once the channel is closed empty.
 */
export class NoticeChannel implements NoticeSink {
  private notice: TerminationNotice | null = null;
  private closed = false;
  private waiters: Array<(notice: TerminationNotice | null) => void> = [];

  send(notice: TerminationNotice): boolean {
    if (this.closed || this.notice !== null) return false;
    this.notice = notice;
    this.flush();
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.flush();
  }

  receive(): Promise<TerminationNotice | null> {
    if (this.notice !== null || this.closed) {
      return Promise.resolve(this.notice);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private flush(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve(this.notice);
    }
  }
}
