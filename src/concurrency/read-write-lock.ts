/**
 * In-process reader/writer lock.
 *
 * Any number of readers may hold the lock together; a writer holds it
 * alone. A queued writer blocks new readers so a steady stream of reads
 * cannot starve appends.
 *
 * @module concurrency/read-write-lock
 */

export type Release = () => void;

interface Waiter {
  kind: 'read' | 'write';
  grant: () => void;
}

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly queue: Waiter[] = [];

  /** Resolves with a release function once a read slot is held. */
  acquireRead(): Promise<Release> {
    if (!this.writerActive && !this.hasQueuedWriter()) {
      this.activeReaders += 1;
      return Promise.resolve(this.releaser('read'));
    }
    return new Promise<Release>((resolve) => {
      this.queue.push({
        kind: 'read',
        grant: () => {
          this.activeReaders += 1;
          resolve(this.releaser('read'));
        },
      });
    });
  }

  /** Resolves with a release function once the lock is held exclusively. */
  acquireWrite(): Promise<Release> {
    if (!this.writerActive && this.activeReaders === 0 && this.queue.length === 0) {
      this.writerActive = true;
      return Promise.resolve(this.releaser('write'));
    }
    return new Promise<Release>((resolve) => {
      this.queue.push({
        kind: 'write',
        grant: () => {
          this.writerActive = true;
          resolve(this.releaser('write'));
        },
      });
    });
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private hasQueuedWriter(): boolean {
    return this.queue.some((w) => w.kind === 'write');
  }

  /** Release functions are idempotent. */
  private releaser(kind: 'read' | 'write'): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (kind === 'read') {
        this.activeReaders -= 1;
      } else {
        this.writerActive = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    if (this.writerActive) return;
    const head = this.queue[0];
    if (!head) return;

    if (head.kind === 'write') {
      if (this.activeReaders > 0) return;
      this.queue.shift();
      head.grant();
      return;
    }

    // Admit the leading run of readers up to the next writer.
    while (this.queue[0]?.kind === 'read') {
      this.queue.shift()?.grant();
    }
  }
}
