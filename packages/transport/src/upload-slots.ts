/**
 * Upload Slots
 *
 * At most `limit` uploads run at once; the rest wait in submission order.
 * A finished upload hands its slot straight to the next waiter.
 */
export class UploadSlots {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Upload concurrency must be >= 1 (got ${limit})`);
    }
  }

  async run<T>(upload: () => Promise<T>): Promise<T> {
    if (this.active < this.limit) {
      this.active++;
    } else {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    try {
      return await upload();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }
}
