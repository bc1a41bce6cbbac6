export interface Clock {
  now(): Date;
}

/**
 * Hands out strictly increasing instants so a pull cursor never equals a later write's stamp.
 */
export class MonotonicClock implements Clock {
  private last = 0;
  private readonly source: () => number;

  constructor(source: () => number = Date.now) {
    this.source = source;
  }

  now(): Date {
    const current = this.source();
    this.last = current > this.last ? current : this.last + 1;
    return new Date(this.last);
  }
}
