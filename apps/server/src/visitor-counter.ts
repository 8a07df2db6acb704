export class CounterOverflowError extends Error {
  constructor(readonly value: number) {
    super(`visitor counter cannot grow past ${value}`);
    this.name = "CounterOverflowError";
  }
}

export interface VisitorCounter {
  incrementAndGet(): number;
  readonly current: number;
}

export class InMemoryVisitorCounter implements VisitorCounter {
  constructor(private count = 0) {}

  incrementAndGet(): number {
    if (this.count >= Number.MAX_SAFE_INTEGER) throw new CounterOverflowError(this.count);
    this.count += 1;
    return this.count;
  }

  get current(): number {
    return this.count;
  }
}
