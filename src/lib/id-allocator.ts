// Sequential record ids (A0001, A0002, ...). Allocation is synchronous, so
// concurrent workers on the event loop never observe the same counter value.
export class IdAllocator {
  private counter = 0;

  constructor(
    private readonly prefix = "A",
    private readonly width = 4
  ) {}

  next(): string {
    this.counter += 1;
    return `${this.prefix}${String(this.counter).padStart(this.width, "0")}`;
  }

  get issued(): number {
    return this.counter;
  }
}
