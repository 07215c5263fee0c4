export class WarningCollector {
  private list: string[] = [];
  private dropped = 0;

  constructor(private readonly limit = 5000) {}

  add(message: string, lineNumber?: number) {
    if (this.list.length >= this.limit) {
      this.dropped++;
      return;
    }
    this.list.push(lineNumber != null ? `Line ${lineNumber}: ${message}` : message);
  }

  toArray(): string[] {
    if (this.dropped === 0) return this.list.slice();
    return [...this.list, `${this.dropped} further warnings omitted`];
  }
}
