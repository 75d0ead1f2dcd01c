/**
 * Most-recently-used group names. The front entry is the implicit target of draw
 * commands that do not name a group.
 */
export class GroupContextStack {
  private names: string[] = [];

  push(name: string): void {
    const index = this.names.indexOf(name);
    if (index !== -1) this.names.splice(index, 1);
    this.names.unshift(name);
  }

  peek(): string {
    return this.names[0] ?? "";
  }

  pop(): string {
    return this.names.shift() ?? "";
  }

  clear(): void {
    this.names = [];
  }

  toArray(): string[] {
    return [...this.names];
  }

  get size(): number {
    return this.names.length;
  }
}
