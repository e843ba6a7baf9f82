// Leg ids already consumed by a chain during one per-underlying scan.
export class LegClaims {
  private readonly claimed = new Set<string>();

  isClaimed(id: string): boolean {
    return this.claimed.has(id);
  }

  claim(...ids: string[]) {
    ids.forEach((id) => this.claimed.add(id));
  }

  unclaimed<T extends { id: string }>(items: T[]): T[] {
    return items.filter((item) => !this.claimed.has(item.id));
  }

  get size(): number {
    return this.claimed.size;
  }
}
