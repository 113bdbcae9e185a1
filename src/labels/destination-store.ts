import type { Destination } from "@/types";

/**
 * Destination records keyed by id. Exact-id lookup only; ranked search
 * lives in the matching engine, which iterates `values()`.
 */
export class DestinationStore {
  private destinations: Map<string, Destination> = new Map();

  /**
   * Insert or fully replace a destination (no field merge)
   */
  add(destination: Destination): void {
    this.destinations.set(destination.id, destination);
  }

  get(id: string): Destination | undefined {
    return this.destinations.get(id);
  }

  has(id: string): boolean {
    return this.destinations.has(id);
  }

  remove(id: string): boolean {
    return this.destinations.delete(id);
  }

  values(): Destination[] {
    return Array.from(this.destinations.values());
  }

  get size(): number {
    return this.destinations.size;
  }

  clear(): void {
    this.destinations.clear();
  }
}
