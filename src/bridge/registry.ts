/**
 * Destination Registry
 *
 * Pure mapping from destination id to its record. Creating an entry never
 * opens a connection, and malformed ids are accepted here; address
 * resolution happens on the connection manager's first connect attempt.
 */

import type { Destination } from '../lib/types.js';

export class DestinationRegistry {
  // Map iteration order is insertion order
  private destinations = new Map<string, Destination>();

  getOrCreate(id: string): Destination {
    let destination = this.destinations.get(id);
    if (!destination) {
      destination = {
        id,
        connectionState: 'Disconnected',
        pendingSends: [],
      };
      this.destinations.set(id, destination);
    }
    return destination;
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

  /**
   * Snapshot in insertion order. Later registry changes do not affect the
   * returned array, though the records themselves are live.
   */
  list(): Destination[] {
    return [...this.destinations.values()];
  }

  get size(): number {
    return this.destinations.size;
  }

  clear(): void {
    this.destinations.clear();
  }
}
