import fs from "node:fs/promises";

export type ProtocolEvent = {
  time: number;
  connection: string;
  name: string;
  data: Record<string, unknown>;
};

/**
 * Accumulates connection and stream events in memory so they can be
 * written out as one JSON document when the process exits.
 */
export class ProtocolEventLog {
  private readonly events: ProtocolEvent[] = [];
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  get size(): number {
    return this.events.length;
  }

  record(connection: string, name: string, data: Record<string, unknown> = {}): void {
    this.events.push({ time: this.now() - this.startedAt, connection, name, data });
  }

  forConnection(connection: string): ProtocolEvent[] {
    return this.events.filter((event) => event.connection === connection);
  }

  toJSON(): { referenceTime: number; events: ProtocolEvent[] } {
    return { referenceTime: this.startedAt, events: [...this.events] };
  }

  async writeTo(filePath: string): Promise<void> {
    await fs.writeFile(filePath, JSON.stringify(this.toJSON(), null, 4));
  }
}
