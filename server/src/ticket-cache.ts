import type { Ticket } from "./types";

/**
 * In-memory store of session-resumption tickets keyed by their label.
 * Lookups consume the entry, so a ticket resumes at most one session.
 *
 * Every connection shares one cache on the same event loop, and both
 * operations are synchronous, so no add or pop can interleave with another.
 */
export class TicketCache {
  private readonly tickets = new Map<string, Ticket>();

  get size(): number {
    return this.tickets.size;
  }

  add(ticket: Ticket): void {
    this.tickets.set(labelKey(ticket.label), ticket);
  }

  pop(label: Buffer): Ticket | undefined {
    const key = labelKey(label);
    const ticket = this.tickets.get(key);
    if (ticket) {
      this.tickets.delete(key);
    }
    return ticket;
  }

  fetcher(): (label: Buffer) => Ticket | undefined {
    return (label) => this.pop(label);
  }

  handler(): (ticket: Ticket) => void {
    return (ticket) => this.add(ticket);
  }
}

function labelKey(label: Buffer): string {
  return label.toString("hex");
}
