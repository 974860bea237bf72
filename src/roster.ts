import type { Rng } from './random.js';
import { randomIndex } from './random.js';
import { normalizeName } from './utils.js';

export interface Seat<R extends string> {
  readonly role: R;
  identity: string | null;
  alive: boolean;
}

export interface SeatedParticipant<R extends string> {
  readonly identity: string;
  readonly role: R;
  readonly alive: boolean;
}

/**
 * Fixed table of role seats for one game.
 *
 * Seat order is the order roles appear in the slot table, each repeated by its count.
 * Every listing (alive players, survivors, peers) follows seat order, never join order.
 */
export class Roster<R extends string> {
  private readonly seats: Seat<R>[];
  private readonly openSeats: number[];

  constructor(
    slots: Partial<Record<R, number>>,
    private readonly rng: Rng
  ) {
    this.seats = [];
    for (const [role, count] of Object.entries(slots) as Array<[R, number | undefined]>) {
      for (let i = 0; i < (count ?? 0); i++) {
        this.seats.push({ role, identity: null, alive: false });
      }
    }
    this.openSeats = this.seats.map((_, i) => i);
  }

  get size(): number {
    return this.seats.length;
  }

  get openSlotCount(): number {
    return this.openSeats.length;
  }

  get isFull(): boolean {
    return this.openSeats.length === 0;
  }

  /**
   * Seat `identity` in a random open slot and return its role.
   * Returns undefined for a blank or already-seated identity (case-insensitive), or when no seat is open.
   */
  register(identity: string): R | undefined {
    const name = identity.trim();
    if (!name) return undefined;
    if (this.find(name)) return undefined;
    if (this.openSeats.length === 0) return undefined;

    const pick = randomIndex(this.rng, this.openSeats.length);
    const [seatIndex] = this.openSeats.splice(pick, 1);
    const seat = seatIndex === undefined ? undefined : this.seats[seatIndex];
    if (!seat) return undefined;

    seat.identity = name;
    seat.alive = true;
    return seat.role;
  }

  /** Mark an alive participant dead and return the stored spelling of their name. */
  markDead(identity: string): string | undefined {
    const seat = this.findSeat(identity);
    if (!seat || !seat.alive || seat.identity === null) return undefined;
    seat.alive = false;
    return seat.identity;
  }

  find(identity: string): SeatedParticipant<R> | undefined {
    const seat = this.findSeat(identity);
    return seat ? toParticipant(seat) : undefined;
  }

  roleOf(identity: string): R | undefined {
    return this.findSeat(identity)?.role;
  }

  isAlive(identity: string): boolean {
    return this.findSeat(identity)?.alive ?? false;
  }

  /** Alive participants holding `role`, or every alive participant for `'*'`. */
  aliveOfRole(role: R | '*'): SeatedParticipant<R>[] {
    return this.participants().filter(p => p.alive && (role === '*' || p.role === role));
  }

  survivors(): string[] {
    return this.aliveOfRole('*').map(p => p.identity);
  }

  /** Everyone seated in `role`, dead or alive. Used to reveal teammates to each other. */
  peersOf(role: R): string[] {
    return this.participants()
      .filter(p => p.role === role)
      .map(p => p.identity);
  }

  countAlive(role?: R): number {
    return this.aliveOfRole(role ?? '*').length;
  }

  /** Seated participants in seat order, as immutable copies. */
  participants(): SeatedParticipant<R>[] {
    const out: SeatedParticipant<R>[] = [];
    for (const seat of this.seats) {
      if (seat.identity === null) continue;
      out.push(toParticipant(seat));
    }
    return out;
  }

  private findSeat(identity: string): Seat<R> | undefined {
    const key = normalizeName(identity);
    if (!key) return undefined;
    return this.seats.find(s => s.identity !== null && normalizeName(s.identity) === key);
  }
}

function toParticipant<R extends string>(seat: Seat<R>): SeatedParticipant<R> {
  return Object.freeze({ identity: seat.identity ?? '', role: seat.role, alive: seat.alive });
}
