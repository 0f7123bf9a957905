/**
 * Venue Events
 *
 * Typed observability events. Payload keys are base58 strings and
 * amounts bigints. Operations buffer their events and the venue flushes
 * them only after the operation commits.
 */

import { EventEmitter } from "events";
import { RoundSpec } from "./types";

export interface VenueEventMap {
  roundCreated: {
    roundId: number;
    idoToken: string;
    idoTokenDecimals: number;
    startTime: number;
    endTime: number;
    claimableTime: number;
  };
  roundFinalized: { roundId: number; idoSize: bigint; fundedUSDValue: bigint };
  participated: {
    roundId: number;
    participant: string;
    token: string;
    amount: bigint;
    allocation: bigint;
  };
  claimed: {
    roundId: number;
    participant: string;
    amount: bigint;
    secondaryAmount: bigint;
    tokenAllocation: bigint;
  };
  claimableTimeDelayed: { roundId: number; claimableTime: number };
  endTimeDelayed: { roundId: number; endTime: number };
  whitelistStatusChanged: { roundId: number; enabled: boolean };
  whitelistModified: { roundId: number; added: boolean; count: number };
  basisPointsChanged: { roundId: number; bps: number };
  roundSpecChanged: { roundId: number; spec: RoundSpec | null };
  spareTokensWithdrawn: { roundId: number; to: string; amount: bigint };
  metaIdoCreated: { metaIdoId: number };
  roundMembershipChanged: { metaIdoId: number; roundId: number; added: boolean };
  metaIdoRegistered: { metaIdoId: number; participant: string };
  ranksUpdated: { metaIdoId: number; count: number };
}

export type VenueEventName = keyof VenueEventMap;

export type VenueEventPayload = VenueEventMap[VenueEventName];

export const VENUE_EVENT_NAMES: readonly VenueEventName[] = [
  "roundCreated",
  "roundFinalized",
  "participated",
  "claimed",
  "claimableTimeDelayed",
  "endTimeDelayed",
  "whitelistStatusChanged",
  "whitelistModified",
  "basisPointsChanged",
  "roundSpecChanged",
  "spareTokensWithdrawn",
  "metaIdoCreated",
  "roundMembershipChanged",
  "metaIdoRegistered",
  "ranksUpdated",
];

/**
 * EventEmitter with per-event payload types
 */
export class VenueEvents extends EventEmitter {
  onEvent<K extends VenueEventName>(name: K, listener: (payload: VenueEventMap[K]) => void): this {
    return this.on(name, listener);
  }

  /**
   * Listen to every venue event through one callback
   */
  onAny(listener: (name: VenueEventName, payload: VenueEventPayload) => void): () => void {
    const handlers = VENUE_EVENT_NAMES.map((name) => {
      const handler = (payload: VenueEventPayload) => listener(name, payload);
      this.on(name, handler);
      return { name, handler };
    });
    return () => {
      for (const { name, handler } of handlers) {
        this.off(name, handler);
      }
    };
  }

  publish<K extends VenueEventName>(name: K, payload: VenueEventMap[K]): void {
    this.emit(name, payload);
  }
}

/**
 * Events raised inside one operation, held until it commits
 */
export class EventBuffer {
  private pending: Array<(events: VenueEvents) => void> = [];

  push<K extends VenueEventName>(name: K, payload: VenueEventMap[K]): void {
    this.pending.push((events) => events.publish(name, payload));
  }

  flushTo(events: VenueEvents): void {
    const batch = this.pending;
    this.pending = [];
    for (const deliver of batch) {
      deliver(events);
    }
  }
}
