/**
 * Round Lifecycle Clock
 *
 * Time-window guards and the one-shot delay rules for a round.
 * All functions are pure over RoundClock; callers own locking.
 */

import { MAX_DELAY_SECONDS } from "./constants";
import { IdoError } from "./errors";
import { RoundClock } from "./types";

export function createClock(
  startTime: number,
  endTime: number,
  claimableTime: number,
  hasWhitelist: boolean
): RoundClock {
  validateWindow(startTime, endTime, claimableTime);
  return {
    startTime,
    endTime,
    initialEndTime: endTime,
    claimableTime,
    initialClaimableTime: claimableTime,
    isFinalized: false,
    hasWhitelist,
    parentMetaIdoId: null,
  };
}

export function validateWindow(startTime: number, endTime: number, claimableTime: number): void {
  for (const [name, value] of [
    ["startTime", startTime],
    ["endTime", endTime],
    ["claimableTime", claimableTime],
  ] as const) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new IdoError("InvalidWindow", `${name} must be a non-negative integer`, { [name]: value });
    }
  }
  if (endTime <= startTime) {
    throw new IdoError("InvalidWindow", "endTime must be after startTime", { startTime, endTime });
  }
  if (claimableTime <= endTime) {
    throw new IdoError("InvalidWindow", "claimableTime must be after endTime", {
      endTime,
      claimableTime,
    });
  }
}

// ============================================================================
// Guards
// ============================================================================

export function assertNotFinalized(clock: RoundClock): void {
  if (clock.isFinalized) {
    throw new IdoError("AlreadyFinalized", "round is already finalized");
  }
}

/**
 * Contributions are accepted in [startTime, endTime)
 */
export function assertAcceptingContributions(clock: RoundClock, now: number): void {
  if (now < clock.startTime) {
    throw new IdoError("NotStarted", "round has not started", { now, startTime: clock.startTime });
  }
  assertNotFinalized(clock);
  if (now >= clock.endTime) {
    throw new IdoError("WindowClosed", "round has ended", { now, endTime: clock.endTime });
  }
}

export function assertBeforeStart(clock: RoundClock, now: number, action: string): void {
  if (now >= clock.startTime) {
    throw new IdoError("WindowClosed", `${action} is locked once the round opens`, {
      now,
      startTime: clock.startTime,
    });
  }
}

export function assertEnded(clock: RoundClock, now: number): void {
  if (now < clock.endTime) {
    throw new IdoError("IDONotEnded", "round has not ended", { now, endTime: clock.endTime });
  }
}

export function assertClaimable(clock: RoundClock, now: number): void {
  if (!clock.isFinalized || now < clock.claimableTime) {
    throw new IdoError("NotClaimable", "round is not claimable", {
      now,
      claimableTime: clock.claimableTime,
      isFinalized: clock.isFinalized,
    });
  }
}

// ============================================================================
// Delays
// ============================================================================

/**
 * Move endTime forward once.
 * @returns false when newTime is the already-applied delay (no-op)
 */
export function delayEndTime(clock: RoundClock, newTime: number): boolean {
  assertNotFinalized(clock);

  const alreadyDelayed = clock.endTime !== clock.initialEndTime;
  if (alreadyDelayed) {
    if (newTime === clock.endTime) return false;
    throw new IdoError("InvalidDelay", "endTime can only be delayed once", {
      endTime: clock.endTime,
      newTime,
    });
  }

  if (!Number.isSafeInteger(newTime) || newTime <= clock.endTime) {
    throw new IdoError("InvalidDelay", "new endTime must be later than the current one", {
      endTime: clock.endTime,
      newTime,
    });
  }
  if (newTime > clock.initialEndTime + MAX_DELAY_SECONDS) {
    throw new IdoError("InvalidDelay", "endTime delay exceeds 14 days", {
      initialEndTime: clock.initialEndTime,
      newTime,
    });
  }
  if (newTime >= clock.claimableTime) {
    throw new IdoError("InvalidDelay", "endTime must stay before claimableTime", {
      claimableTime: clock.claimableTime,
      newTime,
    });
  }

  clock.endTime = newTime;
  return true;
}

/**
 * Move claimableTime forward once.
 * @returns false when newTime is the already-applied delay (no-op)
 */
export function delayClaimableTime(clock: RoundClock, newTime: number): boolean {
  const alreadyDelayed = clock.claimableTime !== clock.initialClaimableTime;
  if (alreadyDelayed) {
    if (newTime === clock.claimableTime) return false;
    throw new IdoError("InvalidDelay", "claimableTime can only be delayed once", {
      claimableTime: clock.claimableTime,
      newTime,
    });
  }

  if (!Number.isSafeInteger(newTime) || newTime <= clock.claimableTime || newTime <= clock.endTime) {
    throw new IdoError("InvalidDelay", "new claimableTime must be later than claimableTime and endTime", {
      claimableTime: clock.claimableTime,
      endTime: clock.endTime,
      newTime,
    });
  }
  if (newTime > clock.initialClaimableTime + MAX_DELAY_SECONDS) {
    throw new IdoError("InvalidDelay", "claimableTime delay exceeds 14 days", {
      initialClaimableTime: clock.initialClaimableTime,
      newTime,
    });
  }

  clock.claimableTime = newTime;
  return true;
}
