export interface Clock {
	now(): Date;
}

export const systemClock: Clock = {
	now: () => new Date(),
};

/** A clock frozen at one instant, for deterministic parsing. */
export function fixedClock(instant: Date): Clock {
	return {
		now: () => new Date(instant.getTime()),
	};
}
