// Injectable "now".  Services take a Clock so tests can pin time to the
// expiry boundary instead of sleeping.
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
