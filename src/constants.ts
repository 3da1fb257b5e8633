/** Null link / "no slot" marker. */
export const NIL = -1;

/** Arena slot reserved for the recency list's root sentinel. */
export const ROOT = 0;

export const DEFAULT_MAX_SIZE = 128;
