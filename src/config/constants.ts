// Machine sources
export const DEFAULT_TEMPLATE = 'traffic-lights';
export const DEFAULT_MACHINE_BASENAME = 'machine';

// Events
export const TIMEOUT_EVENT = 'Timeout';

// Diagnostic output
export const STATE_LINE_PREFIX = 'State: ';
export const NOTICE_PREFIX = '--- ';

// Timer limits
export const MAX_TIMER_MS = 2_147_483_647; // setTimeout ceiling

// Follow-up events (post) dispatched back to back before the run is aborted
export const MAX_FOLLOW_UPS = 10_000;
