/**
 * Debug flags for development. Defaults must be false for production.
 * Pipeline stage logging (generate / score / rank) is gated by DEBUG_PIPELINE.
 */
export const DEBUG_PIPELINE = process.env.DEBUG_PIPELINE === "1";
